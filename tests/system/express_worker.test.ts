import http from 'http';
import express from 'express';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { z } from 'zod';
import { RetryableToolError } from '../../src/tools/ToolErrors';
import { tool } from '../../src/tools/ToolTypes';
import { builtinToolkits } from '../../src/tools/toolkits';
import { ExpressWorker } from '../../src/worker/ExpressRouter';
import { MAX_BODY_BYTES } from '../../src/worker/WorkerTypes';
import { close, listen, request } from '../helpers/http';

const SECRET = 'test-secret';
let server: http.Server;
let port: number;
let counterCalls = 0;

const counter = tool(
  { description: 'Counts its calls', params: { n: z.number().int().describe('Any number') }, returns: z.number().int() },
  function counter({ n }) {
    counterCalls += 1;
    return n;
  }
);

const flaky = tool({ description: 'Always asks for a retry', params: {} }, function flaky() {
  throw new RetryableToolError('Rate limited', { additionalPromptContent: 'Wait and try again', retryAfterMs: 500 });
});

const boom = tool({ description: 'Fails unexpectedly', params: {} }, function boom() {
  throw new Error('disk on fire');
});

const invoke = (body: unknown, token: string | undefined = SECRET) =>
  request(port, 'POST', '/worker/tools/invoke', { body, token });

describe('ExpressWorker over HTTP', () => {
  beforeAll(async () => {
    const app = express();
    const worker = new ExpressWorker(app, { secret: SECRET, basePath: '/worker' });
    worker.registerToolkit(builtinToolkits.math());
    worker.registerTool(counter, 'Checks');
    worker.registerTool(flaky, 'Checks');
    worker.registerTool(boom, 'Checks');
    server = http.createServer(app);
    port = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('GET /health answers without credentials', async () => {
    const r = await request(port, 'GET', '/worker/health');
    expect(r.status).toBe(200);
    expect(r.json).toEqual({ status: 'ok', tool_count: 9 });
  });

  it('GET /tools requires the secret', async () => {
    const r = await request(port, 'GET', '/worker/tools');
    expect(r.status).toBe(401);
    expect(r.json).toEqual({ error: 'unauthorized' });
  });

  it('GET /tools and /catalog list the tools', async () => {
    const tools = await request(port, 'GET', '/worker/tools', { token: SECRET });
    expect(tools.status).toBe(200);
    expect(tools.json).toContainEqual({
      name: 'Math.Add',
      description: 'Add two integers',
      version: '0.1.0',
      endpoint: '/worker/tools/invoke',
    });
    const catalog = await request(port, 'GET', '/worker/catalog', { token: SECRET });
    expect(catalog.json).toEqual(tools.json);
  });

  it('POST /tools/invoke with a wrong secret is refused before the tool runs', async () => {
    const before = counterCalls;
    const r = await invoke({ tool: { name: 'Checks.Counter' }, inputs: { n: 1 } }, 'wrong-secret');
    expect(r.status).toBe(401);
    expect(r.json).toEqual({ error: 'unauthorized' });
    expect(counterCalls).toBe(before);
  });

  it('invokes add and returns the value', async () => {
    const r = await invoke({ tool: { name: 'Math.Add' }, invocation_id: 'inv-1', inputs: { a: 2, b: 3 } });
    expect(r.status).toBe(200);
    expect(r.json).toMatchObject({ invocation_id: 'inv-1', success: true, output: { value: 5 } });
  });

  it('accepts the /invoke alias with a separate toolkit field', async () => {
    const r = await request(port, 'POST', '/worker/invoke', {
      body: { tool: { name: 'Subtract', toolkit: 'Math' }, inputs: { a: 10, b: 4 } },
      token: SECRET,
    });
    expect(r.json).toMatchObject({ success: true, output: { value: 6 } });
  });

  it('rejects a missing required input without calling the tool', async () => {
    const before = counterCalls;
    const r = await invoke({ tool: { name: 'Checks.Counter' }, inputs: {} });
    expect(r.status).toBe(200);
    expect(r.json).toMatchObject({
      success: false,
      output: { error: { message: 'Missing required input: n', can_retry: false } },
    });
    expect(counterCalls).toBe(before);
  });

  it('passes retry hints through', async () => {
    const r = await invoke({ tool: { name: 'Checks.Flaky' }, inputs: {} });
    expect(r.status).toBe(200);
    expect(r.json).toMatchObject({
      success: false,
      output: {
        error: {
          message: 'Rate limited',
          can_retry: true,
          additional_prompt_content: 'Wait and try again',
          retry_after_ms: 500,
        },
      },
    });
  });

  it('answers unexpected tool errors with 200 and success false', async () => {
    const r = await invoke({ tool: { name: 'Checks.Boom' }, inputs: {} });
    expect(r.status).toBe(200);
    expect(r.json).toMatchObject({
      success: false,
      output: {
        error: {
          message: "Error in execution of 'Checks.Boom'",
          developer_message: 'Error: disk on fire',
          can_retry: false,
          retry_after_ms: null,
        },
      },
    });
  });

  it('answers an unknown tool with 404', async () => {
    const r = await invoke({ tool: { name: 'Nope.Nothing' }, inputs: {} });
    expect(r.status).toBe(404);
    expect(r.json).toEqual({ error: 'Tool Nope.Nothing not found' });
  });

  it('answers malformed bodies with 400', async () => {
    const notJson = await request(port, 'POST', '/worker/tools/invoke', { raw: '{not json', token: SECRET });
    expect(notJson.status).toBe(400);
    expect(notJson.json).toEqual({ error: 'malformed request body' });

    const noTool = await invoke({ inputs: {} });
    expect(noTool.status).toBe(400);
    expect(noTool.json).toEqual({ error: 'Malformed invocation request: tool: Required' });
  });

  it('refuses bodies above the size limit with 413', async () => {
    const raw = JSON.stringify({ tool: { name: 'Math.Add' }, inputs: { a: 'x'.repeat(MAX_BODY_BYTES) } });
    const r = await request(port, 'POST', '/worker/tools/invoke', { raw, token: SECRET });
    expect(r.status).toBe(413);
    expect(r.json).toEqual({ error: 'request body exceeds 1048576 bytes' });
  });

  it('serves JSON-RPC tool calls on /mcp', async () => {
    const list = await request(port, 'POST', '/worker/mcp', {
      body: { jsonrpc: '2.0', id: 1, method: 'tools/list' },
      token: SECRET,
    });
    expect(list.status).toBe(200);
    expect(list.json).toMatchObject({ jsonrpc: '2.0', id: 1, result: { tools: expect.arrayContaining([expect.objectContaining({ name: 'Math_Add' })]) } });

    const note = await request(port, 'POST', '/worker/mcp', {
      body: { jsonrpc: '2.0', method: 'notifications/initialized' },
      token: SECRET,
    });
    expect(note.status).toBe(204);
  });
});
