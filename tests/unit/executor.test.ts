import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolCatalog } from '../../src/tools/ToolCatalog';
import { ToolContext } from '../../src/tools/ToolContext';
import { ToolExecutor, coerceWireValue } from '../../src/tools/ToolExecutor';
import { RetryableToolError, ToolExecutionError } from '../../src/tools/ToolErrors';
import { type AnyToolDescriptor, field, returns, tool } from '../../src/tools/ToolTypes';
import { add, divide, sumList } from '../../src/tools/toolkits/math';
import { TextCase, changeCase, signText } from '../../src/tools/toolkits/text';

const executor = new ToolExecutor();
const context = (secrets?: Record<string, string>) => new ToolContext({ invocationId: 'inv-1', secrets });
const materialize = (t: AnyToolDescriptor) => new ToolCatalog().addTool(t);

describe('ToolExecutor.run', () => {
  it('returns the serialized value on success', async () => {
    const res = await executor.run(materialize(add), { a: 2, b: 3 }, context());
    expect(res.success).toBe(true);
    expect(res.output).toEqual({ value: 5 });
    expect(res.invocationId).toBe('inv-1');
    expect(Number.isNaN(Date.parse(res.finishedAt))).toBe(false);
    expect(res.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('coerces wire strings for numeric and json inputs', async () => {
    expect((await executor.run(materialize(add), { a: '2', b: '40' }, context())).output).toEqual({ value: 42 });
    expect((await executor.run(materialize(sumList), { numbers: '[1.5, 2.5]' }, context())).output).toEqual({ value: 4 });
  });

  it('rejects a missing required input without calling the tool', async () => {
    let calls = 0;
    const guarded = tool(
      { description: 'Counts calls', params: { a: z.number().int().describe('A number') }, returns: z.number().int() },
      function guarded({ a }) {
        calls += 1;
        return a;
      }
    );
    const res = await executor.run(materialize(guarded), {}, context());
    expect(res.success).toBe(false);
    expect(res.output).toEqual({ error: { message: 'Missing required input: a', developerMessage: undefined, canRetry: false } });
    expect(calls).toBe(0);
  });

  it('does not mistake inherited object members for inputs', async () => {
    const named = tool(
      {
        description: 'Echoes a reserved-looking name',
        params: { constructor: z.string().describe('Any text') },
        returns: z.string(),
      },
      function named({ constructor }) {
        return constructor;
      }
    );
    const res = await executor.run(materialize(named), {}, context());
    expect(res.output).toEqual({
      error: { message: 'Missing required input: constructor', developerMessage: undefined, canRetry: false },
    });
    expect((await executor.run(materialize(named), { constructor: 'ok' }, context())).output).toEqual({ value: 'ok' });
  });

  it('rejects a value the schema refuses', async () => {
    const res = await executor.run(materialize(add), { a: 'two', b: 3 }, context());
    expect(res.success).toBe(false);
    expect(res.output).toMatchObject({
      error: { message: "Invalid value for input 'a'", developerMessage: 'Expected number, received string', canRetry: false },
    });
  });

  it('ignores unknown inputs', async () => {
    const res = await executor.run(materialize(add), { a: 1, b: 1, c: 99 }, context());
    expect(res.output).toEqual({ value: 2 });
  });

  it('applies field defaults and maps enum values', async () => {
    const materialized = materialize(changeCase);
    expect((await executor.run(materialized, { text: 'Hello World' }, context())).output).toEqual({ value: 'hello world' });
    expect((await executor.run(materialized, { text: 'hello world', mode: TextCase.Title }, context())).output).toEqual({
      value: 'Hello World',
    });
    const bad = await executor.run(materialized, { text: 'x', mode: 'shout' }, context());
    expect(bad.success).toBe(false);
  });

  it('passes optional inputs through as absent', async () => {
    const greet = tool(
      {
        description: 'Greets',
        params: {
          name: z.string().optional().describe('Name'),
          title: z.string().nullable().describe('Title'),
          punctuation: field(z.string(), { description: 'Ending', defaultFactory: () => '!' }),
        },
        returns: z.string(),
      },
      function greet({ name, title, punctuation }) {
        return `Hello ${title ?? ''}${name ?? 'there'}${punctuation}`;
      }
    );
    const res = await executor.run(materialize(greet), { title: null }, context());
    expect(res.output).toEqual({ value: 'Hello there!' });
  });

  it('passes RetryableToolError fields through unchanged', async () => {
    const flaky = tool({ description: 'Always busy', params: {} }, function flaky() {
      throw new RetryableToolError('Service busy', {
        developerMessage: 'upstream 503',
        additionalPromptContent: 'Try a smaller page size',
        retryAfterMs: 500,
      });
    });
    const res = await executor.run(materialize(flaky), {}, context());
    expect(res.success).toBe(false);
    expect(res.output).toEqual({
      error: {
        message: 'Service busy',
        developerMessage: 'upstream 503',
        canRetry: true,
        additionalPromptContent: 'Try a smaller page size',
        retryAfterMs: 500,
      },
    });
  });

  it('keeps ToolExecutionError non-retryable', async () => {
    const res = await executor.run(materialize(divide), { a: 1, b: 0 }, context());
    expect(res.output).toEqual({ error: { message: 'Cannot divide by zero', developerMessage: undefined, canRetry: false } });
  });

  it('wraps unclassified errors as non-retryable execution errors', async () => {
    const boom = tool({ description: 'Explodes', params: {} }, async function boom() {
      throw new TypeError('kaboom');
    });
    const res = await executor.run(materialize(boom), {}, context());
    expect(res.success).toBe(false);
    expect(res.output).toEqual({
      error: { message: "Error in execution of 'Tools.Boom'", developerMessage: 'TypeError: kaboom', canRetry: false },
    });
  });

  it('wraps thrown non-errors too', async () => {
    const odd = tool({ description: 'Throws a string', params: {} }, function odd() {
      throw 'plain text';
    });
    const res = await executor.run(materialize(odd), {}, context());
    expect(res.output).toMatchObject({ error: { developerMessage: 'plain text', canRetry: false } });
  });

  it('fails output that does not match the declared return', async () => {
    const half = tool(
      { description: 'Halves', params: { n: z.number().int().describe('N') }, returns: z.number().int() },
      function half({ n }) {
        return n / 2;
      }
    );
    const res = await executor.run(materialize(half), { n: 3 }, context());
    expect(res.output).toMatchObject({
      error: { message: 'Tool Tools.Half returned a value that does not match its output', canRetry: false },
    });
  });

  it('fails a missing value unless null mode is declared', async () => {
    // preprocess widens the declared input, so the callable may hand back undefined
    const empty = tool({ description: 'Nothing', params: {}, returns: z.preprocess(v => v, z.string()) }, function empty() {
      return undefined;
    });
    const maybe = tool({ description: 'Maybe', params: {}, returns: returns(z.string().optional()) }, function maybe() {
      return undefined;
    });
    expect((await executor.run(materialize(empty), {}, context())).output).toMatchObject({
      error: { message: 'Tool Tools.Empty returned no value' },
    });
    expect((await executor.run(materialize(maybe), {}, context())).output).toEqual({ value: null });
  });

  it('returns null for tools without output', async () => {
    const noop = tool({ description: 'Does nothing', params: {} }, function noop() {});
    expect((await executor.run(materialize(noop), {}, context())).output).toEqual({ value: null });
  });

  it('hands secrets to the tool through the context', async () => {
    const expected = crypto.createHmac('sha256', 'test-secret').update('payload').digest('hex');
    const res = await executor.run(materialize(signText), { text: 'payload', secret_name: 'signing_key' }, context({ signing_key: 'test-secret' }));
    expect(res.output).toEqual({ value: expected });

    const missing = await executor.run(materialize(signText), { text: 'payload', secret_name: 'signing_key' }, context());
    expect(missing.output).toMatchObject({
      error: { developerMessage: 'Error: Secret signing_key not found in context.', canRetry: false },
    });
  });

  it('runs concurrent invocations independently', async () => {
    const materialized = materialize(add);
    const results = await Promise.all([1, 2, 3].map(n => executor.run(materialized, { a: n, b: n }, context())));
    expect(results.map(r => r.output)).toEqual([{ value: 2 }, { value: 4 }, { value: 6 }]);
  });
});

describe('coerceWireValue', () => {
  it('lifts wire text to the declared type', () => {
    expect(coerceWireValue('12', 'integer')).toBe(12);
    expect(coerceWireValue('1.5e2', 'float')).toBe(150);
    expect(coerceWireValue('TRUE', 'boolean')).toBe(true);
    expect(coerceWireValue('{"a":1}', 'json')).toEqual({ a: 1 });
    expect(coerceWireValue('abc', 'integer')).toBe('abc');
    expect(coerceWireValue('42', 'string')).toBe('42');
  });
});

describe('ToolContext', () => {
  it('exposes the token and secrets', () => {
    const ctx = new ToolContext({ invocationId: 'x', authorization: { token: 'test-token' }, secrets: { k: 'v' } });
    expect(ctx.getAuthTokenOrEmpty()).toBe('test-token');
    expect(ctx.getSecret('k')).toBe('v');
    expect(ctx.hasSecret('missing')).toBe(false);
    expect(new ToolContext({ invocationId: 'y' }).getAuthTokenOrEmpty()).toBe('');
  });

  it('only finds secrets that were passed in', () => {
    const ctx = new ToolContext({ invocationId: 'x' });
    expect(ctx.hasSecret('constructor')).toBe(false);
    expect(() => ctx.getSecret('toString')).toThrow('Secret toString not found in context.');
  });
});

describe('ToolExecutionError', () => {
  it('is not retryable by default', () => {
    expect(new ToolExecutionError('nope').canRetry).toBe(false);
  });
});
