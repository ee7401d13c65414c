import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { WorkerConfigError, loadWorkerConfig } from '../../src/config/WorkerConfig';

let dir: string;

function write(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

describe('loadWorkerConfig', () => {
  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolhost-config-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads YAML and fills defaults', () => {
    const file = write('worker.yaml', 'port: 9100\nbasePath: /tools-worker\ntoolkits: [math]\n');
    expect(loadWorkerConfig(file, {})).toEqual({
      host: '127.0.0.1',
      port: 9100,
      basePath: '/tools-worker',
      disableAuth: false,
      catalogRequiresAuth: true,
      toolkits: ['math'],
      toolDirs: [],
    });
  });

  it('reads JSON', () => {
    const file = write('worker.json', JSON.stringify({ catalogRequiresAuth: false }));
    expect(loadWorkerConfig(file, {}).catalogRequiresAuth).toBe(false);
  });

  it('lets the environment override the file', () => {
    const file = write('override.yaml', 'port: 9100\nhost: 0.0.0.0\n');
    const config = loadWorkerConfig(file, {
      PORT: '9200',
      TOOLHOST_HOST: '127.0.0.1',
      TOOLHOST_WORKER_SECRET: 'test-secret',
      TOOLHOST_DISABLE_AUTH: 'true',
      TOOLHOST_BASE_PATH: '/w',
    });
    expect(config).toMatchObject({ port: 9200, host: '127.0.0.1', secret: 'test-secret', disableAuth: true, basePath: '/w' });
  });

  it('reads the catalog flag and tool directories from the environment', () => {
    const file = write('flags.yaml', 'catalogRequiresAuth: true\ntoolDirs: [/srv/tools]\n');
    const config = loadWorkerConfig(file, {
      TOOLHOST_CATALOG_REQUIRES_AUTH: 'false',
      TOOLHOST_TOOL_DIRS: ['/opt/a', '/opt/b'].join(path.delimiter),
    });
    expect(config.catalogRequiresAuth).toBe(false);
    expect(config.toolDirs).toEqual(['/opt/a', '/opt/b']);
    expect(loadWorkerConfig(file, {}).toolDirs).toEqual(['/srv/tools']);
  });

  it('rejects unknown keys and bad values', () => {
    const unknownKey = write('unknown.yaml', 'colour: blue\n');
    expect(() => loadWorkerConfig(unknownKey, {})).toThrow(WorkerConfigError);
    const badPort = write('bad-port.yaml', 'port: 70000\n');
    expect(() => loadWorkerConfig(badPort, {})).toThrow('port: Number must be less than or equal to 65535');
  });

  it('rejects a file that is not a mapping', () => {
    const list = write('list.yaml', '- a\n- b\n');
    expect(() => loadWorkerConfig(list, {})).toThrow(`${list} must contain a mapping`);
  });

  it('reports unparsable files', () => {
    const broken = write('broken.json', '{ nope');
    expect(() => loadWorkerConfig(broken, {})).toThrow(`Could not parse ${broken}`);
  });
});
