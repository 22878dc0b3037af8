import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { ConfigValidationError, loadConfig, substituteEnvVarsRecursive, validateConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('config loader', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = join(tmpdir(), `spectrum-config-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  afterEach(() => {
    delete process.env.SPECTRUM_TEST_HOST;
  });

  it('returns the defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: join(testDir, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('returns the defaults for an empty file', async () => {
    const path = join(testDir, 'empty.yaml');
    await writeFile(path, '');
    expect(await loadConfig({ configPath: path })).toEqual(DEFAULT_CONFIG);
  });

  it('merges the file over the defaults and substitutes variables', async () => {
    process.env.SPECTRUM_TEST_HOST = '127.0.0.1';
    const path = join(testDir, 'config.yaml');
    await writeFile(
      path,
      [
        'server:',
        '  port: ${SPECTRUM_TEST_PORT:-4100}',
        '  host: ${SPECTRUM_TEST_HOST}',
        '  cors:',
        '    enabled: false',
        'import:',
        '  directory: exports',
        '',
      ].join('\n'),
    );

    const config = await loadConfig({ configPath: path });
    expect(config.server).toEqual({
      port: 4100,
      host: '127.0.0.1',
      logLevel: 'info',
      cors: { enabled: false, origins: ['*'] },
    });
    expect(config.import).toEqual({ directory: 'exports', pattern: '*.txt', recursive: false });
  });

  it('rejects an out-of-range port', async () => {
    const path = join(testDir, 'bad-port.yaml');
    await writeFile(path, 'server:\n  port: 70000\n');
    await expect(loadConfig({ configPath: path })).rejects.toThrow(ConfigValidationError);
  });

  it('names the offending key', () => {
    expect(() => validateConfig({ server: { logLevel: 'verbose' } })).toThrow(
      "Config validation error at 'server.logLevel': logLevel must be one of: debug, info, warn, error",
    );
    expect(() => validateConfig({ import: { recursive: 'yes' } })).toThrow(
      "Config validation error at 'import.recursive': recursive must be a boolean",
    );
  });

  it('substitutes variables inside nested values', () => {
    process.env.SPECTRUM_TEST_HOST = 'lab-pc';
    expect(substituteEnvVarsRecursive({ a: ['${SPECTRUM_TEST_HOST}', 1], b: '${SPECTRUM_TEST_UNSET:-x}' })).toEqual({
      a: ['lab-pc', 1],
      b: 'x',
    });
  });
});
