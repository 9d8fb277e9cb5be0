import { describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, loadConfig, maskToken } from '../../src/config';

const secrets = { AUTH_TOKEN: 'test-secret', MY_NUMBER: '910000000000' };

function tempConfig(name: string, content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'text-utils-'));
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

describe('loadConfig', () => {
  it('applies defaults and freezes the result', () => {
    const c = loadConfig({ ...secrets });
    expect(c).toEqual({
      serverName: 'text-utilities-server',
      version: '0.1.0',
      authToken: 'test-secret',
      identifier: '910000000000',
      transport: 'http',
      http: { host: '0.0.0.0', port: 8086 },
      logLevel: 'info',
    });
    expect(Object.isFrozen(c)).toBe(true);
    expect(Object.isFrozen(c.http)).toBe(true);
  });

  it('requires the token and identifier', () => {
    expect(() => loadConfig({ AUTH_TOKEN: 'test-secret' })).toThrow(ConfigError);
    expect(() => loadConfig({ MY_NUMBER: '910000000000' })).toThrow(ConfigError);
    expect(() => loadConfig({ AUTH_TOKEN: '', MY_NUMBER: '910000000000' })).toThrow(ConfigError);
  });

  it('reads environment overrides', () => {
    const c = loadConfig({ ...secrets, PORT: '9000', HOST: '127.0.0.1', TRANSPORT: 'STDIO', LOG_LEVEL: 'debug' });
    expect(c.http).toEqual({ host: '127.0.0.1', port: 9000 });
    expect(c.transport).toBe('stdio');
    expect(c.logLevel).toBe('debug');
  });

  it('lets the command-line transport win over the environment', () => {
    expect(loadConfig({ ...secrets, TRANSPORT: 'stdio' }, { transport: 'http' }).transport).toBe('http');
  });

  it('rejects unknown transports and bad ports', () => {
    expect(() => loadConfig({ ...secrets }, { transport: 'carrier-pigeon' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...secrets, PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...secrets, PORT: '70000' })).toThrow(ConfigError);
  });

  it('loads non-secret settings from a YAML file, environment first', () => {
    const file = tempConfig('server.yaml', 'serverName: custom-tools\ntransport: stdio\nhttp:\n  host: 127.0.0.1\n  port: 9100\nlogLevel: warn\n');
    const c = loadConfig({ ...secrets, PORT: '9200' }, { configPath: file });
    expect(c.serverName).toBe('custom-tools');
    expect(c.transport).toBe('stdio');
    expect(c.http).toEqual({ host: '127.0.0.1', port: 9200 });
    expect(c.logLevel).toBe('warn');
  });

  it('treats an empty PORT as unset so the file port applies', () => {
    const file = tempConfig('server.yaml', 'http:\n  port: 9100\n');
    expect(loadConfig({ ...secrets, PORT: '' }, { configPath: file }).http.port).toBe(9100);
  });

  it('finds the file through TEXT_UTILS_CONFIG and accepts JSON', () => {
    const file = tempConfig('server.json', JSON.stringify({ serverName: 'json-tools' }));
    expect(loadConfig({ ...secrets, TEXT_UTILS_CONFIG: file }).serverName).toBe('json-tools');
  });

  it('fails on a missing explicit file or a malformed one', () => {
    expect(() => loadConfig({ ...secrets }, { configPath: path.join(os.tmpdir(), 'does-not-exist.yaml') })).toThrow(ConfigError);
    const bad = tempConfig('bad.yaml', '- just\n- a list\n');
    expect(() => loadConfig({ ...secrets }, { configPath: bad })).toThrow('expected a mapping at the top level');
  });
});

describe('maskToken', () => {
  it('keeps only a short prefix', () => {
    expect(maskToken('test-secret')).toBe('test...');
    expect(maskToken('ab')).toBe('a...');
  });
});
