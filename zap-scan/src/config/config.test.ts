import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { deriveControlApiBase, loadConfig, parseConfigFile } from './config.js';

describe('deriveControlApiBase', () => {
  it('should swap the target port for the engine port', () => {
    expect(deriveControlApiBase('http://localhost:3000', 8080)).toBe('http://localhost:8080');
  });

  it('should drop the path and add a port when the target has none', () => {
    expect(deriveControlApiBase('https://staging.example.test/app/', 8090)).toBe('https://staging.example.test:8090');
  });
});

describe('parseConfigFile', () => {
  it('should ignore fields with the wrong type', () => {
    const parsed = parseConfigFile({ engine: { port: '9090', command: 'zap' }, debug: 'yes' });

    expect(parsed.engine).toEqual({
      command: 'zap',
      port: undefined,
      extraArgs: undefined,
      stopGraceMs: undefined,
      requestTimeoutMs: undefined,
    });
    expect(parsed.debug).toBeUndefined();
  });

  it('should reject a non-object root', () => {
    expect(() => parseConfigFile([1, 2])).toThrow('Configuration root must be a JSON object');
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'zap-scan-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should apply documented defaults', async () => {
    const config = await loadConfig({ targetUrl: 'http://localhost:3000' }, []);

    expect(config.controlApiBase).toBe('http://localhost:8080');
    expect(config.engine.port).toBe(8080);
    expect(config.readiness).toEqual({ intervalMs: 2000, timeoutMs: 60000 });
    expect(config.discovery).toEqual({ maxChildren: 100, recurse: true, intervalMs: 2000 });
    expect(config.probing).toEqual({ recurse: true, inScopeOnly: false, intervalMs: 5000 });
    expect(config.report.resultsDir).toBe('security/results');
    expect(config.scope.contextName).toBe('Default Context');
  });

  it('should use an explicit control API URL', async () => {
    const config = await loadConfig(
      { targetUrl: 'http://localhost:3000', controlApiBase: 'http://zap.internal:8090' },
      []
    );

    expect(config.controlApiBase).toBe('http://zap.internal:8090');
  });

  it('should merge config files with later files taking precedence', async () => {
    const first = path.join(tempDir, 'first.json');
    const second = path.join(tempDir, 'second.json');
    await fs.writeFile(first, JSON.stringify({ engine: { port: 8090 }, probing: { intervalMs: 3000 } }));
    await fs.writeFile(second, JSON.stringify({ engine: { command: '/opt/zap/zap.sh' } }));

    const config = await loadConfig({ targetUrl: 'http://localhost:3000' }, [first, second]);

    expect(config.engine).toEqual({
      command: '/opt/zap/zap.sh',
      port: 8090,
      extraArgs: [],
      stopGraceMs: 10000,
      requestTimeoutMs: 30000,
    });
    expect(config.probing.intervalMs).toBe(3000);
    expect(config.controlApiBase).toBe('http://localhost:8090');
  });

  it('should let command-line values override files', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ report: { resultsDir: 'from-file' }, engine: { port: 8090 } }));

    const config = await loadConfig(
      {
        targetUrl: 'http://localhost:3000',
        configPath,
        resultsDir: 'from-cli',
        port: 9000,
        discoveryTimeoutMs: 120000,
        probingTimeoutMs: 600000,
      },
      []
    );

    expect(config.report.resultsDir).toBe('from-cli');
    expect(config.engine.port).toBe(9000);
    expect(config.discovery.timeoutMs).toBe(120000);
    expect(config.probing.timeoutMs).toBe(600000);
  });

  it('should skip a missing search-path file', async () => {
    const config = await loadConfig({ targetUrl: 'http://localhost:3000' }, [path.join(tempDir, 'missing.json')]);

    expect(config.engine.port).toBe(8080);
  });

  it('should throw for a missing explicit config file', async () => {
    const configPath = path.join(tempDir, 'nonexistent.json');

    await expect(loadConfig({ targetUrl: 'http://localhost:3000', configPath }, [])).rejects.toThrow(
      `Config file not found or invalid: ${configPath}`
    );
  });

  it('should throw for an explicit config file with invalid JSON', async () => {
    const configPath = path.join(tempDir, 'invalid.json');
    await fs.writeFile(configPath, 'invalid json{{{');

    await expect(loadConfig({ targetUrl: 'http://localhost:3000', configPath }, [])).rejects.toThrow(
      'Config file not found or invalid'
    );
  });

  it('should reject a target that is not an http URL', async () => {
    await expect(loadConfig({ targetUrl: 'localhost:3000' }, [])).rejects.toThrow(
      'Configuration error: target URL must use http or https: localhost:3000'
    );
    await expect(loadConfig({ targetUrl: 'not a url' }, [])).rejects.toThrow(
      'Configuration error: target URL is not a valid URL: not a url'
    );
  });

  it('should reject non-positive intervals', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ discovery: { intervalMs: 0 } }));

    await expect(loadConfig({ targetUrl: 'http://localhost:3000', configPath }, [])).rejects.toThrow(
      'Configuration error: discovery interval must be greater than 0'
    );
  });

  it('should read and validate the per-request timeout', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ engine: { requestTimeoutMs: 1500 } }));

    const config = await loadConfig({ targetUrl: 'http://localhost:3000', configPath }, []);
    expect(config.engine.requestTimeoutMs).toBe(1500);

    await fs.writeFile(configPath, JSON.stringify({ engine: { requestTimeoutMs: -1 } }));
    await expect(loadConfig({ targetUrl: 'http://localhost:3000', configPath }, [])).rejects.toThrow(
      'Configuration error: engine request timeout must be greater than 0'
    );
  });

  it('should reject an alert page size below 1', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ report: { alertPageSize: 0 } }));

    await expect(loadConfig({ targetUrl: 'http://localhost:3000', configPath }, [])).rejects.toThrow(
      'Configuration error: alertPageSize must be at least 1'
    );
  });
});
