import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfig } from '../../src/config/config.js';
import { ConfigError } from '../../src/errors.js';

describe('loadConfig', () => {
  let dir: string;

  const writeConfig = async (name: string, content: string): Promise<string> => {
    const file = path.join(dir, name);
    await fs.writeFile(file, content, 'utf8');
    return file;
  };

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'portlens-config-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('applies defaults', async () => {
    const config = await loadConfig({ env: {} });

    expect(config).toMatchObject({
      targets: [],
      ports: '1-1024',
      tcp: true,
      udp: false,
      timeoutMs: 2000,
      serviceDetection: false,
      serviceTimeoutMs: 5000,
      probesFile: 'probes/service-probes',
      scriptsDir: 'scripts',
      logLevel: 'info',
      portsExplicitlySpecified: false,
    });
    expect(config.concurrency).toBeGreaterThanOrEqual(1);
    expect(config.jsonOutput).toBeUndefined();
    expect(config.script).toBeUndefined();
  });

  it('reads environment variables', async () => {
    const config = await loadConfig({
      env: {
        PORTLENS_TARGETS: 'a.test, 10.0.0.1,',
        PORTLENS_PORTS: '22,80',
        PORTLENS_UDP: '1',
        PORTLENS_TCP: 'false',
        PORTLENS_TIMEOUT: '500',
        PORTLENS_SERVICE_DETECTION: 'true',
        LOG_LEVEL: 'debug',
      },
    });

    expect(config).toMatchObject({
      targets: ['a.test', '10.0.0.1'],
      ports: '22,80',
      udp: true,
      tcp: false,
      timeoutMs: 500,
      serviceDetection: true,
      logLevel: 'debug',
      portsExplicitlySpecified: true,
    });
  });

  it('layers file, environment and overrides', async () => {
    const configFile = await writeConfig(
      'layered.json',
      JSON.stringify({ ports: '443', concurrency: 8, serviceDetection: true, script: 'banner' })
    );

    const config = await loadConfig({
      configFile,
      env: { PORTLENS_CONCURRENCY: '4' },
      overrides: { targets: ['box.test'], script: 'other' },
    });

    expect(config).toMatchObject({
      targets: ['box.test'],
      ports: '443',
      concurrency: 4,
      serviceDetection: true,
      script: 'other',
      portsExplicitlySpecified: true,
    });
  });

  it('lets overrides replace environment values', async () => {
    const config = await loadConfig({ env: { PORTLENS_PORTS: '22' }, overrides: { ports: '80' } });
    expect(config.ports).toBe('80');
  });

  it('honours an explicit portsExplicitlySpecified override', async () => {
    const config = await loadConfig({ env: {}, overrides: { ports: '80', portsExplicitlySpecified: false } });
    expect(config.portsExplicitlySpecified).toBe(false);
  });

  it('ignores empty environment values', async () => {
    const config = await loadConfig({ env: { PORTLENS_PORTS: '' } });
    expect(config.ports).toBe('1-1024');
    expect(config.portsExplicitlySpecified).toBe(false);
  });

  it('rejects invalid environment values', async () => {
    const error = await loadConfig({ env: { PORTLENS_TIMEOUT: 'soon' } }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: [expect.stringMatching(/^timeoutMs: /)] });
  });

  it('rejects unknown boolean spellings', async () => {
    await expect(loadConfig({ env: { PORTLENS_UDP: 'yes' } })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a config file that is not JSON', async () => {
    const configFile = await writeConfig('broken.json', '{ ports: ');

    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`Config file ${configFile} is not valid JSON`);
  });

  it('rejects a config file with invalid values', async () => {
    const configFile = await writeConfig('invalid.json', JSON.stringify({ timeoutMs: -1 }));

    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`Invalid config file ${configFile}: timeoutMs:`);
  });

  it('rejects a missing config file', async () => {
    const configFile = path.join(dir, 'missing.json');

    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`Cannot read config file ${configFile}`);
  });
});
