import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ModuleScriptRunner } from '../../src/scripting/script-runner.js';

const SCRIPTS: Record<string, string> = {
  'report.mjs': `export default function ({ host, port, log }) {
  log('checked ' + host);
  return { output: 'port ' + port, data: { host } };
}
`,
  'quiet.mjs': 'export default async () => undefined;\n',
  'explode.mjs': "export default () => { throw new Error('boom'); };\n",
  'no-default.mjs': 'export const answer = 42;\n',
  'bad-result.mjs': 'export default () => ({ data: { count: 3 } });\n',
  'plain.js': "export default () => ({ output: 'from js' });\n",
  'package.json': '{ "type": "module" }\n',
};

describe('ModuleScriptRunner', () => {
  let scriptsDir: string;
  let runner: ModuleScriptRunner;

  beforeAll(async () => {
    scriptsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'portlens-scripts-'));
    for (const [name, source] of Object.entries(SCRIPTS)) {
      await fs.writeFile(path.join(scriptsDir, name), source, 'utf8');
    }
    runner = new ModuleScriptRunner(scriptsDir);
  });

  afterAll(async () => {
    await fs.rm(scriptsDir, { recursive: true, force: true });
  });

  it('collects logged lines, output and data', async () => {
    const result = await runner.run('report', '10.0.0.1', 22);

    expect(result).toEqual({
      scriptName: 'report',
      host: '10.0.0.1',
      port: 22,
      success: true,
      output: 'checked 10.0.0.1\nport 22',
      data: { host: '10.0.0.1' },
    });
  });

  it('accepts scripts that return nothing', async () => {
    const result = await runner.run('quiet', '10.0.0.1');

    expect(result.success).toBe(true);
    expect(result.output).toBe('');
    expect(result.data).toEqual({});
  });

  it('falls back to .js scripts', async () => {
    expect(await runner.findScript('plain')).toBe(path.join(scriptsDir, 'plain.js'));
    expect((await runner.run('plain', '10.0.0.1')).output).toBe('from js');
  });

  it('reports a script that throws', async () => {
    const result = await runner.run('explode', '10.0.0.1', 80);

    expect(result.success).toBe(false);
    expect(result.error).toBe('boom');
    expect(result.output).toBe('');
  });

  it('rejects modules without a default export function', async () => {
    const result = await runner.run('no-default', '10.0.0.1');

    expect(result.success).toBe(false);
    expect(result.error).toContain('default');
  });

  it('rejects results of the wrong shape', async () => {
    const result = await runner.run('bad-result', '10.0.0.1');

    expect(result.success).toBe(false);
    expect(result.error).toContain('count');
  });

  it('reports a missing script', async () => {
    const result = await runner.run('nope', '10.0.0.1');

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Script file not found: ${path.join(scriptsDir, 'nope.mjs')}`);
  });
});
