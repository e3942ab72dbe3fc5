import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  formatPortTable,
  formatScriptResult,
  formatServiceDetails,
  summarize,
  writeJsonReport,
} from '../../src/output/renderer.js';
import type { PortResult, ScriptResult, TargetScanResult } from '../../src/types/scanner.js';

const PORTS: PortResult[] = [
  { port: 80, protocol: 'tcp', state: 'open', service: { service: 'http', product: 'nginx', confidence: 90 } },
  { port: 23, protocol: 'tcp', state: 'closed' },
  { port: 22, protocol: 'tcp', state: 'open' },
  { port: 49999, protocol: 'tcp', state: 'filtered' },
];

describe('summarize', () => {
  it('counts ports by state', () => {
    expect(summarize(PORTS)).toEqual({ open: 2, closed: 1, filtered: 1 });
  });
});

describe('formatPortTable', () => {
  it('lists every port sorted when showing all', () => {
    expect(formatPortTable(PORTS, { protocol: 'tcp', showAll: true }).split('\n')).toEqual([
      'TCP Scan Results:',
      'PORT       STATE     SERVICE',
      '22/tcp     open      ssh',
      '23/tcp     closed    telnet',
      '80/tcp     open      http',
      '49999/tcp  filtered  unknown',
      'Summary: 2 open, 1 closed, 1 filtered',
    ]);
  });

  it('lists only open ports otherwise', () => {
    expect(formatPortTable(PORTS, { protocol: 'tcp', showAll: false }).split('\n')).toEqual([
      'TCP Scan Results:',
      'PORT    STATE  SERVICE',
      '22/tcp  open   ssh',
      '80/tcp  open   http',
      'Summary: 2 open, 1 closed, 1 filtered',
    ]);
  });

  it('says so when there is nothing to list', () => {
    const closed: PortResult[] = [{ port: 53, protocol: 'udp', state: 'closed' }];

    expect(formatPortTable(closed, { protocol: 'udp', showAll: false })).toBe(
      'UDP Scan Results:\nNo open ports found for UDP scan\nSummary: 0 open, 1 closed, 0 filtered'
    );
    expect(formatPortTable([], { protocol: 'udp', showAll: true })).toBe(
      'UDP Scan Results:\nNo ports found for UDP scan\nSummary: 0 open, 0 closed, 0 filtered'
    );
  });
});

describe('formatServiceDetails', () => {
  it('describes detected services and banners', () => {
    const results: PortResult[] = [
      {
        port: 22,
        protocol: 'tcp',
        state: 'open',
        service: { service: 'ssh', product: 'OpenSSH', version: '8.9p1', cpe: 'a:openbsd:openssh:8.9p1', confidence: 90 },
      },
      { port: 21, protocol: 'tcp', state: 'open', banner: '220 ready' },
      { port: 80, protocol: 'tcp', state: 'open' },
    ];

    expect(formatServiceDetails(results).split('\n')).toEqual([
      'Port 22: ssh (confidence 90)',
      '  Version: 8.9p1',
      '  Product: OpenSSH',
      '  CPE: a:openbsd:openssh:8.9p1',
      'Port 21: banner "220 ready"',
    ]);
  });

  it('returns an empty string when nothing was identified', () => {
    expect(formatServiceDetails([{ port: 80, protocol: 'tcp', state: 'open' }])).toBe('');
  });
});

describe('formatScriptResult', () => {
  const base: ScriptResult = { scriptName: 'banner', host: '10.0.0.1', success: true, output: '', data: {} };

  it('prints output and data', () => {
    expect(formatScriptResult({ ...base, output: 'hello', data: { a: '1', b: '2' } })).toBe(
      'Output: hello\nData:\n  a: 1\n  b: 2'
    );
  });

  it('notes a successful run without output', () => {
    expect(formatScriptResult(base)).toBe('Script executed successfully (no output)');
  });

  it('prints the failure', () => {
    expect(formatScriptResult({ ...base, success: false, error: 'boom' })).toBe('Script failed: boom');
  });
});

describe('writeJsonReport', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'portlens-report-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one entry per target and protocol keyed by port', async () => {
    const file = path.join(dir, 'report.json');
    const results: TargetScanResult[] = [
      {
        target: { address: '10.0.0.1', label: 'box.test' },
        protocol: 'tcp',
        ports: [
          { port: 22, protocol: 'tcp', state: 'open', banner: 'SSH-2.0-x' },
          { port: 23, protocol: 'tcp', state: 'closed' },
        ],
        startedAt: new Date(0),
        completedAt: new Date(1000),
      },
    ];

    await writeJsonReport(file, results);
    const content = await fs.readFile(file, 'utf8');

    expect(content.endsWith('}\n]\n')).toBe(true);
    expect(JSON.parse(content)).toEqual([
      {
        host: '10.0.0.1',
        label: 'box.test',
        protocol: 'tcp',
        ports: {
          '22': { state: 'open', banner: 'SSH-2.0-x' },
          '23': { state: 'closed' },
        },
      },
    ]);
  });
});
