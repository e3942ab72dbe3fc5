import fs from 'fs/promises';
import { getWellKnownService } from '../scanner/well-known-services.js';
import type { PortResult, PortState, Protocol, ScriptResult, TargetScanResult } from '../types/scanner.js';
import type { ServiceInfo } from '../types/probe.js';

export interface TableOptions {
  protocol: Protocol;
  // false hides everything but open ports
  showAll: boolean;
}

export interface JsonPortEntry {
  state: PortState;
  service?: ServiceInfo | undefined;
  banner?: string | undefined;
}

export interface JsonTargetReport {
  host: string;
  label: string;
  protocol: Protocol;
  ports: Record<string, JsonPortEntry>;
}

function serviceColumn(result: PortResult): string {
  return result.service?.service ?? getWellKnownService(result.port) ?? 'unknown';
}

function formatRows(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, index) => cell.padEnd(widths[index] ?? 0))
      .join('  ')
      .trimEnd()
  );
}

export function summarize(results: PortResult[]): Record<PortState, number> {
  const counts: Record<PortState, number> = { open: 0, closed: 0, filtered: 0 };
  for (const result of results) {
    counts[result.state]++;
  }
  return counts;
}

export function formatPortTable(results: PortResult[], options: TableOptions): string {
  const label = options.protocol.toUpperCase();
  const visible = results
    .filter((result) => options.showAll || result.state === 'open')
    .sort((a, b) => a.port - b.port);

  const lines = [`${label} Scan Results:`];
  if (visible.length === 0) {
    lines.push(options.showAll ? `No ports found for ${label} scan` : `No open ports found for ${label} scan`);
  } else {
    const rows = visible.map((result) => [`${result.port}/${result.protocol}`, result.state, serviceColumn(result)]);
    lines.push(...formatRows([['PORT', 'STATE', 'SERVICE'], ...rows]));
  }

  const counts = summarize(results);
  lines.push(`Summary: ${counts.open} open, ${counts.closed} closed, ${counts.filtered} filtered`);
  return lines.join('\n');
}

export function formatServiceDetails(results: PortResult[]): string {
  const lines: string[] = [];

  for (const result of results) {
    const { service, banner } = result;
    if (service) {
      lines.push(`Port ${result.port}: ${service.service} (confidence ${service.confidence})`);
      const details: Array<[string, string | undefined]> = [
        ['Version', service.version],
        ['Product', service.product],
        ['Extra Info', service.extraInfo],
        ['Hostname', service.hostname],
        ['OS', service.osInfo],
        ['Device Type', service.deviceType],
        ['CPE', service.cpe],
      ];
      for (const [name, value] of details) {
        if (value) lines.push(`  ${name}: ${value}`);
      }
    } else if (banner) {
      lines.push(`Port ${result.port}: banner ${JSON.stringify(banner)}`);
    }
  }

  return lines.join('\n');
}

export function formatScriptResult(result: ScriptResult): string {
  if (!result.success) {
    return `Script failed: ${result.error ?? 'unknown error'}`;
  }

  const lines: string[] = [];
  if (result.output) {
    lines.push(`Output: ${result.output}`);
  }
  const entries = Object.entries(result.data);
  if (entries.length > 0) {
    lines.push('Data:');
    for (const [key, value] of entries) {
      lines.push(`  ${key}: ${value}`);
    }
  }
  return lines.length > 0 ? lines.join('\n') : 'Script executed successfully (no output)';
}

export function toJsonReport(result: TargetScanResult): JsonTargetReport {
  const ports: Record<string, JsonPortEntry> = {};
  for (const port of result.ports) {
    const entry: JsonPortEntry = { state: port.state };
    if (port.service) entry.service = port.service;
    if (port.banner) entry.banner = port.banner;
    ports[String(port.port)] = entry;
  }
  return {
    host: result.target.address,
    label: result.target.label,
    protocol: result.protocol,
    ports,
  };
}

export async function writeJsonReport(file: string, results: TargetScanResult[]): Promise<void> {
  const report = results.map(toJsonReport);
  await fs.writeFile(file, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
}
