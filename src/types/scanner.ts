// Port scanner types

import type { ServiceInfo } from './probe.js';

export type Protocol = 'tcp' | 'udp';

export type PortState = 'open' | 'closed' | 'filtered';

export type UdpPortState = Extract<PortState, 'open' | 'closed'>;

export interface ScanTarget {
  address: string;
  label: string;
}

export interface PortResult {
  port: number;
  protocol: Protocol;
  state: PortState;
  service?: ServiceInfo | undefined;
  banner?: string | undefined;
}

export interface TargetScanResult {
  target: ScanTarget;
  protocol: Protocol;
  ports: PortResult[];
  startedAt: Date;
  completedAt: Date;
}

export interface ScanReport {
  results: TargetScanResult[];
  scripts: ScriptResult[];
}

export interface ScriptResult {
  scriptName: string;
  host: string;
  port?: number | undefined;
  success: boolean;
  output: string;
  error?: string | undefined;
  data: Record<string, string>;
}

export interface PermitPoolStats {
  capacity: number;
  inUse: number;
  peakInUse: number;
  acquired: number;
  released: number;
}
