// Scanner types
export type {
  Protocol,
  PortState,
  UdpPortState,
  ScanTarget,
  PortResult,
  TargetScanResult,
  ScanReport,
  ScriptResult,
  PermitPoolStats,
} from './scanner.js';

// Probe database types
export type {
  ProbeProtocol,
  VersionField,
  MatchEntry,
  ProbeEntry,
  ProbeDatabase,
  ServiceInfo,
} from './probe.js';
