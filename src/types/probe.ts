// Probe database types

export type ProbeProtocol = 'TCP' | 'UDP';

export type VersionField = 'p' | 'v' | 'i' | 'h' | 'o' | 'd' | 'cpe';

export interface MatchEntry {
  service: string;
  pattern: string;
  flags: string;
  regex: RegExp | null;
  versionInfo: Partial<Record<VersionField, string>>;
}

export interface ProbeEntry {
  protocol: ProbeProtocol;
  name: string;
  payload: Buffer;
  // Recorded only; service detection always sends `payload`
  noPayload: boolean;
  matches: MatchEntry[];
  softMatches: MatchEntry[];
  ports: string[];
  sslPorts: string[];
  totalWaitMs?: number | undefined;
  tcpWrappedMs?: number | undefined;
  rarity?: number | undefined;
  fallback?: string | undefined;
}

export interface ProbeDatabase {
  excludes: string[];
  probes: ProbeEntry[];
}

export interface ServiceInfo {
  service: string;
  version?: string | undefined;
  product?: string | undefined;
  extraInfo?: string | undefined;
  hostname?: string | undefined;
  osInfo?: string | undefined;
  deviceType?: string | undefined;
  cpe?: string | undefined;
  confidence: number;
}
