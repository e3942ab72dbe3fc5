export class ResolutionError extends Error {
  readonly host: string;

  constructor(host: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`No IP addresses found for host: ${host}${detail}`);
    this.name = 'ResolutionError';
    this.host = host;
  }
}

export class ProbeLoadError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : 'Unknown error';
    super(`Failed to load probe database from ${path}: ${detail}`);
    this.name = 'ProbeLoadError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
