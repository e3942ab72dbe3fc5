import fs from 'fs/promises';
import { ZodError } from 'zod';
import { ConfigError } from '../errors.js';
import { errorMessage } from '../utils/errors.js';
import { ConfigFileSchema, ScannerConfigSchema, type ScannerConfig, type ScannerConfigInput } from '../schemas/config.js';

export interface LoadConfigOptions {
  configFile?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  overrides?: Partial<ScannerConfigInput> | undefined;
}

// Environment variable -> config key
const ENV_KEYS = {
  PORTLENS_PORTS: 'ports',
  PORTLENS_TCP: 'tcp',
  PORTLENS_UDP: 'udp',
  PORTLENS_TIMEOUT: 'timeoutMs',
  PORTLENS_SERVICE_DETECTION: 'serviceDetection',
  PORTLENS_SERVICE_TIMEOUT: 'serviceTimeoutMs',
  PORTLENS_CONCURRENCY: 'concurrency',
  PORTLENS_PROBES_FILE: 'probesFile',
  PORTLENS_JSON: 'jsonOutput',
  PORTLENS_SCRIPT: 'script',
  PORTLENS_SCRIPTS_DIR: 'scriptsDir',
  LOG_LEVEL: 'logLevel',
} as const satisfies Record<string, keyof ScannerConfigInput>;

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

async function readConfigFile(configFile: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configFile, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configFile}`, [errorMessage(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${configFile} is not valid JSON`, [errorMessage(error)]);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${configFile}`, formatIssues(result.error));
  }
  // Keep only keys the file actually set so defaults do not mask env values
  return Object.fromEntries(Object.entries(result.data).filter(([, value]) => value !== undefined));
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }

  const targets = env['PORTLENS_TARGETS'];
  if (targets) {
    values['targets'] = targets
      .split(',')
      .map((target) => target.trim())
      .filter((target) => target.length > 0);
  }

  return values;
}

/**
 * Build the scanner configuration. Sources are layered as defaults, then the
 * JSON config file, then environment variables, then explicit overrides.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ScannerConfig> {
  const fromFile = options.configFile ? await readConfigFile(options.configFile) : {};
  const fromEnv = readEnv(options.env ?? process.env);
  const overrides = options.overrides ?? {};

  const merged: Record<string, unknown> = { ...fromFile, ...fromEnv, ...overrides };
  if (merged['ports'] !== undefined && overrides.portsExplicitlySpecified === undefined) {
    merged['portsExplicitlySpecified'] = true;
  }

  const result = ScannerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('Invalid scanner configuration', formatIssues(result.error));
  }
  return result.data;
}
