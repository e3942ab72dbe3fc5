#!/usr/bin/env node
import fs from 'fs';
import { pathToFileURL } from 'url';
import { Scanner } from './scanner-orchestrator.js';
import { loadConfig } from './config/config.js';
import { createLogger, errorMessage } from './utils/index.js';

export { Scanner, type ScannerDependencies } from './scanner-orchestrator.js';
export { loadConfig, type LoadConfigOptions } from './config/config.js';
export { TcpScanner, type TcpScannerOptions, type TcpScanOptions } from './scanner/tcp-scanner.js';
export { UdpScanner, type UdpScannerOptions, type UdpScanOptions } from './scanner/udp-scanner.js';
export { ServiceDetector, type ServiceDetectorOptions } from './scanner/service-detector.js';
export { PermitPool, type Permit } from './scanner/permit-pool.js';
export { parsePortSpec } from './scanner/port-spec.js';
export { classifyConnectError } from './scanner/port-classifier.js';
export { parseProbeDatabase, loadProbeDatabase } from './probes/parser.js';
export { matchResponse, selectProbes, substituteCaptures } from './probes/matcher.js';
export { decodeEscapes } from './probes/escape.js';
export { DnsResolver, resolveTarget, type Resolver } from './dns/resolver.js';
export { ModuleScriptRunner, type ScriptRunner, type ScriptContext } from './scripting/script-runner.js';
export { ResolutionError, ProbeLoadError, ConfigError } from './errors.js';
export {
  ScannerConfigSchema,
  ScriptOutcomeSchema,
  type ScannerConfig,
  type ScannerConfigInput,
  type ScriptOutcome,
} from './schemas/index.js';
export { createLogger, createScannerLogger, type LoggerOptions } from './utils/index.js';
export type * from './types/index.js';

async function main(): Promise<void> {
  const logger = createLogger({ name: 'portlens' });
  const targets = process.argv.slice(2);

  try {
    const config = await loadConfig({
      configFile: process.env['PORTLENS_CONFIG'],
      overrides: targets.length > 0 ? { targets } : {},
    });

    console.log('🔍 portlens port scanner');
    console.log(`   Targets: ${config.targets.join(', ') || '(none)'}`);
    console.log(`   Ports: ${config.ports} | TCP: ${config.tcp} | UDP: ${config.udp}`);
    console.log(`   Timeout: ${config.timeoutMs}ms | Concurrency: ${config.concurrency}`);

    const scanner = new Scanner(config);
    await scanner.run();
  } catch (error) {
    logger.error('Scan aborted', { error: errorMessage(error) });
    process.exitCode = 1;
  }
}

// Run if this is the main module
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
if (isMainModule) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
