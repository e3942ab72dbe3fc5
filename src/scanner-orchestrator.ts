import type { Logger } from 'winston';
import { TcpScanner } from './scanner/tcp-scanner.js';
import { UdpScanner } from './scanner/udp-scanner.js';
import { PermitPool } from './scanner/permit-pool.js';
import { parsePortSpec } from './scanner/port-spec.js';
import { loadProbeDatabase } from './probes/parser.js';
import { DnsResolver, resolveTarget, type Resolver } from './dns/resolver.js';
import { ModuleScriptRunner, type ScriptRunner } from './scripting/script-runner.js';
import { formatPortTable, formatScriptResult, formatServiceDetails, writeJsonReport } from './output/renderer.js';
import { ProbeLoadError } from './errors.js';
import { createLogger, createScannerLogger } from './utils/logger.js';
import type { ScannerConfig } from './schemas/config.js';
import type { ProbeDatabase } from './types/probe.js';
import type { PortResult, ScanReport, ScanTarget, ScriptResult, TargetScanResult } from './types/scanner.js';

export interface ScannerDependencies {
  resolver?: Resolver | undefined;
  scriptRunner?: ScriptRunner | undefined;
  tcpScanner?: TcpScanner | undefined;
  udpScanner?: UdpScanner | undefined;
  logger?: Logger | undefined;
  // Sink for human-readable results
  print?: ((text: string) => void) | undefined;
}

/**
 * Composition root for a scan run: resolves targets, runs the enabled
 * protocol scanners, prints results and runs the post-scan script.
 */
export class Scanner {
  private readonly config: ScannerConfig;
  private readonly resolver: Resolver;
  private readonly scriptRunner: ScriptRunner;
  private readonly tcpScanner: TcpScanner;
  private readonly udpScanner: UdpScanner;
  private readonly logger: Logger;
  private readonly print: (text: string) => void;

  constructor(config: ScannerConfig, dependencies: ScannerDependencies = {}) {
    this.config = config;
    this.logger = dependencies.logger ?? createLogger({ name: 'scanner', level: config.logLevel });
    this.resolver = dependencies.resolver ?? new DnsResolver();
    this.scriptRunner = dependencies.scriptRunner ?? new ModuleScriptRunner(config.scriptsDir);
    this.tcpScanner =
      dependencies.tcpScanner ??
      new TcpScanner({
        timeoutMs: config.timeoutMs,
        serviceTimeoutMs: config.serviceTimeoutMs,
        logger: createScannerLogger('tcp', config.logLevel),
      });
    this.udpScanner =
      dependencies.udpScanner ??
      new UdpScanner({ timeoutMs: config.timeoutMs, logger: createScannerLogger('udp', config.logLevel) });
    this.print = dependencies.print ?? ((text) => console.log(text));
  }

  async run(): Promise<ScanReport> {
    const report: ScanReport = { results: [], scripts: [] };

    const ports = parsePortSpec(this.config.ports);
    if (ports.length === 0) {
      this.logger.warn(`No valid ports in "${this.config.ports}", nothing to scan`);
      return report;
    }

    // Any target that fails to resolve aborts the run before scanning starts
    const targets = await this.resolveTargets();
    if (targets.length === 0) {
      this.logger.warn('No targets specified, nothing to scan');
      return report;
    }

    if (this.config.tcp) {
      report.results.push(...(await this.runTcp(targets, ports)));
    }
    if (this.config.udp) {
      report.results.push(...(await this.runUdp(targets, ports)));
    }

    for (const result of report.results) {
      this.printResult(result);
    }

    if (this.config.jsonOutput) {
      await writeJsonReport(this.config.jsonOutput, report.results);
      this.logger.info(`JSON output written to ${this.config.jsonOutput}`);
    }

    if (this.config.script) {
      report.scripts = await this.runScripts(this.config.script, targets, report.results);
    }

    return report;
  }

  private async resolveTargets(): Promise<ScanTarget[]> {
    const targets: ScanTarget[] = [];
    for (const identifier of this.config.targets) {
      const target = await resolveTarget(identifier, this.resolver);
      if (target.address !== target.label) {
        this.logger.info(`Resolved ${target.label} to ${target.address}`);
      }
      targets.push(target);
    }
    return targets;
  }

  private async loadDatabase(): Promise<ProbeDatabase | null> {
    try {
      const database = await loadProbeDatabase(this.config.probesFile);
      this.logger.info(`Loaded ${database.probes.length} probes from ${this.config.probesFile}`);
      return database;
    } catch (error) {
      if (error instanceof ProbeLoadError) {
        this.logger.warn(`${error.message}; falling back to banner grabbing`);
        return null;
      }
      throw error;
    }
  }

  private async runTcp(targets: ScanTarget[], ports: number[]): Promise<TargetScanResult[]> {
    const database = this.config.serviceDetection ? await this.loadDatabase() : null;
    // One budget for every target in the run
    const pool = new PermitPool(this.config.concurrency);

    const results = await Promise.all(
      targets.map(async (target): Promise<TargetScanResult> => {
        const startedAt = new Date();
        const scanned = await this.tcpScanner.scanPorts(target, ports, {
          pool,
          serviceDetection: this.config.serviceDetection,
          database,
          onProgress: (result) => this.logOpenPort(target, result),
        });
        return { target, protocol: 'tcp', ports: scanned, startedAt, completedAt: new Date() };
      })
    );

    const stats = pool.stats();
    this.logger.debug('TCP permit usage', { ...stats });
    return results;
  }

  private async runUdp(targets: ScanTarget[], ports: number[]): Promise<TargetScanResult[]> {
    const results: TargetScanResult[] = [];
    for (const target of targets) {
      const startedAt = new Date();
      const scanned = await this.udpScanner.scanPorts(target, ports, {
        onProgress: (result) => this.logOpenPort(target, result),
      });
      results.push({ target, protocol: 'udp', ports: scanned, startedAt, completedAt: new Date() });
    }
    return results;
  }

  private logOpenPort(target: ScanTarget, result: PortResult): void {
    if (result.state === 'open') {
      const service = result.service ? ` (${result.service.service})` : '';
      this.logger.info(`${target.label} ${result.port}/${result.protocol} open${service}`);
    }
  }

  private printResult(result: TargetScanResult): void {
    const { target } = result;
    const name = target.label === target.address ? target.address : `${target.label} (${target.address})`;
    const seconds = ((result.completedAt.getTime() - result.startedAt.getTime()) / 1000).toFixed(2);

    this.print(`\nTarget ${name}, scanned in ${seconds}s`);
    this.print(formatPortTable(result.ports, { protocol: result.protocol, showAll: this.config.portsExplicitlySpecified }));

    const details = formatServiceDetails(result.ports);
    if (details.length > 0) {
      this.print(`\nService Detection Results:\n${details}`);
    }
  }

  /**
   * Run the configured script once per target, then once per open port. Script
   * failures are reported and never change scan results.
   */
  private async runScripts(script: string, targets: ScanTarget[], results: TargetScanResult[]): Promise<ScriptResult[]> {
    const outcomes: ScriptResult[] = [];
    this.print(`\nExecuting script: ${script}`);

    for (const target of targets) {
      const hostResult = await this.scriptRunner.run(script, target.label);
      outcomes.push(hostResult);
      this.reportScript(hostResult);

      const openPorts = new Set(
        results
          .filter((result) => result.target.address === target.address)
          .flatMap((result) => result.ports)
          .filter((port) => port.state === 'open')
          .map((port) => port.port)
      );

      for (const port of [...openPorts].sort((a, b) => a - b)) {
        const portResult = await this.scriptRunner.run(script, target.label, port);
        outcomes.push(portResult);
        if (!portResult.success || portResult.output || Object.keys(portResult.data).length > 0) {
          this.print(`\nPort ${port} Script Results:`);
          this.reportScript(portResult);
        }
      }
    }

    return outcomes;
  }

  private reportScript(result: ScriptResult): void {
    if (!result.success) {
      this.logger.error(`Script ${result.scriptName} failed`, {
        host: result.host,
        port: result.port,
        error: result.error,
      });
    }
    this.print(formatScriptResult(result));
  }
}
