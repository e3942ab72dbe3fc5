import type { Logger } from 'winston';
import { ServiceDetector } from './service-detector.js';
import { classifyConnectError } from './port-classifier.js';
import { ConnectTimeoutError, defaultSocketFactory, openConnection, type SocketFactory } from './connection.js';
import { createScannerLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { PermitPool } from './permit-pool.js';
import type { PortResult, PortState, ScanTarget } from '../types/scanner.js';
import type { ProbeDatabase } from '../types/probe.js';

export interface TcpScannerOptions {
  timeoutMs?: number | undefined;
  serviceTimeoutMs?: number | undefined;
  socketFactory?: SocketFactory | undefined;
  logger?: Logger | undefined;
}

export interface TcpScanOptions {
  pool: PermitPool;
  serviceDetection?: boolean | undefined;
  // null when detection is on but no probe database could be loaded
  database?: ProbeDatabase | null | undefined;
  onProgress?: ((result: PortResult, completed: number, total: number) => void) | undefined;
}

export class TcpScanner {
  private readonly timeoutMs: number;
  private readonly socketFactory: SocketFactory;
  private readonly detector: ServiceDetector;
  private readonly logger: Logger;

  constructor(options: TcpScannerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.logger = options.logger ?? createScannerLogger('tcp');
    this.detector = new ServiceDetector({
      timeoutMs: options.serviceTimeoutMs ?? 5000,
      socketFactory: this.socketFactory,
      logger: this.logger,
    });
  }

  /**
   * Connect to one port and classify the outcome. The scan connection is
   * closed as soon as it opens; nothing is exchanged on it.
   */
  async scanPort(host: string, port: number): Promise<PortState> {
    try {
      const socket = await openConnection(host, port, this.timeoutMs, this.socketFactory);
      socket.destroy();
      return 'open';
    } catch (error) {
      if (error instanceof ConnectTimeoutError) {
        return 'filtered';
      }
      const state = classifyConnectError(error);
      this.logger.debug(`Connect failed, port ${state}`, { target: host, port, error: errorMessage(error) });
      return state;
    }
  }

  /**
   * Scan every port of one target. Each attempt holds a permit from the shared
   * pool only while connecting; service detection on open ports runs after
   * the permit is returned.
   */
  async scanPorts(target: ScanTarget, ports: number[], options: TcpScanOptions): Promise<PortResult[]> {
    const { pool, serviceDetection = false, database, onProgress } = options;
    let completed = 0;

    this.logger.info(`Scanning ${ports.length} ports`, { target: target.address });

    return Promise.all(
      ports.map(async (port): Promise<PortResult> => {
        const state = await pool.withPermit(() => this.scanPort(target.address, port));
        const result: PortResult = { port, protocol: 'tcp', state };

        if (state === 'open' && serviceDetection) {
          if (database) {
            const service = await this.detector.detect(target.address, port, database);
            if (service) result.service = service;
          } else {
            const banner = await this.detector.grabBanner(target.address, port);
            if (banner) result.banner = banner;
          }
        }

        completed++;
        onProgress?.(result, completed, ports.length);
        return result;
      })
    );
  }
}
