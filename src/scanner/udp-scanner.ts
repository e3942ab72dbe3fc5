import dgram from 'dgram';
import net from 'net';
import type { Logger } from 'winston';
import { getUdpPayload } from './udp-payloads.js';
import { createScannerLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { PortResult, ScanTarget, UdpPortState } from '../types/scanner.js';

export type DatagramSocketFactory = (type: dgram.SocketType) => dgram.Socket;

export interface UdpScannerOptions {
  timeoutMs?: number | undefined;
  socketFactory?: DatagramSocketFactory | undefined;
  logger?: Logger | undefined;
}

export interface UdpScanOptions {
  onProgress?: ((result: PortResult, completed: number, total: number) => void) | undefined;
}

export class UdpScanner {
  private readonly timeoutMs: number;
  private readonly socketFactory: DatagramSocketFactory;
  private readonly logger: Logger;

  constructor(options: UdpScannerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.socketFactory = options.socketFactory ?? ((type) => dgram.createSocket(type));
    this.logger = options.logger ?? createScannerLogger('udp');
  }

  /**
   * Probe one UDP port. A reply means open and a socket error means closed.
   * Silence until the deadline also counts as open: it cannot be told apart
   * from a firewall dropping the probe.
   */
  scanPort(host: string, port: number): Promise<UdpPortState> {
    return new Promise((resolve) => {
      const socket = this.socketFactory(net.isIPv6(host) ? 'udp6' : 'udp4');
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (state: UdpPortState, reason: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        try {
          socket.close();
        } catch (error) {
          this.logger.debug('Socket already closed', { target: host, port, error: errorMessage(error) });
        }
        this.logger.debug(`Port ${state}: ${reason}`, { target: host, port });
        resolve(state);
      };

      socket.on('error', (error) => finish('closed', errorMessage(error)));
      socket.on('message', () => finish('open', 'response received'));

      socket.bind(0, () => {
        try {
          socket.connect(port, host, (error?: Error) => {
            if (error) {
              finish('closed', errorMessage(error));
              return;
            }
            socket.send(getUdpPayload(port), (sendError) => {
              if (sendError) {
                finish('closed', errorMessage(sendError));
                return;
              }
              if (settled) return;
              timer = setTimeout(() => finish('open', 'no response'), this.timeoutMs);
            });
          });
        } catch (error) {
          // dgram throws synchronously for ports it rejects, such as 0
          finish('closed', errorMessage(error));
        }
      });
    });
  }

  /** Probe ports one after another. */
  async scanPorts(target: ScanTarget, ports: number[], options: UdpScanOptions = {}): Promise<PortResult[]> {
    const results: PortResult[] = [];

    this.logger.info(`Scanning ${ports.length} ports`, { target: target.address });

    for (const port of ports) {
      const state = await this.scanPort(target.address, port);
      const result: PortResult = { port, protocol: 'udp', state };
      results.push(result);
      options.onProgress?.(result, results.length, ports.length);
    }

    return results;
  }
}
