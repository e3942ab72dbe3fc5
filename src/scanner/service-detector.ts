import type { Socket } from 'net';
import type { Logger } from 'winston';
import { findNullProbe, matchResponse, selectProbes } from '../probes/matcher.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { defaultSocketFactory, openConnection, readResponse, type SocketFactory } from './connection.js';
import type { ProbeDatabase, ProbeEntry, ServiceInfo } from '../types/probe.js';

export interface ServiceDetectorOptions {
  timeoutMs?: number | undefined;
  socketFactory?: SocketFactory | undefined;
  logger?: Logger | undefined;
}

export class ServiceDetector {
  private readonly timeoutMs: number;
  private readonly socketFactory: SocketFactory;
  private readonly logger: Logger;

  constructor(options: ServiceDetectorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.logger = options.logger ?? createLogger({ name: 'service-detector' });
  }

  /**
   * Identify the service on an open TCP port. The NULL probe goes first, then
   * the probes relevant to the port; the first probe whose response matches
   * ends the search.
   */
  async detect(host: string, port: number, database: ProbeDatabase): Promise<ServiceInfo | null> {
    const nullProbe = findNullProbe(database);
    const probes = selectProbes(database, port, 'TCP').filter((probe) => probe !== nullProbe);
    const ordered = nullProbe ? [nullProbe, ...probes] : probes;

    for (const probe of ordered) {
      const service = await this.tryProbe(host, port, probe);
      if (service) {
        this.logger.debug(`Identified ${service.service} on ${host}:${port}`, { probe: probe.name });
        return service;
      }
    }

    return null;
  }

  /** Read whatever the service volunteers on connect, without sending anything. */
  async grabBanner(host: string, port: number): Promise<string | null> {
    const response = await this.exchange(host, port, Buffer.alloc(0));
    if (!response) {
      return null;
    }
    const banner = response.toString('latin1').trim();
    return banner.length > 0 ? banner : null;
  }

  private async tryProbe(host: string, port: number, probe: ProbeEntry): Promise<ServiceInfo | null> {
    const response = await this.exchange(host, port, probe.payload);
    return response ? matchResponse(response, probe) : null;
  }

  /**
   * One probe attempt over a fresh connection. Connect, write and read share
   * a single deadline; any failure yields `null`.
   */
  private async exchange(host: string, port: number, payload: Buffer): Promise<Buffer | null> {
    const deadline = Date.now() + this.timeoutMs;
    let socket: Socket | undefined;

    try {
      socket = await openConnection(host, port, this.timeoutMs, this.socketFactory);
      const remaining = Math.max(deadline - Date.now(), 1);
      return await readResponse(socket, payload, remaining);
    } catch (error) {
      this.logger.debug(`Probe attempt on ${host}:${port} failed`, { error: errorMessage(error) });
      return null;
    } finally {
      socket?.destroy();
    }
  }
}
