import fs from 'fs';
import { z } from 'zod';

const WellKnownServicesSchema = z.record(z.string());

let cache: ReadonlyMap<number, string> | null = null;

function loadTable(): ReadonlyMap<number, string> {
  const file = new URL('../../data/well-known-services.json', import.meta.url);
  const table = WellKnownServicesSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
  return new Map(Object.entries(table).map(([port, name]) => [Number(port), name]));
}

/** Conventional service name for a port, used when nothing was detected. */
export function getWellKnownService(port: number): string | undefined {
  if (!cache) {
    cache = loadTable();
  }
  return cache.get(port);
}
