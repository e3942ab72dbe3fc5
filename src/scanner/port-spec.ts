const MAX_PORT = 65535;

function parsePortNumber(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const port = Number(value);
  return port <= MAX_PORT ? port : null;
}

/**
 * Expand a port specification such as `80,443,1000-2000` into port numbers.
 *
 * Tokens are expanded in the order they appear, ranges ascending. Malformed
 * tokens (non-numeric, reversed or out-of-range) are dropped rather than
 * failing the whole spec, and duplicates are kept.
 */
export function parsePortSpec(spec: string): number[] {
  const ports: number[] = [];

  for (const rawToken of spec.split(',')) {
    const token = rawToken.trim();
    if (token.length === 0) continue;

    if (token.includes('-')) {
      const bounds = token.split('-');
      if (bounds.length !== 2) continue;

      const start = parsePortNumber(bounds[0]?.trim() ?? '');
      const end = parsePortNumber(bounds[1]?.trim() ?? '');
      if (start === null || end === null || start > end) continue;

      for (let port = start; port <= end; port++) {
        ports.push(port);
      }
    } else {
      const port = parsePortNumber(token);
      if (port !== null) {
        ports.push(port);
      }
    }
  }

  return ports;
}
