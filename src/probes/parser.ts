import fs from 'fs/promises';
import { ProbeLoadError } from '../errors.js';
import { decodeEscapes } from './escape.js';
import type {
  MatchEntry,
  ProbeDatabase,
  ProbeEntry,
  ProbeProtocol,
  VersionField,
} from '../types/probe.js';

const SINGLE_LETTER_FIELDS: readonly VersionField[] = ['p', 'v', 'i', 'h', 'o', 'd'];

interface DelimitedValue {
  value: string;
  // Index just past the closing delimiter
  end: number;
}

function asVersionField(value: string): VersionField | null {
  return SINGLE_LETTER_FIELDS.find((field) => field === value) ?? null;
}

function parseProtocol(value: string): ProbeProtocol | null {
  const upper = value.toUpperCase();
  return upper === 'TCP' || upper === 'UDP' ? upper : null;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

/**
 * Read `<delim>...<delim>` starting at `start`, where `text[start]` is the
 * delimiter. The value ends at the next occurrence of the same delimiter.
 */
function readDelimited(text: string, start: number): DelimitedValue | null {
  const delimiter = text[start];
  if (delimiter === undefined || /\s/.test(delimiter)) {
    return null;
  }
  const close = text.indexOf(delimiter, start + 1);
  if (close === -1) {
    return null;
  }
  return { value: text.slice(start + 1, close), end: close + 1 };
}

/**
 * Extract the content of a `q|...|` probe string: everything strictly between
 * the first and last occurrence of the delimiter that follows `q`.
 */
export function parseProbeString(probePart: string): string {
  if (probePart.startsWith('q') && probePart.length > 2) {
    const delimiter = probePart.charAt(1);
    const start = probePart.indexOf(delimiter);
    const end = probePart.lastIndexOf(delimiter);
    if (start !== end) {
      return probePart.slice(start + 1, end);
    }
  }
  return probePart;
}

function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern);
  } catch {
    // Patterns the JavaScript engine rejects never match
    return null;
  }
}

/**
 * Parse the version fields trailing a match line (`p/.../ v/.../ cpe:/.../a`).
 * Malformed fields are skipped up to the next whitespace.
 */
export function parseVersionFields(text: string): Partial<Record<VersionField, string>> {
  const fields: Partial<Record<VersionField, string>> = {};
  let i = 0;

  while (i < text.length) {
    if (/\s/.test(text.charAt(i))) {
      i++;
      continue;
    }

    let tag: VersionField | null = null;
    let delimiterAt = i + 1;
    if (text.startsWith('cpe:', i)) {
      tag = 'cpe';
      delimiterAt = i + 4;
    } else {
      tag = asVersionField(text.charAt(i));
    }

    const delimited = tag !== null ? readDelimited(text, delimiterAt) : null;
    if (tag === null || delimited === null) {
      // Skip the malformed token
      while (i < text.length && !/\s/.test(text.charAt(i))) i++;
      continue;
    }

    fields[tag] = delimited.value;
    i = delimited.end;
    // Trailing field flags such as the `a` in `cpe:/a:vendor:product/a`
    while (i < text.length && !/\s/.test(text.charAt(i))) i++;
  }

  return fields;
}

/**
 * Parse the body of a `match` or `softmatch` line:
 * `<service> m<d><pattern><d>[flags] [fields...]`.
 */
export function parseMatchLine(body: string): MatchEntry | null {
  const serviceMatch = /^(\S+)\s+/.exec(body);
  const service = serviceMatch?.[1];
  if (!serviceMatch || !service) {
    return null;
  }

  const clauseStart = serviceMatch[0].length;
  if (body.charAt(clauseStart) !== 'm') {
    return null;
  }

  const pattern = readDelimited(body, clauseStart + 1);
  if (pattern === null) {
    return null;
  }

  const flagsMatch = /^[a-z]*/i.exec(body.slice(pattern.end));
  const flags = flagsMatch?.[0] ?? '';

  return {
    service,
    pattern: pattern.value,
    flags,
    regex: compilePattern(pattern.value),
    versionInfo: parseVersionFields(body.slice(pattern.end + flags.length)),
  };
}

function openProbe(body: string): ProbeEntry | null {
  const [, protocolName, name, probePart] = /^(\S+)\s+(\S+)\s+(\S.*)$/.exec(body) ?? [];
  if (!protocolName || !name || !probePart) {
    return null;
  }

  const protocol = parseProtocol(protocolName);
  if (protocol === null) {
    return null;
  }

  return {
    protocol,
    name,
    payload: decodeEscapes(parseProbeString(probePart)),
    noPayload: probePart.split(/\s+/).includes('no-payload'),
    matches: [],
    softMatches: [],
    ports: [],
    sslPorts: [],
  };
}

/**
 * Parse a probe definition file in the nmap-service-probes grammar.
 *
 * The file is read in a single pass. Directives apply to the most recent
 * `Probe`; anything before the first probe other than `Exclude` is ignored,
 * as are unknown directives.
 */
export function parseProbeDatabase(content: string): ProbeDatabase {
  const database: ProbeDatabase = { excludes: [], probes: [] };
  let current: ProbeEntry | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const directiveMatch = /^(\S+)\s*(.*)$/.exec(line);
    const directive = directiveMatch?.[1] ?? '';
    const body = directiveMatch?.[2] ?? '';
    const firstArg = body.split(/\s+/)[0];

    if (directive === 'Exclude') {
      if (body.length > 0) database.excludes.push(body);
      continue;
    }

    if (directive === 'Probe') {
      if (current) database.probes.push(current);
      current = openProbe(body);
      continue;
    }

    if (!current || body.length === 0) {
      continue;
    }

    switch (directive) {
      case 'match':
      case 'softmatch': {
        const entry = parseMatchLine(body);
        if (entry) {
          (directive === 'match' ? current.matches : current.softMatches).push(entry);
        }
        break;
      }
      case 'ports':
        current.ports.push(body);
        break;
      case 'sslports':
        current.sslPorts.push(body);
        break;
      case 'totalwaitms': {
        const value = parseInteger(firstArg);
        if (value !== undefined) current.totalWaitMs = value;
        break;
      }
      case 'tcpwrappedms': {
        const value = parseInteger(firstArg);
        if (value !== undefined) current.tcpWrappedMs = value;
        break;
      }
      case 'rarity': {
        const value = parseInteger(firstArg);
        if (value !== undefined) current.rarity = value;
        break;
      }
      case 'fallback':
        current.fallback = body;
        break;
      default:
        // Unknown directive
        break;
    }
  }

  if (current) {
    database.probes.push(current);
  }

  return database;
}

export async function loadProbeDatabase(path: string): Promise<ProbeDatabase> {
  let content: string;
  try {
    // latin1 keeps every byte of the file as one character
    content = await fs.readFile(path, 'latin1');
  } catch (error) {
    throw new ProbeLoadError(path, error);
  }
  return parseProbeDatabase(content);
}
