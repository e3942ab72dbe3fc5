import type {
  MatchEntry,
  ProbeDatabase,
  ProbeEntry,
  ProbeProtocol,
  ServiceInfo,
  VersionField,
} from '../types/probe.js';

export const HARD_MATCH_CONFIDENCE = 90;
export const SOFT_MATCH_CONFIDENCE = 50;

const FALLBACK_PROBE_NAMES = ['GetRequest', 'GenericLines'];

const VERSION_TAGS: readonly VersionField[] = ['p', 'v', 'i', 'h', 'o', 'd', 'cpe'];

const FIELD_KEYS: Record<VersionField, Exclude<keyof ServiceInfo, 'service' | 'confidence'>> = {
  p: 'product',
  v: 'version',
  i: 'extraInfo',
  h: 'hostname',
  o: 'osInfo',
  d: 'deviceType',
  cpe: 'cpe',
};

/**
 * Replace `$1..$N` in a version template with the regex capture groups, in a
 * single pass so captured text is never substituted again. A reference takes
 * the longest group number that exists (`$12` with three groups is `$1` then
 * `2`). Groups that did not participate become empty strings; references past
 * the last group stay as written.
 */
export function substituteCaptures(template: string, groups: ReadonlyArray<string | undefined>): string {
  return template.replace(/\$(\d+)/g, (reference: string, digits: string) => {
    for (let length = digits.length; length >= 1; length--) {
      const n = Number(digits.slice(0, length));
      if (n >= 1 && n <= groups.length) {
        return (groups[n - 1] ?? '') + digits.slice(length);
      }
    }
    return reference;
  });
}

function buildServiceInfo(entry: MatchEntry, groups: Array<string | undefined>, confidence: number): ServiceInfo {
  const info: ServiceInfo = { service: entry.service, confidence };

  for (const tag of VERSION_TAGS) {
    const template = entry.versionInfo[tag];
    if (template !== undefined) {
      info[FIELD_KEYS[tag]] = substituteCaptures(template, groups);
    }
  }

  return info;
}

function firstMatch(text: string, entries: MatchEntry[], confidence: number): ServiceInfo | null {
  for (const entry of entries) {
    const match = entry.regex?.exec(text);
    if (match) {
      return buildServiceInfo(entry, match.slice(1), confidence);
    }
  }
  return null;
}

/**
 * Identify a service from a probe response. Hard matches are tried in order
 * before soft matches; the first rule that matches wins.
 */
export function matchResponse(response: Buffer, probe: ProbeEntry): ServiceInfo | null {
  // One character per byte so byte escapes in patterns line up with the input
  const text = response.toString('latin1');
  return (
    firstMatch(text, probe.matches, HARD_MATCH_CONFIDENCE) ??
    firstMatch(text, probe.softMatches, SOFT_MATCH_CONFIDENCE)
  );
}

export function appliesToPort(probe: ProbeEntry, port: number): boolean {
  const portText = String(port);
  return probe.ports.some((spec) => spec.includes(portText) || spec.includes(`T:${portText}`));
}

/**
 * Probes worth sending to `port`: those whose `ports` lines mention it, or the
 * generic request probes when none do.
 */
export function selectProbes(database: ProbeDatabase, port: number, protocol: ProbeProtocol = 'TCP'): ProbeEntry[] {
  const candidates = database.probes.filter((probe) => probe.protocol === protocol);
  const relevant = candidates.filter((probe) => appliesToPort(probe, port));
  if (relevant.length > 0) {
    return relevant;
  }
  return candidates.filter((probe) => FALLBACK_PROBE_NAMES.includes(probe.name));
}

export function findNullProbe(database: ProbeDatabase): ProbeEntry | undefined {
  return database.probes.find((probe) => probe.name === 'NULL' && probe.protocol === 'TCP');
}
