const SIMPLE_ESCAPES: Record<string, number> = {
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  '0': 0x00,
  '\\': 0x5c,
};

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;

/**
 * Decode the escape sequences used in probe strings (`\n \r \t \0 \\ \xHH`)
 * into raw bytes. Unknown escapes keep their backslash, and `\x` without two
 * hex digits is kept literally. Other characters map to a single byte each.
 */
export function decodeEscapes(source: string): Buffer {
  const bytes: number[] = [];

  for (let i = 0; i < source.length; i++) {
    const ch = source.charCodeAt(i) & 0xff;
    if (source[i] !== '\\' || i + 1 >= source.length) {
      bytes.push(ch);
      continue;
    }

    const next = source[i + 1] ?? '';
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      bytes.push(simple);
      i++;
      continue;
    }

    if (next === 'x') {
      const hex = source.slice(i + 2, i + 4);
      if (HEX_PAIR.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 3;
        continue;
      }
    }

    bytes.push(ch);
  }

  return Buffer.from(bytes);
}
