/**
 * ISD-AS identifier codec
 *
 * An IA packs a 16-bit isolation domain (ISD) and a 48-bit AS number into
 * one 64-bit value: `isd << 48 | as`.
 *
 * @example
 * ```typescript
 * const as = asFromDottedHex('ffaa:1:1067'); // 281105609592935n
 * makeIa(19, as); // 5629130167095399n
 * formatAs(as); // 'ffaa:1:1067'
 * formatAs(64512n); // '64512'
 * ```
 */

export const MAX_ISD = 0xffff;
export const MAX_AS = (1n << 48n) - 1n;
/** Largest AS number of the legacy 32-bit BGP numbering */
export const MAX_LEGACY_AS = 0xffffffffn;

const U64_BITS = 64;

export function isValidIsd(isd: number): boolean {
  return Number.isInteger(isd) && isd >= 0 && isd <= MAX_ISD;
}

export function isValidAs(as: bigint): boolean {
  return as >= 0n && as <= MAX_AS;
}

/**
 * Pack an ISD and an AS number into an IA
 *
 * @throws {Error} If either component is out of range
 */
export function makeIa(isd: number, as: bigint): bigint {
  if (!isValidIsd(isd)) {
    throw new Error(`Invalid ISD: must be integer between 0 and ${MAX_ISD}, got ${isd}`);
  }
  if (!isValidAs(as)) {
    throw new Error(`Invalid AS number: must be between 0 and ${MAX_AS}, got ${as}`);
  }
  return (BigInt(isd) << 48n) | as;
}

/** Low 48 bits of the IA */
export function asFromIa(ia: bigint): bigint {
  return BigInt.asUintN(U64_BITS, ia) & MAX_AS;
}

/** High 16 bits of the IA */
export function isdFromIa(ia: bigint): number {
  return Number(BigInt.asUintN(U64_BITS, ia) >> 48n);
}

/**
 * Parse colon-separated hex groups into an AS number.
 *
 * Every group is left-padded to four digits before the groups are
 * concatenated, so `ffaa:1:1067` reads as `0xffaa00011067`. Runs of
 * colons act as a single separator.
 *
 * @throws {Error} If a group is not 1-4 hex digits or there are more than three groups
 */
export function asFromDottedHex(text: string): bigint {
  const groups = text.split(/:+/).filter(group => group.length > 0);
  if (groups.length === 0 || groups.length > 3) {
    throw new Error(`Invalid AS number: expected 1 to 3 hex groups, got '${text}'`);
  }
  for (const group of groups) {
    if (!/^[0-9a-fA-F]{1,4}$/.test(group)) {
      throw new Error(`Invalid AS group: ${group}`);
    }
  }
  const hex = groups.map(group => group.padStart(4, '0')).join('');
  return BigInt('0x' + hex);
}

/**
 * Render an AS number as colon-separated hex.
 *
 * Works on the unpadded hex string of the whole number: a ':' goes in
 * before every fourth character position once a group has printed a
 * non-zero digit, and leading zeros of each group are dropped (a group of
 * four zeros prints as `0:`).
 *
 * When the unpadded hex length is not a multiple of four the groups are
 * counted from the most significant digit, so they no longer sit on the
 * 16-bit boundaries that `asFromDottedHex` uses: 0x100000000 renders as
 * `1000:0:`. A trailing all-zero group leaves a trailing ':'. Both are kept
 * as-is; `formatAs` only sends values above the 32-bit range here.
 */
export function asToDottedHex(as: bigint): string {
  const hex = as.toString(16);
  let result = '';
  let begin = true;
  let zerosInRow = 0;

  for (let pos = 0; pos < hex.length; pos++) {
    const char = hex[pos];

    if (pos !== 0 && pos % 4 === 0 && !begin) {
      result += ':';
      zerosInRow = 0;
      begin = true;
    }

    if (!begin) {
      result += char;
      continue;
    }

    if (char === '0') {
      zerosInRow++;
      if (zerosInRow === 4) {
        result += '0:';
        zerosInRow = 0;
      }
      continue;
    }

    result += char;
    zerosInRow = 0;
    begin = false;
  }

  return result;
}

/**
 * Canonical AS display: plain decimal inside the legacy 32-bit range,
 * colon-hex above it.
 */
export function formatAs(as: bigint): string {
  return as <= MAX_LEGACY_AS ? as.toString(10) : asToDottedHex(as);
}
