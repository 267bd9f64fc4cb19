/**
 * Canonical IPv6 text (RFC 5952).
 *
 * - Leading zeros in each hextet are omitted, hex digits are lowercase
 * - The longest run of two or more zero hextets becomes '::'
 * - Between runs of equal length, the first one is compressed
 * - A single zero hextet is printed as '0'
 * - ::ffff:0:0/96 (IPv4-mapped) keeps its dotted-decimal suffix
 */

interface Span {
  start: number;
  len: number;
}

function longestZeroRun(segments: readonly number[]): Span {
  let longest: Span = { start: 0, len: 0 };
  let current: Span = { start: 0, len: 0 };

  for (let i = 0; i < segments.length; i++) {
    if (segments[i] === 0) {
      if (current.len === 0) current.start = i;
      current.len++;
      if (current.len > longest.len) {
        longest = { ...current };
      }
    } else {
      current = { start: 0, len: 0 };
    }
  }

  return longest;
}

function hexList(chunk: readonly number[]): string {
  return chunk.map(h => h.toString(16)).join(':');
}

/**
 * Format eight 16-bit segments.
 *
 * @throws {Error} If the array is not eight values in 0..0xffff
 */
export function formatIpv6Segments(segments: readonly number[]): string {
  if (segments.length !== 8) {
    throw new Error(`Invalid IPv6: expected 8 hextets, got ${segments.length}`);
  }
  for (const h of segments) {
    if (!Number.isInteger(h) || h < 0 || h > 0xffff) {
      throw new Error(`Invalid IPv6 hextet: ${h}`);
    }
  }

  if (segments.slice(0, 5).every(h => h === 0) && segments[5] === 0xffff) {
    const [hi, lo] = [segments[6], segments[7]];
    return `::ffff:${hi >> 8}.${hi & 0xff}.${lo >> 8}.${lo & 0xff}`;
  }

  const zeroes = longestZeroRun(segments);
  if (zeroes.len > 1) {
    return (
      hexList(segments.slice(0, zeroes.start)) +
      '::' +
      hexList(segments.slice(zeroes.start + zeroes.len))
    );
  }
  return hexList(segments);
}

/** Uncompressed, zero-padded notation */
export function formatIpv6Full(segments: readonly number[]): string {
  return segments.map(h => h.toString(16).padStart(4, '0')).join(':');
}
