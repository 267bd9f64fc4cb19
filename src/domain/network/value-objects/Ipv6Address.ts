// ─── IPv6 Address (RFC 4291, RFC 5952) ───────────────────────────────
//
// IPv6 addresses are 128-bit identifiers represented as 8 groups of 4 hex digits.
// Supports:
//   - Full notation: 2001:0db8:0000:0000:0000:0000:0000:0001
//   - Compressed notation: 2001:db8::1 (single :: can replace consecutive zero groups)
//   - Embedded IPv4 suffix: ::ffff:192.0.2.1
//   - Loopback: ::1
//   - Unspecified: ::

import type { FormatOptions } from '@/network/core/config';
import { unwrap, toNullable } from '@/network/core/result';
import { formatIpv6Full, formatIpv6Segments } from '@/network/format/ipv6';
import { formatPadded } from '@/network/format/pad';
import { parseIpv6 } from '@/network/parser';
import { Ipv4Address } from './Ipv4Address';

const MAX_U128 = (1n << 128n) - 1n;

export class Ipv6Address {
  public readonly type = 'v6' as const;
  private readonly hextets: readonly number[]; // 8 × 16-bit values

  /**
   * @throws {Error} If `hextets` is not eight integers between 0 and 0xffff
   */
  constructor(hextets: readonly number[]) {
    if (hextets.length !== 8) throw new Error(`Invalid IPv6: expected 8 hextets, got ${hextets.length}`);
    for (const h of hextets) {
      if (!Number.isInteger(h) || h < 0 || h > 0xffff) {
        throw new Error(`Invalid IPv6 hextet: ${h}`);
      }
    }
    this.hextets = [...hextets];
  }

  public static readonly LOCALHOST = new Ipv6Address([0, 0, 0, 0, 0, 0, 0, 1]);
  public static readonly UNSPECIFIED = new Ipv6Address([0, 0, 0, 0, 0, 0, 0, 0]);

  /**
   * Parse colon-hex text: full, compressed, or with an embedded IPv4 suffix.
   *
   * @throws {AddrParseError} If the text is not a valid IPv6 literal
   */
  static parse(text: string): Ipv6Address {
    return unwrap(parseIpv6(text));
  }

  static tryParse(text: string): Ipv6Address | null {
    return toNullable(parseIpv6(text));
  }

  static fromOctets(octets: readonly number[]): Ipv6Address {
    if (octets.length !== 16) throw new Error(`Invalid IPv6: expected 16 octets, got ${octets.length}`);
    for (const byte of octets) {
      if (!Number.isInteger(byte) || byte < 0 || byte > 255) {
        throw new Error(`Invalid IPv6 octet: ${byte}`);
      }
    }
    const hextets: number[] = [];
    for (let i = 0; i < 16; i += 2) {
      hextets.push((octets[i] << 8) | octets[i + 1]);
    }
    return new Ipv6Address(hextets);
  }

  static fromBits(bits: bigint): Ipv6Address {
    if (bits < 0n || bits > MAX_U128) {
      throw new Error('Invalid number: must be between 0 and 2^128 - 1');
    }
    const hextets: number[] = [];
    for (let i = 7; i >= 0; i--) {
      hextets.push(Number((bits >> BigInt(i * 16)) & 0xffffn));
    }
    return new Ipv6Address(hextets);
  }

  // ─── Address Type Detection (RFC 4291) ─────────────────────────

  /** Check if this is the unspecified address (::) */
  isUnspecified(): boolean {
    return this.hextets.every(h => h === 0);
  }

  /** Check if this is the loopback address (::1) */
  isLoopback(): boolean {
    return this.hextets.slice(0, 7).every(h => h === 0) && this.hextets[7] === 1;
  }

  /** Check if this is a multicast address (ff00::/8) */
  isMulticast(): boolean {
    return (this.hextets[0] & 0xff00) === 0xff00;
  }

  /** Check if this is a unique local address (fc00::/7) */
  isUniqueLocal(): boolean {
    return (this.hextets[0] & 0xfe00) === 0xfc00;
  }

  /** Check if this is a link-local unicast address (fe80::/10) */
  isUnicastLinkLocal(): boolean {
    return (this.hextets[0] & 0xffc0) === 0xfe80;
  }

  /** Check if this is in the documentation range (2001:db8::/32) */
  isDocumentation(): boolean {
    return this.hextets[0] === 0x2001 && this.hextets[1] === 0x0db8;
  }

  // ─── Accessors ─────────────────────────────────────────────────

  segments(): number[] {
    return [...this.hextets];
  }

  octets(): number[] {
    return this.hextets.flatMap(h => [h >> 8, h & 0xff]);
  }

  toBits(): bigint {
    return this.hextets.reduce((acc, h) => (acc << 16n) | BigInt(h), 0n);
  }

  // ─── IPv4 Interop ──────────────────────────────────────────────

  /** The embedded IPv4 address of ::ffff:a.b.c.d, or null */
  toIpv4Mapped(): Ipv4Address | null {
    if (this.hextets.slice(0, 5).every(h => h === 0) && this.hextets[5] === 0xffff) {
      return this.embeddedIpv4();
    }
    return null;
  }

  /** The embedded IPv4 address of ::a.b.c.d or ::ffff:a.b.c.d, or null */
  toIpv4(): Ipv4Address | null {
    if (this.hextets.slice(0, 5).every(h => h === 0) && (this.hextets[5] === 0 || this.hextets[5] === 0xffff)) {
      return this.embeddedIpv4();
    }
    return null;
  }

  /** IPv4-mapped addresses as IPv4, everything else unchanged */
  toCanonical(): Ipv4Address | Ipv6Address {
    return this.toIpv4Mapped() ?? this;
  }

  private embeddedIpv4(): Ipv4Address {
    const [hi, lo] = [this.hextets[6], this.hextets[7]];
    return new Ipv4Address(hi >> 8, hi & 0xff, lo >> 8, lo & 0xff);
  }

  // ─── Comparison ────────────────────────────────────────────────

  equals(other: Ipv6Address): boolean {
    return this.hextets.every((h, i) => h === other.hextets[i]);
  }

  compare(other: Ipv6Address): number {
    for (let i = 0; i < 8; i++) {
      if (this.hextets[i] !== other.hextets[i]) {
        return this.hextets[i] - other.hextets[i];
      }
    }
    return 0;
  }

  // ─── Serialization ─────────────────────────────────────────────

  /**
   * Convert to compressed string representation (RFC 5952).
   */
  toString(): string {
    return formatIpv6Segments(this.hextets);
  }

  format(options?: FormatOptions): string {
    return formatPadded('ipv6', () => this.toString(), options);
  }

  /** Full notation (no compression) for debugging */
  toFullString(): string {
    return formatIpv6Full(this.hextets);
  }

  toJSON(): string {
    return this.toString();
  }
}
