/**
 * Ipv4Address Value Object
 *
 * Represents a 32-bit IPv4 address stored as four octets in network order.
 * Immutable value object following Domain-Driven Design principles.
 *
 * @example
 * ```typescript
 * const ip = Ipv4Address.parse('192.168.1.1');
 * console.log(ip.toString()); // '192.168.1.1'
 * console.log(ip.isPrivate()); // true
 * ```
 */

import type { FormatOptions } from '@/network/core/config';
import { unwrap, toNullable } from '@/network/core/result';
import { formatPadded } from '@/network/format/pad';
import { parseIpv4 } from '@/network/parser';
import { Ipv6Address } from './Ipv6Address';

export type Octets4 = readonly [number, number, number, number];

export class Ipv4Address {
  public readonly type = 'v4' as const;
  private readonly bytes: Octets4;

  /**
   * Creates an IPv4 address from its four octets
   *
   * @throws {Error} If an octet is not an integer between 0 and 255
   */
  constructor(a: number, b: number, c: number, d: number) {
    for (const byte of [a, b, c, d]) {
      if (!Number.isInteger(byte) || byte < 0 || byte > 255) {
        throw new Error(`Invalid IPv4 octet: ${byte}`);
      }
    }
    this.bytes = [a, b, c, d];
  }

  // Constants
  public static readonly LOCALHOST = new Ipv4Address(127, 0, 0, 1);
  public static readonly UNSPECIFIED = new Ipv4Address(0, 0, 0, 0);
  public static readonly BROADCAST = new Ipv4Address(255, 255, 255, 255);

  /**
   * Parses dotted-decimal text
   *
   * @throws {AddrParseError} If the text is not exactly four decimal octets
   */
  public static parse(text: string): Ipv4Address {
    return unwrap(parseIpv4(text));
  }

  public static tryParse(text: string): Ipv4Address | null {
    return toNullable(parseIpv4(text));
  }

  public static fromOctets(octets: readonly number[]): Ipv4Address {
    if (octets.length !== 4) {
      throw new Error(`Invalid IPv4: expected 4 octets, got ${octets.length}`);
    }
    return new Ipv4Address(octets[0], octets[1], octets[2], octets[3]);
  }

  /**
   * Creates an address from a 32-bit unsigned integer
   */
  public static fromBits(bits: number): Ipv4Address {
    if (!Number.isInteger(bits) || bits < 0 || bits > 0xffffffff) {
      throw new Error('Invalid number: must be integer between 0 and 4294967295');
    }
    return new Ipv4Address((bits >>> 24) & 0xff, (bits >>> 16) & 0xff, (bits >>> 8) & 0xff, bits & 0xff);
  }

  public toBits(): number {
    return ((this.bytes[0] << 24) | (this.bytes[1] << 16) | (this.bytes[2] << 8) | this.bytes[3]) >>> 0;
  }

  public octets(): [number, number, number, number] {
    return [...this.bytes];
  }

  // ─── Classification ────────────────────────────────────────────

  /** 0.0.0.0 */
  public isUnspecified(): boolean {
    return this.toBits() === 0;
  }

  /** 127.0.0.0/8 */
  public isLoopback(): boolean {
    return this.bytes[0] === 127;
  }

  /**
   * RFC 1918 private ranges
   * - 10.0.0.0/8
   * - 172.16.0.0/12
   * - 192.168.0.0/16
   */
  public isPrivate(): boolean {
    const [first, second] = this.bytes;
    if (first === 10) return true;
    if (first === 172 && second >= 16 && second <= 31) return true;
    return first === 192 && second === 168;
  }

  /** 169.254.0.0/16 */
  public isLinkLocal(): boolean {
    return this.bytes[0] === 169 && this.bytes[1] === 254;
  }

  /** 224.0.0.0/4 */
  public isMulticast(): boolean {
    return this.bytes[0] >= 224 && this.bytes[0] <= 239;
  }

  public isBroadcast(): boolean {
    return this.bytes.every(byte => byte === 255);
  }

  /** TEST-NET-1, TEST-NET-2 and TEST-NET-3 (RFC 5737) */
  public isDocumentation(): boolean {
    const [a, b, c] = this.bytes;
    return (
      (a === 192 && b === 0 && c === 2) ||
      (a === 198 && b === 51 && c === 100) ||
      (a === 203 && b === 0 && c === 113)
    );
  }

  // ─── Conversion ────────────────────────────────────────────────

  /** ::ffff:a.b.c.d */
  public toIpv6Mapped(): Ipv6Address {
    const [a, b, c, d] = this.bytes;
    return new Ipv6Address([0, 0, 0, 0, 0, 0xffff, (a << 8) | b, (c << 8) | d]);
  }

  /** ::a.b.c.d (deprecated IPv4-compatible form) */
  public toIpv6Compatible(): Ipv6Address {
    const [a, b, c, d] = this.bytes;
    return new Ipv6Address([0, 0, 0, 0, 0, 0, (a << 8) | b, (c << 8) | d]);
  }

  // ─── Comparison ────────────────────────────────────────────────

  public equals(other: Ipv4Address): boolean {
    return this.bytes.every((byte, i) => byte === other.bytes[i]);
  }

  /**
   * Orders by raw octets; negative when this address sorts first
   */
  public compare(other: Ipv4Address): number {
    return this.toBits() - other.toBits();
  }

  // ─── Serialization ─────────────────────────────────────────────

  public toString(): string {
    return this.bytes.join('.');
  }

  /**
   * Canonical text, padded to `options.width` / truncated to `options.precision`
   */
  public format(options?: FormatOptions): string {
    return formatPadded('ipv4', () => this.toString(), options);
  }

  public toJSON(): string {
    return this.toString();
  }
}
