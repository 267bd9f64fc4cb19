/**
 * ScionAddress Value Object
 *
 * An (IA, host) pair: the packed ISD-AS identifier of the destination AS
 * and the host's IP address inside it. Immutable; the `with*` methods
 * return a new address and keep the IA packing intact.
 *
 * @example
 * ```typescript
 * const addr = ScionAddress.parse('19-ffaa:1:1067,127.0.0.1');
 * addr.isd; // 19
 * addr.as; // 281105609592935n
 * addr.toString(); // '19-ffaa:1:1067,127.0.0.1'
 * ```
 */

import type { FormatOptions } from '@/network/core/config';
import { unwrap, toNullable } from '@/network/core/result';
import { formatPadded } from '@/network/format/pad';
import { parseScion } from '@/network/parser';
import { asFromIa, formatAs, isdFromIa, makeIa } from '../ia';
import { ipAddrEquals, ipHostText, type IpAddr } from './IpAddr';

const MAX_IA = (1n << 64n) - 1n;

export class ScionAddress {
  public readonly type = 'scion' as const;
  public readonly ia: bigint;
  public readonly host: IpAddr;

  /**
   * @throws {Error} If `ia` does not fit in 64 bits
   */
  constructor(ia: bigint, host: IpAddr) {
    if (ia < 0n || ia > MAX_IA) {
      throw new Error(`Invalid IA: must be between 0 and 2^64 - 1, got ${ia}`);
    }
    this.ia = ia;
    this.host = host;
  }

  /**
   * @throws {Error} If the ISD or the AS number is out of range
   */
  static fromParts(isd: number, as: bigint, host: IpAddr): ScionAddress {
    return new ScionAddress(makeIa(isd, as), host);
  }

  /**
   * @throws {AddrParseError} If the text is not `ISD-AS,HOST`
   */
  static parse(text: string): ScionAddress {
    return unwrap(parseScion(text));
  }

  static tryParse(text: string): ScionAddress | null {
    return toNullable(parseScion(text));
  }

  get isd(): number {
    return isdFromIa(this.ia);
  }

  get as(): bigint {
    return asFromIa(this.ia);
  }

  withIa(ia: bigint): ScionAddress {
    return new ScionAddress(ia, this.host);
  }

  withIsd(isd: number): ScionAddress {
    return new ScionAddress(makeIa(isd, this.as), this.host);
  }

  withAs(as: bigint): ScionAddress {
    return new ScionAddress(makeIa(this.isd, as), this.host);
  }

  withHost(host: IpAddr): ScionAddress {
    return new ScionAddress(this.ia, host);
  }

  equals(other: ScionAddress): boolean {
    return this.ia === other.ia && ipAddrEquals(this.host, other.host);
  }

  /** `{isd}-{as},{host}`, IPv6 hosts in brackets */
  toString(): string {
    return `${this.isd}-${formatAs(this.as)},${ipHostText(this.host)}`;
  }

  format(options?: FormatOptions): string {
    return formatPadded('scion', () => this.toString(), options);
  }

  toJSON(): string {
    return this.toString();
  }
}
