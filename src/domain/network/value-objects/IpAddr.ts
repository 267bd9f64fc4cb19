/**
 * IpAddr - either an IPv4 or an IPv6 address, discriminated by `type`.
 */

import { unwrap, toNullable } from '@/network/core/result';
import { parseIp } from '@/network/parser';
import { Ipv4Address } from './Ipv4Address';
import { Ipv6Address } from './Ipv6Address';

export type IpAddr = Ipv4Address | Ipv6Address;

/**
 * @throws {AddrParseError} If the text is neither an IPv4 nor an IPv6 literal
 */
export function ipAddrFromString(text: string): IpAddr {
  return unwrap(parseIp(text));
}

export function tryIpAddrFromString(text: string): IpAddr | null {
  return toNullable(parseIp(text));
}

/**
 * 4 octets give an IPv4 address, 16 octets an IPv6 address
 */
export function ipAddrFromOctets(octets: readonly number[]): IpAddr {
  switch (octets.length) {
    case 4:
      return Ipv4Address.fromOctets(octets);
    case 16:
      return Ipv6Address.fromOctets(octets);
    default:
      throw new Error(`Invalid IP: expected 4 or 16 octets, got ${octets.length}`);
  }
}

export function ipAddrEquals(a: IpAddr, b: IpAddr): boolean {
  if (a.type === 'v4' && b.type === 'v4') return a.equals(b);
  if (a.type === 'v6' && b.type === 'v6') return a.equals(b);
  return false;
}

/**
 * IPv4 sorts before IPv6; within a family, raw octets decide
 */
export function compareIpAddr(a: IpAddr, b: IpAddr): number {
  if (a.type === 'v4' && b.type === 'v4') return Math.sign(a.compare(b));
  if (a.type === 'v6' && b.type === 'v6') return Math.sign(a.compare(b));
  return a.type === 'v4' ? -1 : 1;
}

/** IPv4-mapped IPv6 addresses become IPv4 */
export function toCanonicalIp(ip: IpAddr): IpAddr {
  return ip.type === 'v6' ? ip.toCanonical() : ip;
}

/** Host text as it appears inside a socket or SCION address */
export function ipHostText(ip: IpAddr): string {
  return ip.type === 'v6' ? `[${ip.toString()}]` : ip.toString();
}
