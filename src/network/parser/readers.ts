/**
 * Grammar readers built on the Scanner.
 *
 * Each reader is atomic: it returns a value and leaves the cursor after
 * what it consumed, or returns null and leaves the cursor untouched.
 *
 *   ipv4        := octet "." octet "." octet "." octet
 *   ipv6        := group (":" group){0,7} | head "::" tail
 *   as-number   := group | group ":" group ":" group
 *   scion-addr  := isd "-" as-number "," host
 *   host        := ipv4 | "[" ipv6 "]"
 *   socket-v4   := ipv4 ":" port
 *   socket-v6   := "[" ipv6 ("%" scope-id)? "]" ":" port
 *   socket-scion:= scion-addr ":" port
 */

import { asFromDottedHex, makeIa } from '@/domain/network/ia';
import type { IpAddr } from '@/domain/network/value-objects/IpAddr';
import { Ipv4Address } from '@/domain/network/value-objects/Ipv4Address';
import { Ipv6Address } from '@/domain/network/value-objects/Ipv6Address';
import { ScionAddress } from '@/domain/network/value-objects/ScionAddress';
import {
  SocketAddrScion,
  SocketAddrV4,
  SocketAddrV6,
  type SocketAddr,
} from '@/domain/network/value-objects/SocketAddress';
import type { Scanner } from './Scanner';

const U8_MAX = 0xff;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

export type L3Addr = IpAddr | ScionAddress;

// ─── IP literals ─────────────────────────────────────────────────────

/**
 * Four decimal octets. Multi-digit octets may not start with '0', so
 * "010" is never read as octal (RFC 6943 §3.1.1).
 */
export function readIpv4(scanner: Scanner): Ipv4Address | null {
  return scanner.readAtomically(s => {
    const octets: number[] = [];
    for (let i = 0; i < 4; i++) {
      const octet = s.readSeparator('.', i, p => p.readNumber(10, 3, false, U8_MAX));
      if (octet === null) return null;
      octets.push(octet);
    }
    return Ipv4Address.fromOctets(octets);
  });
}

/**
 * Read up to `limit` colon-separated hex groups into `groups`, stopping
 * early after an embedded IPv4 address (which fills two slots).
 */
function readGroups(s: Scanner, groups: number[], limit: number): { size: number; ipv4: boolean } {
  for (let i = 0; i < limit; i++) {
    // An embedded IPv4 address needs two slots
    if (i < limit - 1) {
      const v4 = s.readSeparator(':', i, readIpv4);
      if (v4 !== null) {
        const [a, b, c, d] = v4.octets();
        groups[i] = (a << 8) | b;
        groups[i + 1] = (c << 8) | d;
        return { size: i + 2, ipv4: true };
      }
    }

    const group = s.readSeparator(':', i, p => p.readNumber(16, 4, true, U16_MAX));
    if (group === null) {
      return { size: i, ipv4: false };
    }
    groups[i] = group;
  }
  return { size: limit, ipv4: false };
}

export function readIpv6(scanner: Scanner): Ipv6Address | null {
  return scanner.readAtomically(s => {
    const head = new Array<number>(8).fill(0);
    const front = readGroups(s, head, 8);

    if (front.size === 8) {
      return new Ipv6Address(head);
    }

    // IPv4 is only allowed as the last component, never before '::'
    if (front.ipv4) {
      return null;
    }

    if (!s.readGivenChar(':') || !s.readGivenChar(':')) {
      return null;
    }

    // '::' stands for at least one zero group
    const tail = new Array<number>(7).fill(0);
    const back = readGroups(s, tail, 8 - (front.size + 1));

    for (let i = 0; i < back.size; i++) {
      head[8 - back.size + i] = tail[i];
    }
    return new Ipv6Address(head);
  });
}

export function readIp(scanner: Scanner): IpAddr | null {
  return readIpv4(scanner) ?? readIpv6(scanner);
}

// ─── SCION ───────────────────────────────────────────────────────────

/**
 * AS number: one hex group (low 16 bits) or exactly three. Two groups are
 * rejected rather than guessed at.
 */
export function readAsNumber(scanner: Scanner): bigint | null {
  const readGroup = (p: Scanner): number | null => p.readNumber(16, 4, true, U16_MAX);

  return scanner.readAtomically(s => {
    const first = readGroup(s);
    if (first === null) return null;

    let groups: [number, number, number] = [0, 0, first];
    if (s.peekChar() === ':') {
      const second = s.readSeparator(':', 1, readGroup);
      if (second === null) return null;
      const third = s.readSeparator(':', 1, readGroup);
      if (third === null) return null;
      groups = [first, second, third];
    }

    const dotted = groups.map(g => g.toString(16).padStart(4, '0')).join(':');
    return asFromDottedHex(dotted);
  });
}

/**
 * `ISD-AS,HOST`. Brackets around the host are optional and are not
 * checked for balance.
 */
export function readScionAddr(scanner: Scanner): ScionAddress | null {
  return scanner.readAtomically(s => {
    const isd = s.readNumber(10, 6, true, U16_MAX);
    if (isd === null || !s.readGivenChar('-')) return null;

    const as = readAsNumber(s);
    if (as === null || !s.readGivenChar(',')) return null;

    s.readGivenChar('[');
    const host = readIp(s);
    s.readGivenChar(']');
    if (host === null) return null;

    return new ScionAddress(makeIa(isd, as), host);
  });
}

export function readL3Addr(scanner: Scanner): L3Addr | null {
  return readScionAddr(scanner) ?? readIp(scanner);
}

// ─── Sockets ─────────────────────────────────────────────────────────

/** ':' followed by a decimal port */
function readPort(scanner: Scanner): number | null {
  return scanner.readAtomically(s => (s.readGivenChar(':') ? s.readNumber(10, null, true, U16_MAX) : null));
}

/** '%' followed by a decimal scope id */
function readScopeId(scanner: Scanner): number | null {
  return scanner.readAtomically(s => (s.readGivenChar('%') ? s.readNumber(10, null, true, U32_MAX) : null));
}

export function readSocketV4(scanner: Scanner): SocketAddrV4 | null {
  return scanner.readAtomically(s => {
    const ip = readIpv4(s);
    if (ip === null) return null;
    const port = readPort(s);
    if (port === null) return null;
    return new SocketAddrV4(ip, port);
  });
}

export function readSocketV6(scanner: Scanner): SocketAddrV6 | null {
  return scanner.readAtomically(s => {
    if (!s.readGivenChar('[')) return null;
    const ip = readIpv6(s);
    if (ip === null) return null;
    const scopeId = readScopeId(s) ?? 0;
    if (!s.readGivenChar(']')) return null;

    const port = readPort(s);
    if (port === null) return null;
    return new SocketAddrV6(ip, port, 0, scopeId);
  });
}

export function readSocketScion(scanner: Scanner): SocketAddrScion | null {
  return scanner.readAtomically(s => {
    const addr = readScionAddr(s);
    if (addr === null) return null;
    const port = readPort(s);
    if (port === null) return null;
    return new SocketAddrScion(addr, port);
  });
}

/**
 * First of V4, V6, SCION that matches wins
 */
export function readSocket(scanner: Scanner): SocketAddr | null {
  return readSocketV4(scanner) ?? readSocketV6(scanner) ?? readSocketScion(scanner);
}
