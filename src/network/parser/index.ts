/**
 * Parse entry points: text (or ASCII bytes) in, validated value out.
 *
 * Each entry point runs one reader over the whole input and fails with its
 * own AddrKind when the reader fails or leaves input behind. Rejections
 * are published to the Logger at debug level.
 */

import type { IpAddr } from '@/domain/network/value-objects/IpAddr';
import type { Ipv4Address } from '@/domain/network/value-objects/Ipv4Address';
import type { Ipv6Address } from '@/domain/network/value-objects/Ipv6Address';
import type { ScionAddress } from '@/domain/network/value-objects/ScionAddress';
import type {
  SocketAddr,
  SocketAddrScion,
  SocketAddrV4,
  SocketAddrV6,
} from '@/domain/network/value-objects/SocketAddress';
import { Logger } from '@/network/core/Logger';
import { err, type Result } from '@/network/core/result';
import { AddrParseError, type AddrKind } from './AddrParseError';
import {
  readAsNumber,
  readIp,
  readIpv4,
  readIpv6,
  readL3Addr,
  readScionAddr,
  readSocket,
  readSocketScion,
  readSocketV4,
  readSocketV6,
  type L3Addr,
} from './readers';
import { Scanner, type Reader } from './Scanner';

export type ParseResult<T> = Result<T, AddrParseError>;

/** No dotted-decimal IPv4 literal is longer than this */
const MAX_IPV4_LENGTH = 15;

function logRejection(error: AddrParseError, input: string): void {
  Logger.debug('parser', 'parse:rejected', error.message, { kind: error.kind, input });
}

function run<T>(scanner: Scanner, reader: Reader<T>, kind: AddrKind): ParseResult<T> {
  const input = scanner.remaining();
  const result = scanner.parseWith(reader, kind);
  if (!result.ok) {
    logRejection(result.error, input);
  }
  return result;
}

function parseIpv4From(scanner: Scanner): ParseResult<Ipv4Address> {
  const input = scanner.remaining();
  if (input.length > MAX_IPV4_LENGTH) {
    const error = new AddrParseError('ipv4');
    logRejection(error, input);
    return err(error);
  }
  return run(scanner, readIpv4, 'ipv4');
}

// ─── Text input ──────────────────────────────────────────────────────

export function parseIpv4(text: string): ParseResult<Ipv4Address> {
  return parseIpv4From(new Scanner(text));
}

export function parseIpv6(text: string): ParseResult<Ipv6Address> {
  return run(new Scanner(text), readIpv6, 'ipv6');
}

export function parseIp(text: string): ParseResult<IpAddr> {
  return run(new Scanner(text), readIp, 'ip');
}

/** One hex group, or three colon-separated hex groups */
export function parseAsNumber(text: string): ParseResult<bigint> {
  return run(new Scanner(text), readAsNumber, 'as');
}

export function parseScion(text: string): ParseResult<ScionAddress> {
  return run(new Scanner(text), readScionAddr, 'scion');
}

/** A SCION address or, failing that, an IP address */
export function parseL3Addr(text: string): ParseResult<L3Addr> {
  return run(new Scanner(text), readL3Addr, 'l3');
}

export function parseSocketV4(text: string): ParseResult<SocketAddrV4> {
  return run(new Scanner(text), readSocketV4, 'socketV4');
}

export function parseSocketV6(text: string): ParseResult<SocketAddrV6> {
  return run(new Scanner(text), readSocketV6, 'socketV6');
}

export function parseSocketScion(text: string): ParseResult<SocketAddrScion> {
  return run(new Scanner(text), readSocketScion, 'socketScion');
}

/** Tries IPv4, then IPv6, then SCION socket grammars */
export function parseSocket(text: string): ParseResult<SocketAddr> {
  return run(new Scanner(text), readSocket, 'socket');
}

// ─── ASCII byte input ────────────────────────────────────────────────

export function parseIpv4Ascii(bytes: Uint8Array): ParseResult<Ipv4Address> {
  return parseIpv4From(Scanner.fromAscii(bytes));
}

export function parseIpv6Ascii(bytes: Uint8Array): ParseResult<Ipv6Address> {
  return run(Scanner.fromAscii(bytes), readIpv6, 'ipv6');
}

export function parseIpAscii(bytes: Uint8Array): ParseResult<IpAddr> {
  return run(Scanner.fromAscii(bytes), readIp, 'ip');
}

export function parseScionAscii(bytes: Uint8Array): ParseResult<ScionAddress> {
  return run(Scanner.fromAscii(bytes), readScionAddr, 'scion');
}

export function parseSocketAscii(bytes: Uint8Array): ParseResult<SocketAddr> {
  return run(Scanner.fromAscii(bytes), readSocket, 'socket');
}

export { AddrParseError, Scanner };
export {
  readAsNumber,
  readIp,
  readIpv4,
  readIpv6,
  readL3Addr,
  readScionAddr,
  readSocket,
  readSocketScion,
  readSocketV4,
  readSocketV6,
};
export type { AddrKind, L3Addr, Reader };
