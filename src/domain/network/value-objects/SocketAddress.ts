/**
 * Socket addresses - a host address plus a 16-bit port.
 *
 * Three families share the `SocketAddr` union, discriminated by `type`:
 *   - 'v4'    → SocketAddrV4    `1.2.3.4:80`
 *   - 'v6'    → SocketAddrV6    `[::1%3]:80` (flow info is kept but never printed)
 *   - 'scion' → SocketAddrScion `19-ffaa:1:1067,[::1]:80`
 */

import type { FormatOptions } from '@/network/core/config';
import { unwrap, toNullable } from '@/network/core/result';
import { formatPadded } from '@/network/format/pad';
import { parseSocket, parseSocketScion, parseSocketV4, parseSocketV6 } from '@/network/parser';
import type { IpAddr } from './IpAddr';
import type { Ipv4Address } from './Ipv4Address';
import type { Ipv6Address } from './Ipv6Address';
import { ScionAddress } from './ScionAddress';

function checkUint(value: number, max: number, what: string): number {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new Error(`Invalid ${what}: must be integer between 0 and ${max}, got ${value}`);
  }
  return value;
}

const MAX_PORT = 0xffff;
const MAX_U32 = 0xffffffff;

// ─── IPv4 ────────────────────────────────────────────────────────────

export class SocketAddrV4 {
  public readonly type = 'v4' as const;
  public readonly ip: Ipv4Address;
  public readonly port: number;

  constructor(ip: Ipv4Address, port: number) {
    this.ip = ip;
    this.port = checkUint(port, MAX_PORT, 'port');
  }

  static parse(text: string): SocketAddrV4 {
    return unwrap(parseSocketV4(text));
  }

  static tryParse(text: string): SocketAddrV4 | null {
    return toNullable(parseSocketV4(text));
  }

  withIp(ip: Ipv4Address): SocketAddrV4 {
    return new SocketAddrV4(ip, this.port);
  }

  withPort(port: number): SocketAddrV4 {
    return new SocketAddrV4(this.ip, port);
  }

  equals(other: SocketAddrV4): boolean {
    return this.port === other.port && this.ip.equals(other.ip);
  }

  toString(): string {
    return `${this.ip.toString()}:${this.port}`;
  }

  format(options?: FormatOptions): string {
    return formatPadded('socketV4', () => this.toString(), options);
  }

  toJSON(): string {
    return this.toString();
  }
}

// ─── IPv6 ────────────────────────────────────────────────────────────

export class SocketAddrV6 {
  public readonly type = 'v6' as const;
  public readonly ip: Ipv6Address;
  public readonly port: number;
  /** sin6_flowinfo: traffic class and flow label (RFC 2553 §3.3) */
  public readonly flowinfo: number;
  /** sin6_scope_id; 0 means no scope */
  public readonly scopeId: number;

  constructor(ip: Ipv6Address, port: number, flowinfo = 0, scopeId = 0) {
    this.ip = ip;
    this.port = checkUint(port, MAX_PORT, 'port');
    this.flowinfo = checkUint(flowinfo, MAX_U32, 'flow info');
    this.scopeId = checkUint(scopeId, MAX_U32, 'scope id');
  }

  static parse(text: string): SocketAddrV6 {
    return unwrap(parseSocketV6(text));
  }

  static tryParse(text: string): SocketAddrV6 | null {
    return toNullable(parseSocketV6(text));
  }

  withIp(ip: Ipv6Address): SocketAddrV6 {
    return new SocketAddrV6(ip, this.port, this.flowinfo, this.scopeId);
  }

  withPort(port: number): SocketAddrV6 {
    return new SocketAddrV6(this.ip, port, this.flowinfo, this.scopeId);
  }

  withFlowinfo(flowinfo: number): SocketAddrV6 {
    return new SocketAddrV6(this.ip, this.port, flowinfo, this.scopeId);
  }

  withScopeId(scopeId: number): SocketAddrV6 {
    return new SocketAddrV6(this.ip, this.port, this.flowinfo, scopeId);
  }

  equals(other: SocketAddrV6): boolean {
    return (
      this.port === other.port &&
      this.flowinfo === other.flowinfo &&
      this.scopeId === other.scopeId &&
      this.ip.equals(other.ip)
    );
  }

  toString(): string {
    return this.scopeId === 0
      ? `[${this.ip.toString()}]:${this.port}`
      : `[${this.ip.toString()}%${this.scopeId}]:${this.port}`;
  }

  format(options?: FormatOptions): string {
    return formatPadded('socketV6', () => this.toString(), options);
  }

  toJSON(): string {
    return this.toString();
  }
}

// ─── SCION ───────────────────────────────────────────────────────────

export class SocketAddrScion {
  public readonly type = 'scion' as const;
  public readonly addr: ScionAddress;
  public readonly port: number;

  constructor(addr: ScionAddress, port: number) {
    this.addr = addr;
    this.port = checkUint(port, MAX_PORT, 'port');
  }

  static fromParts(ia: bigint, host: IpAddr, port: number): SocketAddrScion {
    return new SocketAddrScion(new ScionAddress(ia, host), port);
  }

  static parse(text: string): SocketAddrScion {
    return unwrap(parseSocketScion(text));
  }

  static tryParse(text: string): SocketAddrScion | null {
    return toNullable(parseSocketScion(text));
  }

  get ia(): bigint {
    return this.addr.ia;
  }

  get host(): IpAddr {
    return this.addr.host;
  }

  withIa(ia: bigint): SocketAddrScion {
    return new SocketAddrScion(this.addr.withIa(ia), this.port);
  }

  withHost(host: IpAddr): SocketAddrScion {
    return new SocketAddrScion(this.addr.withHost(host), this.port);
  }

  withPort(port: number): SocketAddrScion {
    return new SocketAddrScion(this.addr, port);
  }

  equals(other: SocketAddrScion): boolean {
    return this.port === other.port && this.addr.equals(other.addr);
  }

  toString(): string {
    return `${this.addr.toString()}:${this.port}`;
  }

  format(options?: FormatOptions): string {
    return formatPadded('socketScion', () => this.toString(), options);
  }

  toJSON(): string {
    return this.toString();
  }
}

// ─── Union helpers ───────────────────────────────────────────────────

export type SocketAddr = SocketAddrV4 | SocketAddrV6 | SocketAddrScion;

/**
 * @throws {AddrParseError} If no socket grammar matches the whole text
 */
export function socketAddrFromString(text: string): SocketAddr {
  return unwrap(parseSocket(text));
}

export function trySocketAddrFromString(text: string): SocketAddr | null {
  return toNullable(parseSocket(text));
}

/** IPv4 hosts give a V4 socket, IPv6 hosts a V6 socket with no flow info or scope */
export function socketAddrFromIp(ip: IpAddr, port: number): SocketAddrV4 | SocketAddrV6 {
  return ip.type === 'v4' ? new SocketAddrV4(ip, port) : new SocketAddrV6(ip, port);
}

export function socketAddrHost(socket: SocketAddr): IpAddr {
  switch (socket.type) {
    case 'v4':
    case 'v6':
      return socket.ip;
    case 'scion':
      return socket.host;
  }
}

export function socketAddrPort(socket: SocketAddr): number {
  return socket.port;
}

export function withSocketPort(socket: SocketAddr, port: number): SocketAddr {
  return socket.withPort(port);
}

/**
 * Replace the host address. A SCION socket keeps its IA; an IP socket whose
 * family differs from the new address is rebuilt in the new family with
 * the same port.
 */
export function withSocketIp(socket: SocketAddr, ip: IpAddr): SocketAddr {
  if (socket.type === 'scion') return socket.withHost(ip);
  if (socket.type === 'v4' && ip.type === 'v4') return socket.withIp(ip);
  if (socket.type === 'v6' && ip.type === 'v6') return socket.withIp(ip);
  return socketAddrFromIp(ip, socket.port);
}

export function socketAddrEquals(a: SocketAddr, b: SocketAddr): boolean {
  if (a.type === 'v4' && b.type === 'v4') return a.equals(b);
  if (a.type === 'v6' && b.type === 'v6') return a.equals(b);
  if (a.type === 'scion' && b.type === 'scion') return a.equals(b);
  return false;
}
