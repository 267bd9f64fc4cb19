/**
 * Endpoint address parsing and canonical formatting: IPv4, IPv6 and SCION
 * addresses and sockets.
 */

export * from './network/core';
export * from './network/parser';
export { DisplayBuffer } from './network/format/DisplayBuffer';
export { pad, formatPadded } from './network/format/pad';
export { formatIpv6Segments, formatIpv6Full } from './network/format/ipv6';
export {
  MAX_ISD,
  MAX_AS,
  MAX_LEGACY_AS,
  isValidIsd,
  isValidAs,
  makeIa,
  asFromIa,
  isdFromIa,
  asFromDottedHex,
  asToDottedHex,
  formatAs,
} from './domain/network/ia';
export { Ipv4Address } from './domain/network/value-objects/Ipv4Address';
export type { Octets4 } from './domain/network/value-objects/Ipv4Address';
export { Ipv6Address } from './domain/network/value-objects/Ipv6Address';
export {
  ipAddrFromString,
  tryIpAddrFromString,
  ipAddrFromOctets,
  ipAddrEquals,
  compareIpAddr,
  toCanonicalIp,
  ipHostText,
} from './domain/network/value-objects/IpAddr';
export type { IpAddr } from './domain/network/value-objects/IpAddr';
export { ScionAddress } from './domain/network/value-objects/ScionAddress';
export {
  SocketAddrV4,
  SocketAddrV6,
  SocketAddrScion,
  socketAddrFromString,
  trySocketAddrFromString,
  socketAddrFromIp,
  socketAddrHost,
  socketAddrPort,
  withSocketPort,
  withSocketIp,
  socketAddrEquals,
} from './domain/network/value-objects/SocketAddress';
export type { SocketAddr } from './domain/network/value-objects/SocketAddress';
