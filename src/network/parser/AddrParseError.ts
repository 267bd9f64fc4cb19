/**
 * Closed set of grammars a parse entry point can fail on.
 *
 * The error says which grammar was rejected and nothing else: no position,
 * no partial value.
 */
export type AddrKind =
  | 'ip'
  | 'ipv4'
  | 'ipv6'
  | 'as'
  | 'scion'
  | 'l3'
  | 'socket'
  | 'socketV4'
  | 'socketV6'
  | 'socketScion';

const DESCRIPTIONS: Record<AddrKind, string> = {
  ip: 'invalid IP address syntax',
  ipv4: 'invalid IPv4 address syntax',
  ipv6: 'invalid IPv6 address syntax',
  as: 'invalid AS number syntax',
  scion: 'invalid SCION address syntax',
  l3: 'invalid L3 address syntax',
  socket: 'invalid socket address syntax',
  socketV4: 'invalid IPv4 socket address syntax',
  socketV6: 'invalid IPv6 socket address syntax',
  socketScion: 'invalid SCION socket address syntax',
};

export class AddrParseError extends Error {
  public readonly kind: AddrKind;

  constructor(kind: AddrKind) {
    super(DESCRIPTIONS[kind]);
    this.name = 'AddrParseError';
    this.kind = kind;
  }

  equals(other: AddrParseError): boolean {
    return this.kind === other.kind;
  }
}
