/**
 * Unit tests for the IpAddr union helpers
 */

import { describe, it, expect } from 'vitest';
import {
  compareIpAddr,
  ipAddrEquals,
  ipAddrFromOctets,
  ipAddrFromString,
  toCanonicalIp,
  tryIpAddrFromString,
} from '@/domain/network/value-objects/IpAddr';
import { AddrParseError, parseIp, parseIpAscii, parseIpv6Ascii } from '@/network/parser';

describe('IpAddr', () => {
  it('should try IPv4 before IPv6', () => {
    expect(ipAddrFromString('1.2.3.4').type).toBe('v4');
    expect(ipAddrFromString('::1.2.3.4').type).toBe('v6');
  });

  it('should fail with the IP kind', () => {
    expect(parseIp('1.2.3').error?.message).toBe('invalid IP address syntax');
    expect(tryIpAddrFromString('nope')).toBeNull();
    expect(() => ipAddrFromString('nope')).toThrow(AddrParseError);
  });

  it('should parse ASCII bytes', () => {
    const bytes = new TextEncoder().encode('fe80::1');
    expect(parseIpAscii(bytes).value?.type).toBe('v6');
    expect(parseIpv6Ascii(bytes).value?.toString()).toBe('fe80::1');
  });

  it('should pick the family from the octet count', () => {
    expect(ipAddrFromOctets([10, 0, 0, 1]).toString()).toBe('10.0.0.1');
    expect(ipAddrFromOctets([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1]).toString()).toBe('::1');
    expect(() => ipAddrFromOctets([1, 2])).toThrow('expected 4 or 16 octets, got 2');
  });

  it('should sort IPv4 before IPv6', () => {
    const v4 = ipAddrFromString('255.255.255.255');
    const v6 = ipAddrFromString('::');
    expect(compareIpAddr(v4, v6)).toBe(-1);
    expect(compareIpAddr(v6, v4)).toBe(1);
    expect(compareIpAddr(ipAddrFromString('10.0.0.1'), ipAddrFromString('10.0.0.2'))).toBe(-1);
    expect(compareIpAddr(ipAddrFromString('::2'), ipAddrFromString('::2'))).toBe(0);
  });

  it('should not treat a mapped address as equal to its IPv4 form', () => {
    const v4 = ipAddrFromString('10.0.0.1');
    const mapped = ipAddrFromString('::ffff:10.0.0.1');
    expect(ipAddrEquals(v4, mapped)).toBe(false);
    expect(ipAddrEquals(v4, toCanonicalIp(mapped))).toBe(true);
  });

  it('should compare parse errors by kind', () => {
    expect(new AddrParseError('scion').equals(new AddrParseError('scion'))).toBe(true);
    expect(new AddrParseError('scion').equals(new AddrParseError('socketScion'))).toBe(false);
  });
});
