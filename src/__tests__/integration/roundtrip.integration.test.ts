/**
 * Integration tests: canonical text survives parse -> display -> parse
 */

import { describe, it, expect } from 'vitest';
import { Ipv4Address } from '@/domain/network/value-objects/Ipv4Address';
import { ipAddrFromString, ipHostText } from '@/domain/network/value-objects/IpAddr';
import { ScionAddress } from '@/domain/network/value-objects/ScionAddress';
import { socketAddrEquals, socketAddrFromString } from '@/domain/network/value-objects/SocketAddress';

describe('Round trip', () => {
  it('should print every octet value back as parsed', () => {
    for (let v = 0; v <= 255; v++) {
      const text = `${v}.${255 - v}.${v % 10}.0`;
      expect(Ipv4Address.parse(text).toString()).toBe(text);
    }
  });

  it.each([
    '::',
    '::1',
    '1::',
    '2001:db8::1',
    'fe80::1:2',
    '1:0:0:1::1',
    '1::1:0:0:1:1',
    '1:2:3:4:5:6:7:8',
    '::ffff:192.10.2.255',
  ])('should keep canonical IPv6 text %s', text => {
    expect(ipAddrFromString(text).toString()).toBe(text);
  });

  it.each([
    ['2001:0DB8:0:0:0:0:0:0001', '2001:db8::1'],
    ['0:0:0:0:0:0:0:1', '::1'],
    ['1:2:3:4:5:6:7::', '1:2:3:4:5:6:7:0'],
    ['::ffff:c00a:2ff', '::ffff:192.10.2.255'],
  ])('should canonicalize %s to %s', (input, expected) => {
    const once = ipAddrFromString(input).toString();
    expect(once).toBe(expected);
    expect(ipAddrFromString(once).toString()).toBe(expected);
  });

  it.each([
    '19-ffaa:1:1067,127.0.0.1',
    '1-ff00:0:110,[2001:db8::1]',
    '65535-ffff:ffff:ffff,[::ffff:10.0.0.1]',
    '0-ffaa:0:1067,0.0.0.0',
  ])('should keep canonical SCION text %s', text => {
    const addr = ScionAddress.parse(text);
    expect(addr.toString()).toBe(text);
    expect(ScionAddress.parse(addr.toString()).equals(addr)).toBe(true);
  });

  it.each([
    ['0019-ffaa:0001:1067,[0:0::1]:053', '19-ffaa:1:1067,[::1]:53'],
    ['[0:0:0:0:0:0:0:1]:80', '[::1]:80'],
    ['[fe80::1%0]:80', '[fe80::1]:80'],
  ])('should canonicalize socket text %s', (input, expected) => {
    const socket = socketAddrFromString(input);
    expect(socket.toString()).toBe(expected);
    expect(socketAddrEquals(socketAddrFromString(socket.toString()), socket)).toBe(true);
  });

  it('should not canonicalize an octal-looking octet', () => {
    expect(() => socketAddrFromString('010.0.0.1:1')).toThrow('invalid socket address syntax');
  });

  it('should bracket only IPv6 hosts', () => {
    expect(ipHostText(ipAddrFromString('10.0.0.1'))).toBe('10.0.0.1');
    expect(ipHostText(ipAddrFromString('::1'))).toBe('[::1]');
  });
});
