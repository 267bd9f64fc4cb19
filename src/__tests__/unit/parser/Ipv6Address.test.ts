/**
 * Unit tests for IPv6 parsing and RFC 5952 display
 */

import { describe, it, expect } from 'vitest';
import { Ipv6Address } from '@/domain/network/value-objects/Ipv6Address';
import { parseIpv6 } from '@/network/parser';

describe('Ipv6Address', () => {
  describe('parse', () => {
    it('should parse the unspecified and loopback addresses', () => {
      expect(Ipv6Address.parse('::').isUnspecified()).toBe(true);
      expect(Ipv6Address.parse('::1').isLoopback()).toBe(true);
    });

    it('should parse full notation', () => {
      const ip = Ipv6Address.parse('2001:0db8:0000:0000:0000:0000:0000:0001');
      expect(ip.segments()).toEqual([0x2001, 0xdb8, 0, 0, 0, 0, 0, 1]);
      expect(ip.toString()).toBe('2001:db8::1');
    });

    it('should parse eight groups without compression', () => {
      expect(Ipv6Address.parse('1:2:3:4:5:6:7:8').toString()).toBe('1:2:3:4:5:6:7:8');
    });

    it('should let :: stand for a single group at either end', () => {
      expect(Ipv6Address.parse('1:2:3:4:5:6:7::').segments()).toEqual([1, 2, 3, 4, 5, 6, 7, 0]);
      expect(Ipv6Address.parse('::1:2:3:4:5:6:7').segments()).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('should parse an IPv4-mapped address', () => {
      const ip = Ipv6Address.parse('::ffff:192.10.2.255');
      expect(ip.segments()).toEqual([0, 0, 0, 0, 0, 0xffff, 0xc00a, 0x02ff]);
      expect(ip.toString()).toBe('::ffff:192.10.2.255');
    });

    it('should parse an embedded IPv4 suffix after eight-slot groups', () => {
      expect(Ipv6Address.parse('1:2:3:4:5:6:1.2.3.4').segments()).toEqual([1, 2, 3, 4, 5, 6, 0x0102, 0x0304]);
      expect(Ipv6Address.parse('64:ff9b::1.2.3.4').toString()).toBe('64:ff9b::102:304');
    });

    it('should accept uppercase hex', () => {
      const ip = Ipv6Address.parse('FE80::ABCD');
      expect(ip.toString()).toBe('fe80::abcd');
      expect(ip.isUnicastLinkLocal()).toBe(true);
    });

    it.each([
      ['1::2::3', 'two :: sequences'],
      ['1.2.3.4::', 'IPv4 before ::'],
      ['12345::', 'five-digit group'],
      [':1', 'single leading colon'],
      ['1:', 'single trailing colon'],
      [':::', 'triple colon'],
      ['1:2:3:4:5:6:7', 'seven groups'],
      ['1:2:3:4:5:6:7:8:9', 'nine groups'],
      ['::1:2:3:4:5:6:7:8', ':: with eight more groups'],
      ['g::', 'non-hex digit'],
      ['fe80::1%eth0', 'zone suffix'],
      ['[::1]', 'brackets'],
    ])('should reject %s (%s)', input => {
      const result = parseIpv6(input);
      expect(result.ok).toBe(false);
      expect(result.error?.message).toBe('invalid IPv6 address syntax');
    });
  });

  describe('construction', () => {
    it('should reject bad hextets', () => {
      expect(() => new Ipv6Address([0, 0, 0])).toThrow('expected 8 hextets, got 3');
      expect(() => new Ipv6Address([0, 0, 0, 0, 0, 0, 0, 0x10000])).toThrow('Invalid IPv6 hextet: 65536');
    });

    it('should convert to and from 128-bit integers', () => {
      expect(Ipv6Address.fromBits(1n).toString()).toBe('::1');
      expect(Ipv6Address.parse('2001:db8::1').toBits()).toBe(0x20010db8000000000000000000000001n);
      expect(() => Ipv6Address.fromBits(1n << 128n)).toThrow();
    });

    it('should convert to and from octets', () => {
      const octets = Ipv6Address.LOCALHOST.octets();
      expect(octets).toHaveLength(16);
      expect(octets[15]).toBe(1);
      expect(Ipv6Address.fromOctets(octets).equals(Ipv6Address.LOCALHOST)).toBe(true);
    });
  });

  describe('IPv4 interop', () => {
    it('should extract the address of ::ffff:a.b.c.d', () => {
      const ip = Ipv6Address.parse('::ffff:10.0.0.1');
      expect(ip.toIpv4Mapped()?.toString()).toBe('10.0.0.1');
      expect(ip.toCanonical().type).toBe('v4');
      expect(ip.toCanonical().toString()).toBe('10.0.0.1');
    });

    it('should treat ::a.b.c.d as compatible but not mapped', () => {
      const ip = Ipv6Address.parse('::1.2.3.4');
      expect(ip.toString()).toBe('::102:304');
      expect(ip.toIpv4()?.toString()).toBe('1.2.3.4');
      expect(ip.toIpv4Mapped()).toBeNull();
      expect(ip.toCanonical().type).toBe('v6');
    });

    it('should return null for unrelated addresses', () => {
      expect(Ipv6Address.parse('2001:db8::1').toIpv4()).toBeNull();
    });
  });

  describe('classification', () => {
    it('should detect address ranges', () => {
      expect(Ipv6Address.parse('ff02::1').isMulticast()).toBe(true);
      expect(Ipv6Address.parse('fd00::1').isUniqueLocal()).toBe(true);
      expect(Ipv6Address.parse('fe80::1').isUniqueLocal()).toBe(false);
      expect(Ipv6Address.parse('2001:db8::1').isDocumentation()).toBe(true);
    });
  });

  describe('display', () => {
    it('should print the full form', () => {
      expect(Ipv6Address.parse('2001:db8::1').toFullString()).toBe('2001:0db8:0000:0000:0000:0000:0000:0001');
    });

    it('should pad to a width', () => {
      expect(Ipv6Address.LOCALHOST.format({ width: 6, align: 'center' })).toBe(' ::1  ');
    });

    it('should order by segments', () => {
      expect(Ipv6Address.parse('::1').compare(Ipv6Address.parse('::2'))).toBeLessThan(0);
      expect(Ipv6Address.parse('1::').compare(Ipv6Address.parse('::ffff'))).toBeGreaterThan(0);
    });
  });
});
