/**
 * Scanner - cursor over an ASCII input with backtracking reads
 *
 * Every read either succeeds and advances the cursor, or returns null and
 * leaves the cursor exactly where it was. Composite readers are built by
 * chaining reads inside `readAtomically`, so a caller can try one grammar,
 * fail, and try the next one without saving positions by hand.
 *
 * @example
 * ```typescript
 * const scanner = new Scanner('10.0.0.1');
 * const octet = scanner.readNumber(10, 3, false, 0xff); // 10
 * scanner.readGivenChar('.'); // true
 * ```
 */

import { err, ok, type Result } from '@/network/core/result';
import { AddrParseError, type AddrKind } from './AddrParseError';

export type Reader<T> = (scanner: Scanner) => T | null;

export class Scanner {
  private readonly input: string;
  private position = 0;

  constructor(input: string) {
    this.input = input;
  }

  /**
   * Build a scanner over raw bytes, one character per byte
   */
  static fromAscii(bytes: Uint8Array): Scanner {
    let text = '';
    for (const byte of bytes) {
      text += String.fromCharCode(byte);
    }
    return new Scanner(text);
  }

  /** Unconsumed suffix of the input */
  remaining(): string {
    return this.input.slice(this.position);
  }

  isEmpty(): boolean {
    return this.position >= this.input.length;
  }

  /**
   * Run a reader, restoring the cursor if it fails.
   */
  readAtomically<T>(inner: Reader<T>): T | null {
    const saved = this.position;
    const result = inner(this);
    if (result === null) {
      this.position = saved;
    }
    return result;
  }

  /**
   * Run a reader and require it to consume the whole input.
   * Not atomic: the scanner is discarded after a terminal parse.
   */
  parseWith<T>(inner: Reader<T>, kind: AddrKind): Result<T, AddrParseError> {
    const result = inner(this);
    if (result === null || !this.isEmpty()) {
      return err(new AddrParseError(kind));
    }
    return ok(result);
  }

  peekChar(): string | null {
    return this.isEmpty() ? null : this.input[this.position];
  }

  readChar(): string | null {
    if (this.isEmpty()) {
      return null;
    }
    return this.input[this.position++];
  }

  /**
   * Consume the next character only if it is `target`
   */
  readGivenChar(target: string): boolean {
    return this.readAtomically(s => (s.readChar() === target ? true : null)) ?? false;
  }

  /**
   * Read `sep` when `index > 0`, then run `inner`. Lets a loop read
   * "N items separated by sep" without special-casing the first item.
   */
  readSeparator<T>(sep: string, index: number, inner: Reader<T>): T | null {
    return this.readAtomically(s => {
      if (index > 0 && !s.readGivenChar(sep)) {
        return null;
      }
      return inner(s);
    });
  }

  /**
   * Read an unsigned number in `radix`, stopping at the first non-digit.
   *
   * Fails when there is no digit, when more than `maxDigits` digits are
   * present, when the value would exceed `max`, or when `allowZeroPrefix`
   * is false and a multi-digit number starts with '0'.
   */
  readNumber(radix: number, maxDigits: number | null, allowZeroPrefix: boolean, max: number): number | null {
    return this.readAtomically(s => {
      let result = 0;
      let digitCount = 0;
      const hasLeadingZero = s.peekChar() === '0';

      for (;;) {
        const digit = s.readAtomically(inner => digitValue(inner.readChar(), radix));
        if (digit === null) break;

        digitCount++;
        if (maxDigits !== null && digitCount > maxDigits) {
          return null;
        }
        result = result * radix + digit;
        if (result > max) {
          return null;
        }
      }

      if (digitCount === 0) {
        return null;
      }
      if (!allowZeroPrefix && hasLeadingZero && digitCount > 1) {
        return null;
      }
      return result;
    });
  }
}

function digitValue(char: string | null, radix: number): number | null {
  if (char === null) return null;
  const code = char.charCodeAt(0);
  let value: number;
  if (code >= 0x30 && code <= 0x39) {
    value = code - 0x30;
  } else if (code >= 0x61 && code <= 0x7a) {
    value = code - 0x61 + 10;
  } else if (code >= 0x41 && code <= 0x5a) {
    value = code - 0x41 + 10;
  } else {
    return null;
  }
  return value < radix ? value : null;
}
