/**
 * Width/precision padding for canonical address text.
 */

import { LONGEST_TEXT, resolveFormatOptions, type FormatOptions, type TextFamily } from '@/network/core/config';
import { DisplayBuffer } from './DisplayBuffer';

/**
 * Truncate to `precision` characters, then pad to `width` with `fill`.
 */
export function pad(text: string, options: FormatOptions = {}): string {
  const { width, precision, fill, align } = resolveFormatOptions(options);

  const body = precision !== undefined && text.length > precision ? text.slice(0, precision) : text;
  if (width === undefined || body.length >= width) {
    return body;
  }

  const missing = width - body.length;
  switch (align) {
    case 'left':
      return body + fill.repeat(missing);
    case 'right':
      return fill.repeat(missing) + body;
    case 'center': {
      const before = Math.floor(missing / 2);
      return fill.repeat(before) + body + fill.repeat(missing - before);
    }
  }
}

/**
 * Produce the canonical text of a value, padded when the caller asks for a
 * width or a precision.
 *
 * Without either option the text is returned as rendered; otherwise it is
 * staged through a buffer sized to the family's longest text first.
 */
export function formatPadded(family: TextFamily, render: () => string, options?: FormatOptions): string {
  if (options === undefined || (options.width === undefined && options.precision === undefined)) {
    return render();
  }
  const buffer = new DisplayBuffer(LONGEST_TEXT[family].length);
  buffer.write(render());
  return pad(buffer.asString(), options);
}
