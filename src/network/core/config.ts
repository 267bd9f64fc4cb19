/**
 * Configuration schemas for padded formatting and the logger.
 */

import { z } from 'zod';

// ─── Longest canonical texts ─────────────────────────────────────────
//
// Staging buffers for padded output are sized to these. A longer output
// means a formatter bug, not bad input.

export const LONGEST_TEXT = {
  ipv4: '255.255.255.255',
  ipv6: 'ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff',
  socketV4: '255.255.255.255:65535',
  socketV6: '[ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff%4294967295]:65535',
  // 'ffff:ffff:ffff' is the longest AS rendering; hosts may be bracketed IPv6
  scion: '65535-ffff:ffff:ffff,[ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff]',
  socketScion: '65535-ffff:ffff:ffff,[ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff]:65535',
} as const;

export type TextFamily = keyof typeof LONGEST_TEXT;

// ─── Format options ──────────────────────────────────────────────────

export const AlignSchema = z.enum(['left', 'right', 'center']);

export const FormatOptionsSchema = z.object({
  width: z.number().int().min(0).optional(),
  precision: z.number().int().min(0).optional(),
  fill: z.string().length(1, 'Fill must be a single character').default(' '),
  align: AlignSchema.default('left'),
});

export type Align = z.infer<typeof AlignSchema>;
export type FormatOptions = z.input<typeof FormatOptionsSchema>;
export type ResolvedFormatOptions = z.output<typeof FormatOptionsSchema>;

/**
 * Validate caller-supplied format options and fill in defaults.
 *
 * @throws {z.ZodError} If an option is out of range
 */
export function resolveFormatOptions(options: FormatOptions = {}): ResolvedFormatOptions {
  return FormatOptionsSchema.parse(options);
}

// ─── Logger options ──────────────────────────────────────────────────

export const LoggerOptionsSchema = z.object({
  maxLogs: z.number().int().min(2).default(10000),
});

export type LoggerOptions = z.input<typeof LoggerOptionsSchema>;
