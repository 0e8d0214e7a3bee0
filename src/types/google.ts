import { z } from 'zod'

/**
 * Object schema for a discovery message. Fields the schema does not name are passed through,
 * so newer server fields survive decoding and reach CLI output untouched.
 */
export function message<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).passthrough()
}

/** int64 and uint64 values travel as decimal strings in Google JSON. */
export const int64 = z.string().regex(/^-?\d+$/, 'expected an int64 decimal string')

/** RFC 3339 timestamp, e.g. `2024-03-01T12:00:00Z`. */
export const timestamp = z.string()

/** Duration in seconds with up to nine fractional digits and an `s` suffix, e.g. `3.5s`. */
export const duration = z.string().regex(/^-?\d+(\.\d{1,9})?s$/, 'expected a duration like "3.5s"')

/** Comma-separated list of field paths, e.g. `name,displayName`. */
export const fieldMask = z.string()

/**
 * A whole or partial calendar date. Each field may be 0: a zero year is a date without a
 * year, a zero month a year on its own, a zero day a year and month. 0 is a value, not absence.
 */
export const googleTypeDateSchema = message({
  day: z.number().int().min(0).max(31).optional(),
  month: z.number().int().min(0).max(12).optional(),
  year: z.number().int().min(0).max(9999).optional(),
})
export type TGoogleTypeDate = z.infer<typeof googleTypeDateSchema>

export const googleTypeMoneySchema = message({
  currencyCode: z.string().optional(),
  nanos: z.number().int().optional(),
  units: int64.optional(),
})
export type TGoogleTypeMoney = z.infer<typeof googleTypeMoneySchema>

export const googleRpcStatusSchema = message({
  code: z.number().int().optional(),
  details: z.array(z.record(z.unknown())).optional(),
  message: z.string().optional(),
})
export type TGoogleRpcStatus = z.infer<typeof googleRpcStatusSchema>

/** `google.protobuf.Empty`: what delete-style methods return. */
export const emptySchema = message({})
export type TEmpty = z.infer<typeof emptySchema>

