import { z } from 'zod'
import { JsonDecodeError, type TServerErrorDetail } from './errors.ts'

const serverErrorEnvelopeSchema = z.object({
  error: z
    .object({
      code: z.number().int().optional(),
      message: z.string().optional(),
      status: z.string().optional(),
      details: z.array(z.record(z.unknown())).optional(),
      errors: z.array(z.record(z.unknown())).optional(),
    })
    .passthrough(),
})

function parseJson(body: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(body) }
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) }
  }
}

/** Reads a Google error envelope out of a failed response body, if it is one. */
export function parseServerError(body: string): TServerErrorDetail | undefined {
  const parsed = parseJson(body)
  if (!parsed.ok) return undefined
  const envelope = serverErrorEnvelopeSchema.safeParse(parsed.value)
  return envelope.success ? envelope.data.error : undefined
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ')
}

/**
 * Decodes a successful response body into `schema`. An empty body decodes as `{}`, which is
 * what methods returning `google.protobuf.Empty` send.
 */
export function decodeResponse<T>(
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const parsed = parseJson(body.trim() === '' ? '{}' : body)
  if (!parsed.ok) throw new JsonDecodeError(body, parsed.error.message, parsed.error)

  const result = schema.safeParse(parsed.value)
  if (!result.success) throw new JsonDecodeError(body, formatIssues(result.error), result.error)
  return result.data
}
