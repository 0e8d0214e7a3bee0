import { ConfigurationError } from './errors.ts'
import type { Params } from './params.ts'

const TOKEN_PATTERN = /\{(\+?)([A-Za-z0-9_.$-]+)\}/g

// Characters left as-is by reserved expansion inside a path: unreserved, '/', and the
// reserved characters that carry no meaning within a path segment.
const RESERVED_PATH_SAFE = /[A-Za-z0-9\-._~/:@!$&'()*+,;=]/

function encodeReserved(value: string): string {
  let encoded = ''
  for (const character of value) {
    encoded += RESERVED_PATH_SAFE.test(character) ? character : encodeURIComponent(character)
  }
  return encoded
}

function encodeSimple(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (character) => `%${character.charCodeAt(0).toString(16).toUpperCase()}`,
  )
}

/** Names of the parameters a template consumes, in order of appearance. */
export function templateParameterNames(template: string): string[] {
  return Array.from(template.matchAll(TOKEN_PATTERN), (match) => match[2])
}

/**
 * Replaces `{+name}` and `{name}` tokens with the values stored in `params` and removes the
 * consumed names from it. `{+name}` keeps `/` and other path-safe reserved characters.
 */
export function expandTemplate(template: string, params: Params): string {
  const consumed: string[] = []
  const expanded = template.replace(
    TOKEN_PATTERN,
    (_token, reserved: string, name: string) => {
      const value = params.get(name)
      if (value === undefined) {
        throw new ConfigurationError(`Missing value for path parameter '${name}'`)
      }
      consumed.push(name)
      return reserved ? encodeReserved(value) : encodeSimple(value)
    },
  )
  params.remove(consumed)
  return expanded
}

/** Joins a base URL ending in `/` with an expanded relative path and the query string. */
export function buildUrl(baseUrl: string, relativePath: string, params: Params): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`
  const path = relativePath.replace(/^\/+/, '')
  const query = new URLSearchParams(params.toArray()).toString()
  return query ? `${base}${path}?${query}` : `${base}${path}`
}
