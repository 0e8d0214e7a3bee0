export type TKeyValue = {
  key: string
  /** Absent when the argument has no `=`. */
  value?: string
}

/** Splits `key=value` at the first `=`. */
export function parseKeyValue(argument: string): TKeyValue {
  const separator = argument.indexOf('=')
  if (separator === -1) return { key: argument }
  return { key: argument.slice(0, separator), value: argument.slice(separator + 1) }
}

/** Standard Google query parameters accepted by every method, by their command-line name. */
export const GLOBAL_PARAMETERS: ReadonlyMap<string, string> = new Map([
  ['$-xgafv', '$.xgafv'],
  ['access-token', 'access_token'],
  ['alt', 'alt'],
  ['callback', 'callback'],
  ['fields', 'fields'],
  ['key', 'key'],
  ['oauth-token', 'oauth_token'],
  ['pretty-print', 'prettyPrint'],
  ['quota-user', 'quotaUser'],
  ['upload-type', 'uploadType'],
  ['upload-protocol', 'upload_protocol'],
])

export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index)
  for (let i = 1; i <= a.length; i++) {
    const current = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost)
    }
    previous = current
  }
  return previous[b.length]
}

/** Closest candidate within a third of the word's length (at least one edit), if any. */
export function closestMatch(word: string, candidates: Iterable<string>): string | undefined {
  const limit = Math.max(1, Math.floor(word.length / 3))
  let best: string | undefined
  let bestDistance = Infinity
  for (const candidate of candidates) {
    const distance = levenshtein(word, candidate)
    if (distance < bestDistance) {
      best = candidate
      bestDistance = distance
    }
  }
  return bestDistance <= limit ? best : undefined
}

/**
 * Corrects each `.`-separated segment of `path` against `candidates`. Returns undefined when
 * nothing changes.
 */
export function didYouMean(path: string, candidates: readonly string[]): string | undefined {
  const corrected = path
    .split('.')
    .map((segment) => (segment === '' ? segment : (closestMatch(segment, candidates) ?? segment)))
    .join('.')
  return corrected === path ? undefined : corrected
}
