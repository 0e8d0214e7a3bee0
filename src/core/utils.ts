import { ConfigurationError } from './errors.ts'

/** Google base URLs end in `/` so relative templates append directly. */
export function normalizeBaseUrl(url: string): string {
  return url.endsWith('/') ? url : `${url}/`
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? (globalThis as unknown as { fetch?: typeof fetch }).fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, cleanup: () => clearTimeout(timeoutId) }
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    if (!options[key] || typeof options[key] !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

export function validateUrl(name: string, value: string): void {
  try {
    new URL(value)
  } catch {
    throw new ConfigurationError(`Invalid ${name}: "${value}"`)
  }
}

/** `pageSize` → `page-size`; the form parameters take on the command line. */
export function toKebabCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)
}

/** `page-size` → `pageSize`. */
export function toCamelCase(name: string): string {
  return name.replace(/-([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase())
}
