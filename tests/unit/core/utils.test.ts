import { describe, expect, it } from 'vitest'
import {
  createTimeoutSignal,
  normalizeBaseUrl,
  resolveFetch,
  toCamelCase,
  toKebabCase,
  validateRequiredStrings,
  validateUrl,
} from '../../../src/core/utils.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'

describe('normalizeBaseUrl', () => {
  it('appends a trailing slash when missing', () => {
    expect(normalizeBaseUrl('https://example.test')).toBe('https://example.test/')
  })

  it('leaves a trailing slash alone', () => {
    expect(normalizeBaseUrl('https://example.test/')).toBe('https://example.test/')
  })
})

describe('resolveFetch', () => {
  it('prefers the override', () => {
    const override: typeof fetch = async () => new Response('')
    expect(resolveFetch(override)).toBe(override)
  })

  it('falls back to the global fetch', () => {
    expect(resolveFetch()).toBe(globalThis.fetch)
  })
})

describe('createTimeoutSignal', () => {
  it('aborts after the timeout', async () => {
    const { signal, cleanup } = createTimeoutSignal(5)
    await new Promise((resolve) => setTimeout(resolve, 20))
    expect(signal.aborted).toBe(true)
    cleanup()
  })

  it('follows the outer signal', () => {
    const outer = new AbortController()
    const { signal, cleanup } = createTimeoutSignal(60_000, outer.signal)
    outer.abort()
    expect(signal.aborted).toBe(true)
    cleanup()
  })

  it('does not abort once cleaned up', async () => {
    const { signal, cleanup } = createTimeoutSignal(5)
    cleanup()
    await new Promise((resolve) => setTimeout(resolve, 20))
    expect(signal.aborted).toBe(false)
  })
})

describe('validateRequiredStrings', () => {
  it('accepts non-empty strings', () => {
    expect(() => validateRequiredStrings({ a: 'x', b: 'y' }, ['a', 'b'])).not.toThrow()
  })

  it('names the first missing key', () => {
    expect(() => validateRequiredStrings({ a: 'x', b: '' }, ['a', 'b'])).toThrow(
      new ConfigurationError('b must be a non-empty string'),
    )
  })

  it('rejects non-string values', () => {
    expect(() => validateRequiredStrings({ a: 42 }, ['a'])).toThrow(ConfigurationError)
  })
})

describe('validateUrl', () => {
  it('accepts absolute URLs', () => {
    expect(() => validateUrl('baseUrl', 'https://example.test/')).not.toThrow()
  })

  it('rejects anything else', () => {
    expect(() => validateUrl('baseUrl', 'not a url')).toThrow('Invalid baseUrl: "not a url"')
  })
})

describe('case conversion', () => {
  it('converts camelCase to kebab-case', () => {
    expect(toKebabCase('pageSize')).toBe('page-size')
    expect(toKebabCase('reportsCountChromeVersions')).toBe('reports-count-chrome-versions')
    expect(toKebabCase('name')).toBe('name')
  })

  it('converts kebab-case to camelCase', () => {
    expect(toCamelCase('page-size')).toBe('pageSize')
    expect(toCamelCase('display-name')).toBe('displayName')
  })
})
