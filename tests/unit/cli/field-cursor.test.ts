import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { buildRequestBody, FieldCursor, fieldNames } from '../../../src/cli/field-cursor.ts'
import { int64, message } from '../../../src/types/google.ts'

const requestSchema = message({
  budget: message({
    displayName: z.string().optional(),
    notify: z.boolean().optional(),
    projects: z.array(z.string()).optional(),
    amount: message({
      specifiedAmount: message({
        currencyCode: z.string().optional(),
        nanos: z.number().int().optional(),
        units: int64.optional(),
      }).optional(),
    }).optional(),
    thresholdRules: z.array(message({ thresholdPercent: z.number().optional() })).optional(),
  }).optional(),
})

function cursorAt(...paths: string[]): string {
  const cursor = new FieldCursor()
  for (const path of paths) cursor.set(path)
  return cursor.toString()
}

describe('FieldCursor', () => {
  it('descends relative to the current position', () => {
    expect(cursorAt('budget', 'amount.specified-amount')).toBe('budget.amount.specified-amount')
  })

  it('starts from the root after a leading dot', () => {
    expect(cursorAt('budget.amount', '.budget')).toBe('budget')
  })

  it('returns to the root on a lone dot', () => {
    expect(cursorAt('budget.amount', '.')).toBe('')
  })

  it('steps up one level per extra dot', () => {
    expect(cursorAt('budget.amount', '..filter')).toBe('budget.filter')
    expect(cursorAt('a..b')).toBe('b')
  })

  it('rejects stepping above the root', () => {
    expect(() => cursorAt('..')).toThrow("'..' steps above the root of the request")
  })

  it('rejects a trailing dot', () => {
    expect(() => cursorAt('budget.')).toThrow("'budget.' must not end with '.'")
  })

  it('rejects an empty path', () => {
    expect(() => cursorAt('')).toThrow('Field path must not be empty')
  })

  it('keeps its position when a move fails', () => {
    const cursor = new FieldCursor()
    cursor.set('budget')

    expect(() => cursor.set('amount.')).toThrow()
    expect(cursor.toString()).toBe('budget')
  })
})

describe('fieldNames', () => {
  it('lists every kebab-case field name once, sorted', () => {
    expect(fieldNames(requestSchema)).toEqual([
      'amount',
      'budget',
      'currency-code',
      'display-name',
      'nanos',
      'notify',
      'projects',
      'specified-amount',
      'threshold-percent',
      'threshold-rules',
      'units',
    ])
  })
})

describe('buildRequestBody', () => {
  it('builds a typed body, moving the cursor on bare paths', () => {
    const issues: string[] = []

    const body = buildRequestBody(
      requestSchema,
      [
        'budget.display-name=Q3',
        'budget.amount.specified-amount',
        'units=100',
        'nanos=5',
        'currency-code=EUR',
        '.budget.notify=true',
        '.budget.projects=projects/1',
        '.budget.projects=projects/2',
      ],
      issues,
    )

    expect(issues).toEqual([])
    expect(body).toEqual({
      budget: {
        displayName: 'Q3',
        amount: { specifiedAmount: { units: '100', nanos: 5, currencyCode: 'EUR' } },
        notify: true,
        projects: ['projects/1', 'projects/2'],
      },
    })
  })

  it('suggests the closest name for an unknown field', () => {
    const issues: string[] = []

    buildRequestBody(requestSchema, ['budget.display-nam=Q3'], issues)

    expect(issues).toEqual(["Field 'budget.display-nam' does not exist, did you mean 'budget.display-name'?"])
  })

  it('reports an unknown field without a suggestion when none is close', () => {
    const issues: string[] = []

    buildRequestBody(requestSchema, ['budget.xyzzy=1'], issues)

    expect(issues).toEqual(["Field 'budget.xyzzy' does not exist"])
  })

  it('refuses values for message fields', () => {
    const issues: string[] = []

    buildRequestBody(requestSchema, ['budget=5'], issues)

    expect(issues).toEqual(["Field 'budget' is not a value field; address one of its fields instead"])
  })

  it('reports values that do not parse as the field type', () => {
    const issues: string[] = []

    buildRequestBody(
      requestSchema,
      ['budget.notify=yes', 'budget.amount.specified-amount.nanos=1.5'],
      issues,
    )

    expect(issues).toEqual([
      "Failed to parse 'yes' for field 'budget.notify' as boolean",
      "Failed to parse '1.5' for field 'budget.amount.specified-amount.nanos' as integer",
    ])
  })

  it('reports malformed paths and carries on', () => {
    const issues: string[] = []

    const body = buildRequestBody(requestSchema, ['budget.=x', 'budget.display-name=ok'], issues)

    expect(issues).toEqual(["'budget.' must not end with '.'"])
    expect(body).toEqual({ budget: { displayName: 'ok' } })
  })
})
