import { describe, expect, it } from 'vitest'
import { FieldClashError } from '../../../src/core/errors.ts'
import { assertNoFieldClash, Params } from '../../../src/core/params.ts'

describe('Params', () => {
  it('keeps insertion order and duplicate names', () => {
    const params = new Params().push('b', '1').push('a', '2').push('b', '3')

    expect(params.toArray()).toEqual([
      ['b', '1'],
      ['a', '2'],
      ['b', '3'],
    ])
    expect(params.get('b')).toBe('1')
  })

  it('expands arrays and skips undefined values', () => {
    const params = new Params()
      .pushValue('projects', ['p1', 'p2'])
      .pushValue('pageSize', 10)
      .pushValue('filter', undefined)
      .pushValue('disabled', false)

    expect(params.toArray()).toEqual([
      ['projects', 'p1'],
      ['projects', 'p2'],
      ['pageSize', '10'],
      ['disabled', 'false'],
    ])
    expect(params.has('filter')).toBe(false)
  })

  it('removes every pair stored under the given names', () => {
    const params = new Params().push('name', 'x').push('alt', 'json').push('name', 'y')

    params.remove(['name'])

    expect(params.toArray()).toEqual([['alt', 'json']])
  })

  it('extends from map entries in insertion order', () => {
    const additional = new Map([
      ['quotaUser', 'q'],
      ['fields', 'name'],
    ])

    expect(new Params().push('alt', 'json').extend(additional).toArray()).toEqual([
      ['alt', 'json'],
      ['quotaUser', 'q'],
      ['fields', 'name'],
    ])
  })
})

describe('assertNoFieldClash', () => {
  it('passes when the additional names are disjoint from the known fields', () => {
    expect(() =>
      assertNoFieldClash(['alt', 'name', 'readMask'], new Map([['quotaUser', 'x']])),
    ).not.toThrow()
  })

  it('throws FieldClashError naming the clashing field', () => {
    try {
      assertNoFieldClash(['alt', 'name'], new Map([['alt', 'media']]))
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(FieldClashError)
      expect(error).toMatchObject({ field: 'alt', kind: 'field-clash' })
    }
  })
})
