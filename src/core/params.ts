import { FieldClashError } from './errors.ts'
import type { TParamValue, TQueryValue } from './types.ts'

/**
 * Ordered multi-map of request parameters. Insertion order decides serialization order;
 * servers treat it as insignificant, but it is kept deterministic.
 */
export class Params {
  private readonly entries: Array<[string, string]> = []

  push(name: string, value: TParamValue): this {
    this.entries.push([name, String(value)])
    return this
  }

  /** Pushes a typed value: arrays yield one pair per element, `undefined` is skipped. */
  pushValue(name: string, value: TQueryValue): this {
    if (value === undefined) return this
    if (isValueList(value)) {
      for (const item of value) this.push(name, item)
      return this
    }
    return this.push(name, value)
  }

  extend(pairs: Iterable<readonly [string, string]>): this {
    for (const [name, value] of pairs) this.push(name, value)
    return this
  }

  /** First value stored under `name`. */
  get(name: string): string | undefined {
    return this.entries.find(([key]) => key === name)?.[1]
  }

  has(name: string): boolean {
    return this.entries.some(([key]) => key === name)
  }

  remove(names: readonly string[]): this {
    for (let index = this.entries.length - 1; index >= 0; index--) {
      if (names.includes(this.entries[index][0])) this.entries.splice(index, 1)
    }
    return this
  }

  toArray(): Array<[string, string]> {
    return this.entries.map(([name, value]) => [name, value])
  }
}

function isValueList(value: TQueryValue): value is readonly TParamValue[] {
  return Array.isArray(value)
}

/**
 * Fails with `FieldClashError` when an additional parameter reuses a name the method
 * already exposes through a typed setter.
 */
export function assertNoFieldClash(
  knownFields: readonly string[],
  additionalParams: ReadonlyMap<string, string>,
): void {
  for (const field of knownFields) {
    if (additionalParams.has(field)) throw new FieldClashError(field)
  }
}
