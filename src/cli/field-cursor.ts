import { z } from 'zod'
import { unwrapOptional } from '../core/call.ts'
import { toCamelCase, toKebabCase } from '../core/utils.ts'
import { didYouMean, parseKeyValue } from './kv.ts'

/**
 * Position inside a request body, addressed with `.`-separated kebab-case field names.
 *
 * Paths are relative to the cursor. A leading `.` followed by a name starts from the root,
 * `.` alone returns to the root and each extra `.` in a row (`a..b`) steps up one level.
 */
export class FieldCursor {
  private fields: string[]

  constructor(fields: string[] = []) {
    this.fields = fields
  }

  set(path: string): void {
    if (path === '') throw new Error('Field path must not be empty')

    let fields = [...this.fields]
    let field = ''
    let consecutiveSeparators = 0
    const fromRoot = path.startsWith('.')

    for (let index = 0; index < path.length; index++) {
      const character = path[index]
      if (character === '.') {
        consecutiveSeparators++
        if (index > 0 && path[index - 1] === '.') {
          if (fields.pop() === undefined) {
            throw new Error(`'${path}' steps above the root of the request`)
          }
        } else if (field !== '') {
          fields.push(field)
          field = ''
        }
      } else {
        consecutiveSeparators = 0
        if (index === 1 && fromRoot) fields = []
        field += character
      }
    }
    if (field !== '') fields.push(field)
    if (path === '.') fields = []
    if (path.length > 1 && consecutiveSeparators === 1) {
      throw new Error(`'${path}' must not end with '.'`)
    }
    this.fields = fields
  }

  clone(): FieldCursor {
    return new FieldCursor([...this.fields])
  }

  segments(): readonly string[] {
    return this.fields
  }

  toString(): string {
    return this.fields.join('.')
  }
}

type TLeafKind = 'string' | 'number' | 'integer' | 'boolean'
type TLeaf = { kind: TLeafKind; repeated: boolean }

function leafOf(schema: z.ZodTypeAny): TLeaf | undefined {
  const inner = unwrapOptional(schema)
  if (inner instanceof z.ZodArray) {
    const element = scalarKind(unwrapOptional(inner.element))
    return element ? { kind: element, repeated: true } : undefined
  }
  const kind = scalarKind(inner)
  return kind ? { kind, repeated: false } : undefined
}

function scalarKind(schema: z.ZodTypeAny): TLeafKind | undefined {
  if (schema instanceof z.ZodString || schema instanceof z.ZodEnum) return 'string'
  if (schema instanceof z.ZodBoolean) return 'boolean'
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number'
  return undefined
}

function childOf(schema: z.ZodTypeAny, field: string): z.ZodTypeAny | undefined {
  const inner = unwrapOptional(schema)
  if (!(inner instanceof z.ZodObject)) return undefined
  const child: unknown = inner.shape[field]
  return child instanceof z.ZodType ? child : undefined
}

/** Every kebab-case field name reachable in `schema`, for suggestions. */
export function fieldNames(schema: z.ZodTypeAny, names = new Set<string>()): string[] {
  const inner = unwrapOptional(schema)
  if (inner instanceof z.ZodObject) {
    for (const [name, child] of Object.entries<z.ZodTypeAny>(inner.shape)) {
      names.add(toKebabCase(name))
      fieldNames(child, names)
    }
  } else if (inner instanceof z.ZodArray) {
    fieldNames(inner.element, names)
  }
  return [...names].sort()
}

function convert(leaf: TLeaf, path: string, raw: string): string | number | boolean {
  switch (leaf.kind) {
    case 'string':
      return raw
    case 'boolean':
      if (raw === 'true') return true
      if (raw === 'false') return false
      throw new Error(`Failed to parse '${raw}' for field '${path}' as boolean`)
    case 'integer':
    case 'number': {
      const parsed = raw.trim() === '' ? NaN : Number(raw)
      if (!Number.isFinite(parsed) || (leaf.kind === 'integer' && !Number.isInteger(parsed))) {
        throw new Error(`Failed to parse '${raw}' for field '${path}' as ${leaf.kind}`)
      }
      return parsed
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function assign(target: Record<string, unknown>, wirePath: string[], value: unknown, repeated: boolean) {
  let node = target
  for (const field of wirePath.slice(0, -1)) {
    const next = node[field]
    if (isRecord(next)) {
      node = next
    } else {
      const created: Record<string, unknown> = {}
      node[field] = created
      node = created
    }
  }
  const last = wirePath[wirePath.length - 1]
  if (repeated) {
    const current = node[last]
    node[last] = Array.isArray(current) ? [...current, value] : [value]
  } else {
    node[last] = value
  }
}

/**
 * Builds a request body from `-r` arguments. A `path` without `=value` only moves the cursor;
 * `path=value` sets the field at the cursor plus `path`, typed after the request schema.
 * Repeated fields collect one element per argument.
 */
export function buildRequestBody(
  schema: z.ZodTypeAny,
  args: readonly string[],
  issues: string[],
): Record<string, unknown> {
  const body: Record<string, unknown> = {}
  const candidates = fieldNames(schema)
  let cursor = new FieldCursor()

  for (const argument of args) {
    const { key, value } = parseKeyValue(argument)
    const target = cursor.clone()
    try {
      target.set(key)
    } catch (error) {
      issues.push(error instanceof Error ? error.message : String(error))
      continue
    }

    if (value === undefined) {
      cursor = target
      continue
    }

    const path = target.toString()
    let node: z.ZodTypeAny | undefined = schema
    for (const segment of target.segments()) {
      node = node ? childOf(node, toCamelCase(segment)) : undefined
    }
    const leaf = node ? leafOf(node) : undefined
    if (!node || !leaf) {
      const suggestion = node ? undefined : didYouMean(path, candidates)
      issues.push(
        node
          ? `Field '${path}' is not a value field; address one of its fields instead`
          : `Field '${path}' does not exist${suggestion ? `, did you mean '${suggestion}'?` : ''}`,
      )
      continue
    }

    try {
      assign(body, target.segments().map(toCamelCase), convert(leaf, path, value), leaf.repeated)
    } catch (error) {
      issues.push(error instanceof Error ? error.message : String(error))
    }
  }
  return body
}
