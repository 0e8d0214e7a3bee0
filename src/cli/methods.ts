import { toKebabCase } from '../core/utils.ts'
import type { TAnyMethodDescriptor, TCliMethod } from './types.ts'

/** One command per descriptor, named after its key: `budgetsCreate` becomes `budgets-create`. */
export function cliMethods(methods: Record<string, TAnyMethodDescriptor>): TCliMethod[] {
  return Object.entries(methods).map(([key, descriptor]) => ({
    name: toKebabCase(key),
    descriptor,
  }))
}
