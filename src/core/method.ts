import { z } from 'zod'
import type { TMethodDescriptor, TQueryShape } from './types.ts'

/** Identity helper that lets TypeScript infer a descriptor's response, query and body types. */
export function defineMethod<TResponse, TQuery extends TQueryShape, TBody = never>(
  descriptor: TMethodDescriptor<TResponse, TQuery, TBody>,
): TMethodDescriptor<TResponse, TQuery, TBody> {
  return Object.freeze(descriptor)
}

/** Query schema of a method without typed query parameters. */
export const NO_QUERY = z.object({})
