import type { Hub, THubOptions } from '../core/hub.ts'
import type { TMethodDescriptor, TQueryShape } from '../core/types.ts'

// Response and body are only ever validated by the descriptor's own schemas here.
export type TAnyMethodDescriptor = TMethodDescriptor<unknown, TQueryShape, unknown>

export type TCliMethod = {
  /** Command name, e.g. `budgets-create`. */
  name: string
  descriptor: TAnyMethodDescriptor
}

export type TCliResource = {
  /** Command name, e.g. `billing-accounts`. */
  name: string
  methods: TCliMethod[]
}

/** Everything one executable needs: its name, its hub and the methods it exposes. */
export type TCliDefinition = {
  name: string
  description: string
  resources: TCliResource[]
  createHub(options: THubOptions): Hub
}

/** Process surroundings of a run, replaceable in tests. */
export type TCliIo = {
  stdout(text: string): void
  stderr(text: string): void
  env: Record<string, string | undefined>
  cwd: string
  fetchImplementation?: typeof fetch
}
