import { inspect } from 'node:util'
import { Command, CommanderError } from 'commander'
import type { Call } from '../core/call.ts'
import { isHubError } from '../core/errors.ts'
import { setLogLevel } from '../core/logger.ts'
import type { TQueryShape } from '../core/types.ts'
import { SDK_VERSION } from '../core/sdk-info.ts'
import { toKebabCase } from '../core/utils.ts'
import { createTokenProvider, loadCliConfig, type TCliConfig } from './config.ts'
import { buildRequestBody } from './field-cursor.ts'
import { closestMatch, GLOBAL_PARAMETERS, parseKeyValue } from './kv.ts'
import { formatJson, removeNullValues, writeOutput } from './output.ts'
import type { TCliDefinition, TCliIo, TCliMethod } from './types.ts'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_INVALID_OPTIONS = 2

type TGlobalOptions = {
  debug?: boolean
  envFile?: string
  scope: string[]
}

type TMethodOptions = {
  request: string[]
  param: string[]
  out?: string
}

type TInvocation = {
  method: TCliMethod
  pathValues: Record<string, string>
  global: TGlobalOptions
  options: TMethodOptions
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function processIo(): TCliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
  }
}

/** Parses `argv` (without the node and script entries), runs the command and returns the exit code. */
export async function runCli(
  definition: TCliDefinition,
  argv: readonly string[],
  io: TCliIo,
): Promise<number> {
  let exitCode = EXIT_SUCCESS
  const program = new Command()

  program
    .name(definition.name)
    .description(definition.description)
    .version(SDK_VERSION)
    .option('--debug', 'Print full error details and debug logs')
    .option('--env-file <path>', 'Read configuration from this file instead of ./.env')
    .option(
      '--scope <url>',
      "Add an OAuth scope to the call; the method's default scope is used otherwise",
      collect,
      [],
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })

  for (const resource of definition.resources) {
    const resourceCommand = program
      .command(resource.name)
      .description(`methods: ${resource.methods.map((method) => `'${method.name}'`).join(', ')}`)

    for (const method of resource.methods) {
      const command = resourceCommand.command(method.name).description(method.descriptor.id)
      for (const name of method.descriptor.pathParameters) {
        command.argument(`<${toKebabCase(name)}>`)
      }
      if (method.descriptor.request) {
        command.option(
          '-r, --request <key=value>',
          'Set a field of the request body; a bare path moves the field cursor',
          collect,
          [],
        )
      }
      command
        .option('-p, --param <key=value>', 'Set an optional query parameter', collect, [])
        .option('-o, --out <file>', "Write the response to this file instead of standard output")
        .action(async () => {
          const pathValues: Record<string, string> = {}
          method.descriptor.pathParameters.forEach((name, index) => {
            pathValues[name] = command.args[index]
          })
          const options = command.opts<Partial<TMethodOptions>>()
          exitCode = await invoke(definition, io, {
            method,
            pathValues,
            global: program.opts<TGlobalOptions>(),
            options: { request: options.request ?? [], param: options.param ?? [], out: options.out },
          })
        })
    }
  }

  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_INVALID_OPTIONS
    }
    throw error
  }
  return exitCode
}

async function invoke(definition: TCliDefinition, io: TCliIo, invocation: TInvocation): Promise<number> {
  const { global, options, method } = invocation

  let config: TCliConfig
  try {
    config = loadCliConfig({ envFile: global.envFile, env: io.env, cwd: io.cwd })
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`)
    return EXIT_INVALID_OPTIONS
  }

  const previousLevel = setLogLevel(global.debug ? 'debug' : (config.logLevel ?? 'warn'))
  try {
    const hub = definition.createHub({
      tokenProvider: createTokenProvider(config, io.fetchImplementation),
      apiKey: config.apiKey,
      fetchImplementation: io.fetchImplementation,
    })

    const issues: string[] = []
    const body = method.descriptor.request
      ? buildRequestBody(method.descriptor.request, options.request, issues)
      : undefined
    const call = hub.call(method.descriptor, invocation.pathValues, body)
    applyParameters(call, options.param, issues)
    call.addScopes(global.scope)

    if (issues.length === 0) collectValidationIssues(call, issues)
    if (issues.length > 0) {
      for (const issue of issues) io.stderr(`${issue}\n`)
      return EXIT_INVALID_OPTIONS
    }

    const { data } = await call.doit()
    try {
      await writeOutput(formatJson(removeNullValues(data)), options.out, io.stdout)
    } catch (error) {
      io.stderr(
        `Failed to open output file '${options.out ?? '-'}': ${error instanceof Error ? error.message : String(error)}\n`,
      )
      return EXIT_FAILURE
    }
    return EXIT_SUCCESS
  } catch (error) {
    io.stderr(`${global.debug ? inspect(error, { depth: null }) : describe(error)}\n`)
    return EXIT_FAILURE
  } finally {
    setLogLevel(previousLevel)
  }
}

function applyParameters(
  call: Call<unknown, TQueryShape, unknown>,
  args: readonly string[],
  issues: string[],
): void {
  const typed = new Map(call.queryParameterNames().map((name) => [toKebabCase(name), name]))

  for (const argument of args) {
    const { key, value } = parseKeyValue(argument)
    if (value === undefined) {
      issues.push(`Parameter '${argument}' must be given as key=value`)
      continue
    }

    const typedName = typed.get(key)
    if (typedName !== undefined) {
      call.setFromString(typedName, value)
      continue
    }
    const globalName = GLOBAL_PARAMETERS.get(key)
    if (globalName !== undefined) {
      call.param(globalName, value)
      continue
    }

    const suggestion = closestMatch(key, [...typed.keys(), ...GLOBAL_PARAMETERS.keys()])
    issues.push(
      `Parameter '${key}' is unknown${suggestion ? `, did you mean '${suggestion}'?` : ''}`,
    )
  }
}

/** Dry run of the request assembly, so bad values are reported as option errors. */
function collectValidationIssues(call: Call<unknown, TQueryShape, unknown>, issues: string[]): void {
  try {
    call.buildRequestSpec()
  } catch (error) {
    if (isHubError(error) && error.kind === 'invalid-parameter') {
      issues.push(...error.issues)
      return
    }
    if (isHubError(error) && error.kind === 'field-clash') {
      issues.push(error.message)
      return
    }
    throw error
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
