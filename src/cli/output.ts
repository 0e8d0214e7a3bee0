import { writeFile } from 'node:fs/promises'

/** Drops `null` members and array elements at every depth. `0`, `false` and `''` stay. */
export function removeNullValues(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.filter((element) => element !== null).map(removeNullValues)
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {}
    for (const [key, member] of Object.entries(value)) {
      if (member !== null) result[key] = removeNullValues(member)
    }
    return result
  }
  return value
}

export function formatJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

/** Writes to `path`, or to `stdout` when no path (or `-`) is given. */
export async function writeOutput(
  text: string,
  path: string | undefined,
  stdout: (text: string) => void,
): Promise<void> {
  if (path === undefined || path === '-') {
    stdout(text)
    return
  }
  await writeFile(path, text, 'utf8')
}
