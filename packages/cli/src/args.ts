import { parseArgs, type ParseArgsConfig } from 'node:util'
import { ValidationError } from '@corpus/core/errors'

/**
 * node:util parseArgs in strict mode, with its TypeErrors reported as
 * ValidationErrors naming the command.
 */
export function parseCommandArgs<T extends ParseArgsConfig>(
  command: string,
  config: T,
): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs(config)
  } catch (err) {
    if (err instanceof TypeError) {
      throw new ValidationError(`${command}: ${err.message}`)
    }
    throw err
  }
}

export function parseInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationError(`--${flag} must be an integer, got "${value}"`, { flag, value })
  }
  return Number.parseInt(value, 10)
}

/** "a, b,,c" -> ["a", "b", "c"] */
export function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}
