/**
 * Names Command
 *
 * Resolves the generated names for a single schema without a config file.
 *
 * Usage:
 *   crud-resource names BlogPost
 *   crud-resource names BlogPost --only create,update
 *   crud-resource names BlogPost --read --no-suffix
 */

import chalk from 'chalk'
import { InvalidSelectorError } from '../../core/errors.js'
import { computeSuffix } from '../../core/naming.js'
import { resolveOperations, type ResolvedOperations } from '../../core/option-resolver.js'
import { parseSelector } from '../../core/selector.js'
import { reportFailure } from '../utils/output.js'

export interface NamesOptions {
  only?: string
  except?: string
  read?: boolean
  readWrite?: boolean
  /** commander sets this to false for --no-suffix */
  suffix?: boolean
}

/**
 * Turn the selector flags into selector input. At most one may be given.
 *
 * @throws {InvalidSelectorError} when flags are combined
 */
export function selectorFromFlags(options: NamesOptions): unknown {
  const chosen: unknown[] = []

  if (options.read) chosen.push('read')
  if (options.readWrite) chosen.push('read_write')
  if (options.only !== undefined) chosen.push({ only: splitList(options.only) })
  if (options.except !== undefined) chosen.push({ except: splitList(options.except) })

  if (chosen.length > 1) {
    throw new InvalidSelectorError(chosen)
  }
  return chosen[0]
}

export function resolveNames(schema: string, options: NamesOptions): ResolvedOperations {
  const suffix = computeSuffix(schema, { suffix: options.suffix })
  return resolveOperations(suffix, parseSelector(selectorFromFlags(options)))
}

export async function namesCommand(schema: string, options: NamesOptions): Promise<void> {
  try {
    const resolved = resolveNames(schema, options)

    if (resolved.size === 0) {
      console.log(chalk.yellow('No operations selected'))
      return
    }

    for (const [id, entry] of resolved) {
      console.log(`${id} -> ${entry.description}`)
    }
  } catch (error) {
    reportFailure('Name resolution', error)
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}
