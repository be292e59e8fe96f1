/**
 * CLI output helpers
 *
 * File writing and error reporting shared by the commands.
 */

import chalk from 'chalk'
import { promises as fs } from 'fs'
import { dirname } from 'path'
import { CrudResourceError } from '../../core/errors.js'

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true })
}

export async function writeFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path))
  await fs.writeFile(path, content, 'utf8')
}

export function printBanner(title: string): void {
  console.log(chalk.bold(title))
  console.log('='.repeat(title.length))
  console.log()
}

/**
 * Print a failed command's error and mark the process as failed
 */
export function reportFailure(action: string, error: unknown): void {
  console.error(chalk.red(`✖ ${action} failed:`))
  if (error instanceof CrudResourceError) {
    console.error(`${chalk.dim(`[${error.code}]`)} ${error.message}`)
  } else {
    console.error(error instanceof Error ? error.message : String(error))
  }
  process.exitCode = 1
}
