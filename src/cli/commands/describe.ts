/**
 * Describe Command
 *
 * Lists the `name/arity` of every function a config would generate,
 * grouped by resource.
 *
 * Usage:
 *   crud-resource describe crud-resource.json
 *   crud-resource describe crud-resource.json --json
 */

import chalk from 'chalk'
import { computeSuffix } from '../../core/naming.js'
import { resolveOperations } from '../../core/option-resolver.js'
import type { ResourceListing } from '../../runtime/define-resource.js'
import { loadResourceConfig, type ResourceConfig } from '../../generators/config-loader.js'
import { reportFailure } from '../utils/output.js'

export interface DescribeOptions {
  json?: boolean
}

/**
 * Build the listing for every resource of a config, in config order
 */
export function describeConfig(config: ResourceConfig): ResourceListing[] {
  return config.resources.map((entry) => {
    const suffix = computeSuffix(entry.schema, { suffix: entry.suffix })
    const resolved = resolveOperations(suffix, entry.selector)

    return {
      repository: config.repository.name,
      schema: entry.schema,
      descriptions: [...resolved.values()].map((resource) => resource.description).sort(),
    }
  })
}

export async function describeCommand(configPath: string, options: DescribeOptions): Promise<void> {
  try {
    const config = await loadResourceConfig(configPath)
    const listings = describeConfig(config)

    if (options.json) {
      console.log(JSON.stringify(listings, null, 2))
      return
    }

    for (const listing of listings) {
      console.log(`${chalk.cyan(listing.repository)} ${chalk.bold(listing.schema)}`)
      for (const description of listing.descriptions) {
        console.log(`  ${description}`)
      }
    }
  } catch (error) {
    reportFailure('Describe', error)
  }
}
