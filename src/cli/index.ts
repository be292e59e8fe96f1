#!/usr/bin/env node
/**
 * crud-resource CLI
 *
 * Generate conventionally named CRUD functions from crud-resource.json
 */

import { Command } from 'commander'
import { generateCommand } from './commands/generate.js'
import { describeCommand } from './commands/describe.js'
import { namesCommand } from './commands/names.js'
import { DEFAULT_CONFIG_FILE } from '../generators/config-loader.js'

const program = new Command()

program
  .name('crud-resource')
  .description('Generate CRUD functions for a schema, bound to a repository')
  .version('0.1.0')

// Generate command
// Defaults can be set via environment variables (CRUD_RESOURCE_*)
program
  .command('generate')
  .description('Generate resource modules from a config file')
  .argument('[config]', 'Resource config file', DEFAULT_CONFIG_FILE)
  .option(
    '-o, --output <dir>',
    'Output directory (defaults to the config file "output")',
    process.env.CRUD_RESOURCE_OUTPUT
  )
  .option(
    '--runtime-import <specifier>',
    'Module generated files import the runtime from',
    process.env.CRUD_RESOURCE_RUNTIME_IMPORT
  )
  .option('--dry-run', 'Preview without writing files')
  .option('--verbose', 'Show detailed output')
  .action(generateCommand)

// Describe command
program
  .command('describe')
  .description('List the name/arity of every generated function')
  .argument('[config]', 'Resource config file', DEFAULT_CONFIG_FILE)
  .option('--json', 'Print the listing as JSON')
  .action(describeCommand)

// Names command
program
  .command('names')
  .description('Resolve generated names for one schema')
  .argument('<schema>', 'Schema identifier, e.g. BlogPost')
  .option('--only <ids>', 'Comma-separated operation ids to keep')
  .option('--except <ids>', 'Comma-separated operation ids to drop')
  .option('--read', 'Only read operations')
  .option('--read-write', 'Read operations plus change, create and update')
  .option('--no-suffix', 'Use the bare operation ids as names')
  .action(namesCommand)

// Parse arguments
if (process.argv.length < 3) {
  program.help()
} else {
  await program.parseAsync()
}

export default program
