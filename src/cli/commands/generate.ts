/**
 * Generate Command
 *
 * Writes one resource module per entry of crud-resource.json, plus an index.
 *
 * Usage:
 *   crud-resource generate crud-resource.json
 *   crud-resource generate crud-resource.json --output ./src/resources --dry-run
 */

import chalk from 'chalk'
import { dirname, join, resolve } from 'path'
import { loadResourceConfig } from '../../generators/config-loader.js'
import { generateResources } from '../../generators/resource-generator.js'
import { printBanner, reportFailure, writeFile } from '../utils/output.js'

export interface GenerateOptions {
  output?: string
  runtimeImport?: string
  dryRun?: boolean
  verbose?: boolean
}

export interface GenerateSummary {
  outputDir: string
  files: string[]
  written: boolean
}

/**
 * Generate resource modules; resolves with what was (or would be) written
 */
export async function runGenerate(
  configPath: string,
  options: GenerateOptions,
): Promise<GenerateSummary> {
  const config = await loadResourceConfig(configPath)
  const outputDir = options.output
    ? resolve(options.output)
    : resolve(dirname(configPath), config.output)

  const generated = generateResources({
    ...config,
    runtimeImport: options.runtimeImport ?? config.runtimeImport,
  })

  const files = [...generated.resources.keys(), 'index.ts']

  if (options.dryRun) {
    return { outputDir, files, written: false }
  }

  for (const [fileName, content] of generated.resources) {
    const filePath = join(outputDir, fileName)
    await writeFile(filePath, content)
    if (options.verbose) {
      console.log(chalk.dim(`  Written: ${filePath}`))
    }
  }
  await writeFile(join(outputDir, 'index.ts'), generated.index)

  return { outputDir, files, written: true }
}

export async function generateCommand(configPath: string, options: GenerateOptions): Promise<void> {
  try {
    printBanner('crud-resource generate')
    console.log(`Loading config from: ${configPath}`)

    const summary = await runGenerate(configPath, options)

    if (!summary.written) {
      console.log(`\n[DRY RUN] Would generate in ${summary.outputDir}:`)
      for (const file of summary.files) {
        console.log(`  - ${file}`)
      }
      return
    }

    console.log(chalk.green(`\n✔ Generated ${summary.files.length} files in ${summary.outputDir}`))
  } catch (error) {
    reportFailure('Generation', error)
  }
}
