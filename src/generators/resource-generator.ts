/**
 * Resource Generator
 *
 * Generates one TypeScript module per configured resource. Each module
 * binds the resolved operations of its schema to the configured
 * repository through the runtime's bindOperation, so the generated
 * functions stay fully typed.
 *
 * Output structure:
 *   resources/
 *     blog-post.ts   - blogPostResource { all_blog_posts, get_blog_post, ... }
 *     user.ts        - userResource { ... }
 *     index.ts       - Re-exports all
 */

import { ConfigError } from '../core/errors.js'
import {
  computeSuffix,
  isBareIdentifier,
  toCamelCase,
  toKebabCase,
  toSnakeCase,
} from '../core/naming.js'
import { defaultResolver, type OptionResolver, type ResolvedOperations } from '../core/option-resolver.js'
import type { ResourceConfig, ResourceEntry } from './config-loader.js'

export interface GeneratedResources {
  /** Resource modules keyed by file name */
  resources: Map<string, string>
  /** Index file with exports */
  index: string
}

export interface ResourceGeneratorOptions {
  /** Include the `name/arity` comment above each function (default: true) */
  includeJSDoc?: boolean
  /** Resolver to name operations with (default: the shared resolver) */
  resolver?: OptionResolver
}

const DEFAULT_OPTIONS: Required<ResourceGeneratorOptions> = {
  includeJSDoc: true,
  resolver: defaultResolver,
}

interface ResourcePlan {
  entry: ResourceEntry
  fileName: string
  schemaBinding: string
  exportName: string
  operations: ResolvedOperations
}

export class ResourceGenerator {
  private options: Required<ResourceGeneratorOptions>

  constructor(options: ResourceGeneratorOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
  }

  /**
   * @throws {ConfigError} if two resources would be written to the same file
   */
  generate(config: ResourceConfig): GeneratedResources {
    const plans = config.resources.map((entry) => this.plan(entry))
    const resources = new Map<string, string>()

    for (const plan of plans) {
      if (resources.has(plan.fileName)) {
        throw new ConfigError(
          `Resources ${plan.entry.schema} and another entry both generate ${plan.fileName}`,
        )
      }
      resources.set(plan.fileName, this.generateResource(plan, config))
    }

    return {
      resources,
      index: this.generateIndex(plans),
    }
  }

  private plan(entry: ResourceEntry): ResourcePlan {
    const baseName = lastSegment(entry.schema)
    const snakeName = toSnakeCase(baseName)

    return {
      entry,
      fileName: `${toKebabCase(baseName)}.ts`,
      schemaBinding: entry.export ?? baseName,
      exportName: `${toCamelCase(snakeName)}Resource`,
      operations: this.options.resolver.resolve(
        computeSuffix(entry.schema, { suffix: entry.suffix }),
        entry.selector,
      ),
    }
  }

  /**
   * Generate a single resource module
   */
  private generateResource(plan: ResourcePlan, config: ResourceConfig): string {
    const lines: string[] = []

    lines.push(this.generateFileHeader(plan.entry.schema))
    lines.push('')
    lines.push(this.generateImports(plan, config))
    lines.push('')
    lines.push(this.generateResourceObject(plan, config))
    lines.push('')
    lines.push(this.generateDescriptions(plan))
    lines.push('')

    return lines.join('\n')
  }

  private generateFileHeader(schemaName: string): string {
    return `/**
 * ${schemaName} Resource
 *
 * Auto-generated by crud-resource.
 * Do not edit manually - regenerate using crud-resource CLI.
 */`
  }

  private generateImports(plan: ResourcePlan, config: ResourceConfig): string {
    const { repository } = config

    return [
      `import { bindOperation } from ${stringLiteral(config.runtimeImport)}`,
      `import { ${repository.name} } from ${stringLiteral(repository.import)}`,
      `import { ${plan.schemaBinding} } from ${stringLiteral(plan.entry.import)}`,
    ].join('\n')
  }

  private generateResourceObject(plan: ResourcePlan, config: ResourceConfig): string {
    const repo = config.repository.name
    const lines: string[] = [`export const ${plan.exportName} = {`]

    for (const [id, entry] of plan.operations) {
      if (this.options.includeJSDoc) {
        lines.push(`  /** ${entry.description} */`)
      }
      lines.push(`  ${propertyKey(entry.name)}: bindOperation(${repo}, ${plan.schemaBinding}, ${stringLiteral(id)}),`)
    }

    lines.push('} as const')
    return lines.join('\n')
  }

  private generateDescriptions(plan: ResourcePlan): string {
    const descriptions = [...plan.operations.values()].map((entry) => entry.description).sort()
    const name = plan.exportName.replace(/Resource$/, 'Descriptions')

    if (descriptions.length === 0) {
      return `export const ${name}: readonly string[] = []`
    }

    return [
      `export const ${name} = [`,
      ...descriptions.map((description) => `  ${stringLiteral(description)},`),
      '] as const',
    ].join('\n')
  }

  private generateIndex(plans: ResourcePlan[]): string {
    const lines = [
      `/**
 * Resources
 *
 * Auto-generated by crud-resource.
 * Do not edit manually - regenerate using crud-resource CLI.
 */`,
      '',
    ]

    for (const plan of plans) {
      lines.push(`export * from './${plan.fileName.replace(/\.ts$/, '.js')}'`)
    }
    lines.push('')

    return lines.join('\n')
  }
}

/**
 * Generate resource modules with default options
 */
export function generateResources(
  config: ResourceConfig,
  options: ResourceGeneratorOptions = {},
): GeneratedResources {
  return new ResourceGenerator(options).generate(config)
}

function lastSegment(schema: string): string {
  const segments = schema.split('.').filter(Boolean)
  return segments[segments.length - 1] ?? schema
}

function propertyKey(name: string): string {
  return isBareIdentifier(name) ? name : stringLiteral(name)
}

/**
 * Single-quoted TypeScript string literal for `value`
 *
 * @example
 * stringLiteral("../it's.js") // => '../it\'s.js'
 */
export function stringLiteral(value: string): string {
  const escaped = value
    .replace(/[\\']/g, '\\$&')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
  return `'${escaped}'`
}
