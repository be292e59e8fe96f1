/**
 * Resource Config Loader
 *
 * Loads and validates crud-resource.json, the file that lists which
 * schemas get generated resources and which operations each exposes.
 */

import { promises as fs } from 'fs'
import { z } from 'zod'
import { ConfigError, InvalidSelectorError } from '../core/errors.js'
import { parseSelector, type Selector } from '../core/selector.js'

export const DEFAULT_CONFIG_FILE = 'crud-resource.json'
export const DEFAULT_OUTPUT = './src/generated/resources'
export const DEFAULT_RUNTIME_IMPORT = 'crud-resource/runtime'

const identifier = z.string().regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be a valid identifier')

const resourceEntrySchema = z.object({
  /** Schema identifier, e.g. `BlogPost` or `Blog.Post` */
  schema: z
    .string()
    .regex(/^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/, 'must be a dotted identifier'),
  /** Module specifier the schema is imported from, relative to the output directory */
  import: z.string().min(1),
  /** Exported binding of the schema; defaults to the last segment of `schema` */
  export: identifier.optional(),
  selector: z.unknown().optional(),
  suffix: z.boolean().optional(),
})

export const resourceConfigSchema = z.object({
  output: z.string().min(1).default(DEFAULT_OUTPUT),
  runtimeImport: z.string().min(1).default(DEFAULT_RUNTIME_IMPORT),
  repository: z.object({
    name: identifier,
    import: z.string().min(1),
  }),
  resources: z.array(resourceEntrySchema).min(1),
})

export type ResourceConfigInput = z.input<typeof resourceConfigSchema>

export type ResourceEntry = Omit<z.infer<typeof resourceEntrySchema>, 'selector'> & {
  selector: Selector
}

export interface ResourceConfig {
  output: string
  runtimeImport: string
  repository: { name: string; import: string }
  resources: ResourceEntry[]
}

/**
 * Validate a parsed config object
 *
 * @throws {ConfigError} with the offending path in the message
 */
export function parseResourceConfig(input: unknown): ResourceConfig {
  const result = resourceConfigSchema.safeParse(input)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid resource config: ${details}`, result.error.issues)
  }

  const resources = result.data.resources.map((entry, index) => ({
    ...entry,
    selector: parseEntrySelector(entry.selector, index),
  }))

  return { ...result.data, resources }
}

/**
 * Read and validate a config file
 *
 * @throws {ConfigError} if the file is missing, not JSON, or invalid
 */
export async function loadResourceConfig(path: string): Promise<ResourceConfig> {
  let content: string
  try {
    content = await fs.readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigError(`Cannot read config ${path}: ${errorMessage(error)}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`Config ${path} is not valid JSON: ${errorMessage(error)}`)
  }

  return parseResourceConfig(parsed)
}

function parseEntrySelector(selector: unknown, index: number): Selector {
  try {
    return parseSelector(selector)
  } catch (error) {
    if (error instanceof InvalidSelectorError) {
      throw new ConfigError(`resources.${index}.selector: ${error.message}`, error.issues)
    }
    throw error
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
