/**
 * crud-resource Generators
 *
 * Code generation for resource modules from crud-resource.json
 */

// Config
export {
  loadResourceConfig,
  parseResourceConfig,
  resourceConfigSchema,
  DEFAULT_CONFIG_FILE,
  DEFAULT_OUTPUT,
  DEFAULT_RUNTIME_IMPORT,
  type ResourceConfig,
  type ResourceConfigInput,
  type ResourceEntry,
} from './config-loader.js'

// Resource Generator
export {
  ResourceGenerator,
  generateResources,
  type GeneratedResources,
  type ResourceGeneratorOptions,
} from './resource-generator.js'
