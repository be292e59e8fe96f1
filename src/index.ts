/**
 * crud-resource
 *
 * Generate conventionally named CRUD functions for a schema, bound to a
 * storage repository
 */

export * from './core/index.js'
export * from './generators/index.js'
export * from './runtime/index.js'
