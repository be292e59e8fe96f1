/**
 * Core Module
 *
 * Operation catalog, selectors, naming and the option resolver.
 * Schema types live in the runtime module.
 */

export * from './errors.js'
export * from './operation-catalog.js'
export * from './selector.js'
export * from './naming.js'
export * from './option-resolver.js'
