/**
 * Naming
 *
 * Single source of truth for the names of generated functions, their
 * `name/arity` descriptions, and the schema-derived suffix they carry.
 *
 * Generated names follow this structure:
 *
 *   get_blog_post_by!
 *   │_│ │_______│ │_││
 *   root  suffix  │  strict (bang)
 *              qualifier
 *
 * Names are built as a GeneratedIdentifier and only turned into a string
 * by renderIdentifier, which is the one place the bang is placed.
 */

import pluralize from 'pluralize'
import { InvalidSuffixError } from './errors.js'

export interface GeneratedIdentifier {
  /** Leading operation word: `create`, `get`, `all` */
  root: string
  /** Fixed word that stays after the suffix: `by` in `get_user_by` */
  qualifier?: string
  /** Schema-derived part; absent when suffixing is disabled */
  suffix?: string
  /** Trailing bang marking the raising variant */
  strict: boolean
}

export interface ResolvedEntry {
  /** Name the generated function is bound under */
  readonly name: string
  /** `name/arity`, used for documentation and introspection */
  readonly description: string
}

export interface SuffixOptions {
  /** `false` disables suffixing; generated names are the bare operation ids */
  suffix?: boolean
}

/**
 * Operations whose second word stays after the suffix.
 * `get_by` becomes `get_user_by`, not `get_by_user`.
 */
const QUALIFIED_OPERATIONS: Record<string, { root: string; qualifier: string }> = {
  get_by: { root: 'get', qualifier: 'by' },
}

/** Operations that take the plural form of the suffix */
const PLURAL_OPERATIONS = new Set(['all'])

/** Empty, or lowercase words joined by single underscores */
const SUFFIX_PATTERN = /^(?:[a-z0-9]+(?:_[a-z0-9]+)*)?$/

/**
 * Build the structured identifier for an operation
 *
 * @example
 * toIdentifier('create!', 'user')
 * // => { root: 'create', suffix: 'user', strict: true }
 *
 * toIdentifier('get_by', 'user')
 * // => { root: 'get', qualifier: 'by', suffix: 'user', strict: false }
 */
export function toIdentifier(operationId: string, suffix: string): GeneratedIdentifier {
  const strict = operationId.endsWith('!')
  const base = strict ? operationId.slice(0, -1) : operationId

  if (suffix === '') {
    return { root: base, strict }
  }

  if (PLURAL_OPERATIONS.has(base)) {
    return { root: base, suffix: pluralizeSuffix(suffix), strict }
  }

  const qualified = QUALIFIED_OPERATIONS[base]
  if (qualified) {
    return { root: qualified.root, qualifier: qualified.qualifier, suffix, strict }
  }

  return { root: base, suffix, strict }
}

/**
 * Render an identifier as a function name
 *
 * @example
 * renderIdentifier({ root: 'create', suffix: 'user', strict: true })
 * // => "create_user!"
 */
export function renderIdentifier(identifier: GeneratedIdentifier): string {
  const parts = [identifier.root]
  if (identifier.suffix) parts.push(identifier.suffix)
  if (identifier.qualifier) parts.push(identifier.qualifier)
  return parts.join('_') + (identifier.strict ? '!' : '')
}

/**
 * Derive the generated name and description of one operation
 *
 * @example
 * deriveEntry('all', 1, 'suffix')
 * // => { name: "all_suffixes", description: "all_suffixes/1" }
 *
 * deriveEntry('get_by!', 2, 'user')
 * // => { name: "get_user_by!", description: "get_user_by!/2" }
 *
 * deriveEntry('update', 2, '')
 * // => { name: "update", description: "update/2" }
 */
export function deriveEntry(operationId: string, arity: number, suffix: string): ResolvedEntry {
  assertSuffix(suffix)
  const name = renderIdentifier(toIdentifier(operationId, suffix))
  return { name, description: `${name}/${arity}` }
}

/**
 * @throws {InvalidSuffixError} unless the suffix is empty or lowercase snake case
 */
export function assertSuffix(suffix: string): void {
  if (!SUFFIX_PATTERN.test(suffix)) {
    throw new InvalidSuffixError(suffix)
  }
}

/**
 * Plural form of a snake_case suffix. Only the last word is inflected.
 *
 * @example
 * pluralizeSuffix("blog_post") // => "blog_posts"
 * pluralizeSuffix("person")    // => "people"
 */
export function pluralizeSuffix(suffix: string): string {
  const words = suffix.split('_')
  const last = words.pop() ?? ''
  return [...words, pluralize.plural(last)].join('_')
}

/**
 * Compute the suffix generated names carry for a schema
 *
 * @example
 * computeSuffix("BlogPost")                   // => "blog_post"
 * computeSuffix("MyApp.Accounts.User")        // => "user"
 * computeSuffix("BlogPost", { suffix: false }) // => ""
 *
 * @throws {InvalidSuffixError} if the identifier has no letters or digits
 * to derive a suffix from
 */
export function computeSuffix(schemaIdentifier: string, options: SuffixOptions = {}): string {
  if (options.suffix === false) {
    return ''
  }
  const segments = schemaIdentifier.split('.').filter(Boolean)
  const suffix = toSnakeCase(segments[segments.length - 1] ?? '')

  if (suffix === '') {
    throw new InvalidSuffixError(
      suffix,
      `Schema ${JSON.stringify(schemaIdentifier)} yields an empty suffix; disable suffixing for bare names`,
    )
  }
  return suffix
}

/**
 * Convert an identifier to lowercase snake case
 *
 * @example
 * toSnakeCase("BlogPost")    // => "blog_post"
 * toSnakeCase("HTTPRequest") // => "http_request"
 * toSnakeCase("line-item")   // => "line_item"
 */
export function toSnakeCase(str: string): string {
  return str
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase()
}

/**
 * Convert a snake_case name to camelCase
 *
 * @example
 * toCamelCase("blog_post") // => "blogPost"
 */
export function toCamelCase(str: string): string {
  return str
    .split('_')
    .filter(Boolean)
    .map((word, index) =>
      index === 0
        ? word.toLowerCase()
        : word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    )
    .join('')
}

/**
 * Convert a snake_case name to kebab-case, used for generated file names
 *
 * @example
 * toKebabCase("blog_post") // => "blog-post"
 */
export function toKebabCase(str: string): string {
  return toSnakeCase(str).replace(/_/g, '-')
}

/**
 * Whether a generated name can be written as a bare property key
 */
export function isBareIdentifier(name: string): boolean {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name)
}
