/**
 * OptionResolver
 *
 * Turns (suffix, selector) into the set of functions a resource exposes:
 * filter the catalog, then derive a name and description for every
 * surviving operation. Pure; a failed call produces no partial result.
 */

import {
  DEFAULT_CATALOG,
  type OperationCatalog,
  type OperationId,
} from './operation-catalog.js'
import { deriveEntry, assertSuffix, type ResolvedEntry } from './naming.js'
import { filterOperations, parseSelector, type SelectorInput } from './selector.js'

export type ResolvedOperations<Id extends string = OperationId> = ReadonlyMap<Id, ResolvedEntry>

export class OptionResolver<Id extends string = OperationId> {
  readonly catalog: OperationCatalog<Id>

  constructor(catalog: OperationCatalog<Id>) {
    this.catalog = catalog
  }

  /**
   * Resolve the operations kept by `selector`, named with `suffix`
   *
   * @throws {InvalidSelectorError} if the selector shape is not recognized
   * @throws {InvalidSuffixError} if the suffix is not lowercase snake case
   */
  resolve(suffix: string, selector?: SelectorInput): ResolvedOperations<Id> {
    assertSuffix(suffix)
    const parsed = parseSelector(selector)
    const resolved = new Map<Id, ResolvedEntry>()

    for (const spec of filterOperations(this.catalog, parsed)) {
      resolved.set(spec.id, deriveEntry(spec.id, spec.arity, suffix))
    }

    return resolved
  }

  /**
   * Resolve a single operation regardless of any selector
   *
   * @throws {UnknownOperationError} if the id is not part of the catalog
   */
  resolveOne(operationId: string, suffix: string): ResolvedEntry {
    const spec = this.catalog.lookup(operationId)
    return deriveEntry(spec.id, spec.arity, suffix)
  }
}

export const defaultResolver = new OptionResolver(DEFAULT_CATALOG)

/**
 * Resolve against the default catalog
 *
 * @example
 * resolveOperations('user', 'read').get('get_by')
 * // => { name: "get_user_by", description: "get_user_by/2" }
 */
export function resolveOperations(
  suffix: string,
  selector?: SelectorInput,
): ResolvedOperations {
  return defaultResolver.resolve(suffix, selector)
}

/**
 * Plain-object view of a resolution, keyed by operation id
 */
export function toRecord<Id extends string>(
  resolved: ResolvedOperations<Id>,
): Partial<Record<Id, ResolvedEntry>> {
  const record: Partial<Record<Id, ResolvedEntry>> = {}
  for (const [id, entry] of resolved) {
    record[id] = entry
  }
  return record
}
