/**
 * Operation Catalog
 *
 * The fixed universe of CRUD operations a resource can expose, with the
 * arity each generated function is documented with. Arity excludes the
 * repository argument the runtime delegates take first.
 */

import { InvalidCatalogError, UnknownOperationError } from './errors.js'

/**
 * Default operation table. This is the single definition of the catalog;
 * everything else derives from it.
 */
export const DEFAULT_OPERATIONS = [
  { id: 'update!', arity: 2 },
  { id: 'update', arity: 2 },
  { id: 'get_by!', arity: 2 },
  { id: 'get_by', arity: 2 },
  { id: 'get!', arity: 2 },
  { id: 'get', arity: 2 },
  { id: 'delete!', arity: 1 },
  { id: 'delete', arity: 1 },
  { id: 'create!', arity: 1 },
  { id: 'create', arity: 1 },
  { id: 'change', arity: 1 },
  { id: 'all', arity: 1 },
] as const

export type OperationId = (typeof DEFAULT_OPERATIONS)[number]['id']

export interface OperationSpec<Id extends string = OperationId> {
  readonly id: Id
  readonly arity: number
}

/** Bare identifier with an optional trailing bang */
const OPERATION_ID_PATTERN = /^[a-z][a-z0-9_]*!?$/

/**
 * Immutable, ordered set of operations.
 *
 * The default catalog is shared; tests and embedders can build their own
 * and hand it to an OptionResolver.
 */
export class OperationCatalog<Id extends string = OperationId> {
  private readonly specs: readonly OperationSpec<Id>[]
  private readonly byId: ReadonlyMap<string, OperationSpec<Id>>

  constructor(specs: readonly OperationSpec<Id>[]) {
    const byId = new Map<string, OperationSpec<Id>>()

    for (const spec of specs) {
      if (!OPERATION_ID_PATTERN.test(spec.id)) {
        throw new InvalidCatalogError(`Operation id "${spec.id}" is not an identifier`)
      }
      if (!Number.isInteger(spec.arity) || spec.arity < 0) {
        throw new InvalidCatalogError(`Operation ${spec.id} has invalid arity ${spec.arity}`)
      }
      if (byId.has(spec.id)) {
        throw new InvalidCatalogError(`Operation ${spec.id} is listed more than once`)
      }
      byId.set(spec.id, Object.freeze({ id: spec.id, arity: spec.arity }))
    }

    this.specs = Object.freeze([...byId.values()])
    this.byId = byId
  }

  get size(): number {
    return this.specs.length
  }

  entries(): readonly OperationSpec<Id>[] {
    return this.specs
  }

  ids(): Id[] {
    return this.specs.map((spec) => spec.id)
  }

  has(id: string): id is Id {
    return this.byId.has(id)
  }

  /**
   * @throws {UnknownOperationError} if the id is not part of this catalog
   */
  lookup(id: string): OperationSpec<Id> {
    const spec = this.byId.get(id)
    if (!spec) {
      throw new UnknownOperationError(id)
    }
    return spec
  }
}

export const DEFAULT_CATALOG = new OperationCatalog<OperationId>(DEFAULT_OPERATIONS)

export function isOperationId(value: string): value is OperationId {
  return DEFAULT_CATALOG.has(value)
}
