/**
 * Operation Delegates
 *
 * One function per catalog operation, taking the repository and schema
 * first. Generated functions are these delegates with the repository and
 * schema already applied (see bindOperation).
 *
 * Plain variants report failure in their return value (`null`, or a
 * `{ ok: false, changeset }` result); bang variants throw.
 */

import { InvalidChangesetError, RecordNotFoundError } from '../core/errors.js'
import type { OperationId } from '../core/operation-catalog.js'
import type { Attributes, RecordId, ResourceSchema, Row } from '../core/resource-model.js'
import { buildChangeset, isChangeset, mergeChangeset, type Changeset } from './changeset.js'
import type { Clauses, Query, Repository } from './repository.js'

export type WriteResult =
  | { readonly ok: true; readonly value: Row }
  | { readonly ok: false; readonly changeset: Changeset }

/**
 * Signatures of the bound functions, keyed by operation id
 */
export interface OperationFunctions {
  all: (query?: Query) => Promise<Row[]>
  get: (id: RecordId, query?: Query) => Promise<Row | null>
  'get!': (id: RecordId, query?: Query) => Promise<Row>
  get_by: (clauses: Clauses, query?: Query) => Promise<Row | null>
  'get_by!': (clauses: Clauses, query?: Query) => Promise<Row>
  create: (attrs: Attributes) => Promise<WriteResult>
  'create!': (attrs: Attributes) => Promise<Row>
  update: (record: Row, changes: Attributes) => Promise<WriteResult>
  'update!': (record: Row, changes: Attributes) => Promise<Row>
  delete: (record: Row) => Promise<WriteResult>
  'delete!': (record: Row) => Promise<Row>
  change: (target?: Row | Changeset, changes?: Attributes) => Changeset
}

export type BoundFunction = OperationFunctions[OperationId]

export async function all(
  repo: Repository,
  schema: ResourceSchema,
  query: Query = {},
): Promise<Row[]> {
  return repo.all(schema, query)
}

export async function get(
  repo: Repository,
  schema: ResourceSchema,
  id: RecordId,
  query: Query = {},
): Promise<Row | null> {
  if (query.where && Object.keys(query.where).length > 0) {
    return repo.getBy(schema, { ...query.where, [schema.primaryKey]: id })
  }
  return repo.get(schema, id)
}

/**
 * @throws {RecordNotFoundError}
 */
export async function getOrThrow(
  repo: Repository,
  schema: ResourceSchema,
  id: RecordId,
  query: Query = {},
): Promise<Row> {
  const record = await get(repo, schema, id, query)
  if (!record) {
    throw new RecordNotFoundError(schema.name, { [schema.primaryKey]: id })
  }
  return record
}

export async function getBy(
  repo: Repository,
  schema: ResourceSchema,
  clauses: Clauses,
  query: Query = {},
): Promise<Row | null> {
  return repo.getBy(schema, { ...query.where, ...clauses })
}

/**
 * @throws {RecordNotFoundError}
 */
export async function getByOrThrow(
  repo: Repository,
  schema: ResourceSchema,
  clauses: Clauses,
  query: Query = {},
): Promise<Row> {
  const record = await getBy(repo, schema, clauses, query)
  if (!record) {
    throw new RecordNotFoundError(schema.name, clauses)
  }
  return record
}

export async function create(
  repo: Repository,
  schema: ResourceSchema,
  attrs: Attributes,
): Promise<WriteResult> {
  const changeset = buildChangeset(schema, {}, attrs, 'insert')
  if (!changeset.valid) {
    return { ok: false, changeset }
  }
  return { ok: true, value: await repo.insert(schema, changeset.changes) }
}

/**
 * @throws {InvalidChangesetError}
 */
export async function createOrThrow(
  repo: Repository,
  schema: ResourceSchema,
  attrs: Attributes,
): Promise<Row> {
  return unwrap(await create(repo, schema, attrs))
}

export async function update(
  repo: Repository,
  schema: ResourceSchema,
  record: Row,
  changes: Attributes,
): Promise<WriteResult> {
  const changeset = buildChangeset(schema, record, changes, 'update')
  if (!changeset.valid) {
    return { ok: false, changeset }
  }
  return { ok: true, value: await repo.update(schema, record, changeset.changes) }
}

/**
 * @throws {InvalidChangesetError}
 */
export async function updateOrThrow(
  repo: Repository,
  schema: ResourceSchema,
  record: Row,
  changes: Attributes,
): Promise<Row> {
  return unwrap(await update(repo, schema, record, changes))
}

export async function remove(
  repo: Repository,
  schema: ResourceSchema,
  record: Row,
): Promise<WriteResult> {
  const changeset = buildChangeset(schema, record, {}, 'delete')
  if (!changeset.valid) {
    return { ok: false, changeset }
  }
  return { ok: true, value: await repo.delete(schema, record) }
}

/**
 * @throws {InvalidChangesetError}
 */
export async function removeOrThrow(
  repo: Repository,
  schema: ResourceSchema,
  record: Row,
): Promise<Row> {
  return unwrap(await remove(repo, schema, record))
}

/**
 * Build a changeset without touching the repository. With no target the
 * changeset describes a new record; with a changeset the changes are
 * merged into it.
 */
export function change(
  schema: ResourceSchema,
  target?: Row | Changeset,
  changes: Attributes = {},
): Changeset {
  if (isChangeset(target)) {
    return mergeChangeset(target, changes)
  }
  if (target === undefined) {
    return buildChangeset(schema, {}, changes, 'insert')
  }
  return buildChangeset(schema, target, changes, 'update')
}

/**
 * All operation functions with `repo` and `schema` applied
 */
export function bindOperations(repo: Repository, schema: ResourceSchema): OperationFunctions {
  return {
    all: (query) => all(repo, schema, query),
    get: (id, query) => get(repo, schema, id, query),
    'get!': (id, query) => getOrThrow(repo, schema, id, query),
    get_by: (clauses, query) => getBy(repo, schema, clauses, query),
    'get_by!': (clauses, query) => getByOrThrow(repo, schema, clauses, query),
    create: (attrs) => create(repo, schema, attrs),
    'create!': (attrs) => createOrThrow(repo, schema, attrs),
    update: (record, changes) => update(repo, schema, record, changes),
    'update!': (record, changes) => updateOrThrow(repo, schema, record, changes),
    delete: (record) => remove(repo, schema, record),
    'delete!': (record) => removeOrThrow(repo, schema, record),
    change: (target, changes) => change(schema, target, changes),
  }
}

/**
 * The function for a single operation, with `repo` and `schema` applied
 *
 * @example
 * const createUser = bindOperation(repo, User, 'create!')
 * await createUser({ email: 'a@example.com' })
 */
export function bindOperation<K extends OperationId>(
  repo: Repository,
  schema: ResourceSchema,
  id: K,
): OperationFunctions[K] {
  return bindOperations(repo, schema)[id]
}

function unwrap(result: WriteResult): Row {
  if (!result.ok) {
    throw new InvalidChangesetError(result.changeset)
  }
  return result.value
}
