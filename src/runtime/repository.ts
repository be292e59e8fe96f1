/**
 * Repository
 *
 * The storage primitives generated functions delegate to. crud-resource
 * ships no implementation; adapt your database client to this interface.
 */

import type { RecordId, ResourceSchema, Row, Attributes } from '../core/resource-model.js'

/** Equality clauses, e.g. `{ email: 'a@example.com' }` */
export type Clauses = Record<string, unknown>

export type SortDirection = 'asc' | 'desc'

export interface OrderBy {
  field: string
  direction?: SortDirection
}

export interface Query {
  where?: Clauses
  orderBy?: OrderBy | OrderBy[]
  limit?: number
}

export interface Repository {
  /** Shown in introspection listings */
  readonly name: string

  all(schema: ResourceSchema, query: Query): Promise<Row[]>
  get(schema: ResourceSchema, id: RecordId): Promise<Row | null>
  getBy(schema: ResourceSchema, clauses: Clauses): Promise<Row | null>
  insert(schema: ResourceSchema, attrs: Attributes): Promise<Row>
  update(schema: ResourceSchema, record: Row, changes: Attributes): Promise<Row>
  delete(schema: ResourceSchema, record: Row): Promise<Row>
}
