/**
 * Changesets
 *
 * A changeset pairs a record with the changes about to be written and the
 * validation outcome of those changes against the schema's zod fields.
 * Keys that are not schema fields are dropped.
 */

import type { ZodIssue } from 'zod'
import {
  primaryKeyOf,
  type Attributes,
  type ResourceSchema,
  type Row,
} from '../core/resource-model.js'

const built = new WeakSet<object>()

export type ChangesetAction = 'insert' | 'update' | 'delete'

export interface ChangesetError {
  /** Dotted field path; empty for errors on the record as a whole */
  path: string
  message: string
}

export interface Changeset {
  readonly schema: ResourceSchema
  readonly action: ChangesetAction
  /** The record being changed; empty for inserts */
  readonly data: Row
  readonly changes: Attributes
  readonly errors: readonly ChangesetError[]
  readonly valid: boolean
}

/**
 * Validate `changes` for `action` and build the resulting changeset
 *
 * - insert: every required field must be present in `changes`
 * - update: only the given fields are validated
 * - delete: `data` must carry a primary key
 */
export function buildChangeset(
  schema: ResourceSchema,
  data: Row,
  changes: Attributes,
  action: ChangesetAction,
): Changeset {
  if (action === 'delete') {
    const errors: ChangesetError[] =
      primaryKeyOf(schema, data) === undefined
        ? [{ path: schema.primaryKey, message: 'is missing' }]
        : []
    return freeze({ schema, action, data, changes: {}, errors, valid: errors.length === 0 })
  }

  const validator = action === 'insert' ? schema.fields : schema.fields.partial()
  const result = validator.safeParse(changes)

  if (result.success) {
    return freeze({ schema, action, data, changes: result.data, errors: [], valid: true })
  }

  return freeze({
    schema,
    action,
    data,
    changes: pickFields(schema, changes),
    errors: result.error.issues.map(toChangesetError),
    valid: false,
  })
}

/**
 * Apply more changes on top of an existing changeset, revalidating
 */
export function mergeChangeset(changeset: Changeset, changes: Attributes): Changeset {
  return buildChangeset(
    changeset.schema,
    changeset.data,
    { ...changeset.changes, ...changes },
    changeset.action,
  )
}

/**
 * Whether `value` was built by buildChangeset. Rows that merely share its
 * keys are not changesets.
 */
export function isChangeset(value: unknown): value is Changeset {
  return typeof value === 'object' && value !== null && built.has(value)
}

function pickFields(schema: ResourceSchema, changes: Attributes): Attributes {
  const known = new Set(Object.keys(schema.fields.shape))
  return Object.fromEntries(Object.entries(changes).filter(([key]) => known.has(key)))
}

function toChangesetError(issue: ZodIssue): ChangesetError {
  return { path: issue.path.join('.'), message: issue.message }
}

function freeze(changeset: Changeset): Changeset {
  const frozen = Object.freeze(changeset)
  built.add(frozen)
  return frozen
}
