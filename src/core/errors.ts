/**
 * Error taxonomy
 *
 * Every error raised by crud-resource extends CrudResourceError and carries
 * a stable `code` so callers can branch without string matching.
 */

import type { ZodIssue } from 'zod'
import type { Changeset } from '../runtime/changeset.js'

export type CrudResourceErrorCode =
  | 'INVALID_SELECTOR'
  | 'UNKNOWN_OPERATION'
  | 'INVALID_CATALOG'
  | 'INVALID_SUFFIX'
  | 'DUPLICATE_FUNCTION'
  | 'RECORD_NOT_FOUND'
  | 'INVALID_CHANGESET'
  | 'CONFIG_ERROR'

export class CrudResourceError extends Error {
  readonly code: CrudResourceErrorCode

  constructor(code: CrudResourceErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * The selector passed to the resolver is not `none`, a shorthand,
 * an `only` list or an `except` list.
 */
export class InvalidSelectorError extends CrudResourceError {
  readonly input: unknown
  readonly issues: ZodIssue[]

  constructor(input: unknown, issues: ZodIssue[] = []) {
    super('INVALID_SELECTOR', `Invalid selector: ${describeInput(input)}`)
    this.input = input
    this.issues = issues
  }
}

export class UnknownOperationError extends CrudResourceError {
  readonly operationId: string

  constructor(operationId: string) {
    super('UNKNOWN_OPERATION', `Unknown operation: ${operationId}`)
    this.operationId = operationId
  }
}

export class InvalidCatalogError extends CrudResourceError {
  constructor(message: string) {
    super('INVALID_CATALOG', message)
  }
}

export class InvalidSuffixError extends CrudResourceError {
  readonly suffix: string

  constructor(suffix: string, message = `Suffix must be lowercase snake case, got "${suffix}"`) {
    super('INVALID_SUFFIX', message)
    this.suffix = suffix
  }
}

export class DuplicateFunctionError extends CrudResourceError {
  readonly functionName: string

  constructor(functionName: string, schemaName: string) {
    super(
      'DUPLICATE_FUNCTION',
      `Function ${functionName} generated for ${schemaName} is already defined`,
    )
    this.functionName = functionName
  }
}

export class RecordNotFoundError extends CrudResourceError {
  readonly schemaName: string
  readonly lookup: unknown

  constructor(schemaName: string, lookup: unknown) {
    super('RECORD_NOT_FOUND', `No ${schemaName} found for ${describeInput(lookup)}`)
    this.schemaName = schemaName
    this.lookup = lookup
  }
}

export class InvalidChangesetError extends CrudResourceError {
  readonly changeset: Changeset

  constructor(changeset: Changeset) {
    const details = changeset.errors
      .map((error) => (error.path ? `${error.path}: ${error.message}` : error.message))
      .join('; ')
    super(
      'INVALID_CHANGESET',
      `Could not ${changeset.action} ${changeset.schema.name}: ${details}`,
    )
    this.changeset = changeset
  }
}

export class ConfigError extends CrudResourceError {
  readonly issues: ZodIssue[]

  constructor(message: string, issues: ZodIssue[] = []) {
    super('CONFIG_ERROR', message)
    this.issues = issues
  }
}

function describeInput(input: unknown): string {
  if (input === undefined) return 'undefined'
  try {
    return JSON.stringify(input)
  } catch {
    return String(input)
  }
}
