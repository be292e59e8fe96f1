/**
 * Resource Model - Core Types
 *
 * Describes what a resource is bound to: a named schema whose writable
 * attributes are a zod object, plus the options that shape its generated
 * function names.
 */

import type { z } from 'zod'
import type { SuffixOptions } from './naming.js'

export type RecordId = string | number

/** A stored record as the repository returns it */
export type Row = Record<string, unknown>

/** Attributes handed to create/update/change */
export type Attributes = Record<string, unknown>

export interface ResourceSchema {
  /** Identifier the suffix is derived from, e.g. `BlogPost` */
  readonly name: string
  /** Writable attributes; the primary key is assigned by the repository */
  readonly fields: z.AnyZodObject
  /** Defaults to `id` */
  readonly primaryKey: string
}

export interface SchemaOptions {
  primaryKey?: string
}

/**
 * Options accepted next to the selector when a resource is defined
 */
export type ResourceOptions = SuffixOptions

export function defineSchema(
  name: string,
  fields: z.AnyZodObject,
  options: SchemaOptions = {},
): ResourceSchema {
  return Object.freeze({
    name,
    fields,
    primaryKey: options.primaryKey ?? 'id',
  })
}

/**
 * Read the primary key of a record, if it has a usable one
 */
export function primaryKeyOf(schema: ResourceSchema, record: Row): RecordId | undefined {
  const value = record[schema.primaryKey]
  return typeof value === 'string' || typeof value === 'number' ? value : undefined
}
