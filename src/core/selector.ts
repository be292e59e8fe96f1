/**
 * Selector Filtering
 *
 * Decides which catalog operations a resource exposes. Callers hand in a
 * loose SelectorInput (shorthand string, `{ only }`, `{ except }`, nothing);
 * parseSelector is the single place that turns it into the Selector union.
 */

import { z } from 'zod'
import { InvalidSelectorError } from './errors.js'
import type { OperationCatalog, OperationId, OperationSpec } from './operation-catalog.js'

export type ShorthandPreset = 'read' | 'read_write'

/** Operation ids accepted in `only`/`except` lists; non-catalog ids match nothing */
export type SelectableId = OperationId | (string & {})

export type Selector =
  | { readonly kind: 'none' }
  | { readonly kind: 'shorthand'; readonly preset: ShorthandPreset }
  | { readonly kind: 'only'; readonly ids: ReadonlySet<string> }
  | { readonly kind: 'except'; readonly ids: ReadonlySet<string> }

export type SelectorInput =
  | Selector
  | ShorthandPreset
  | { readonly only: readonly SelectableId[] }
  | { readonly except: readonly SelectableId[] }
  | readonly []
  | null
  | undefined

export const READ_OPERATIONS: readonly OperationId[] = ['all', 'get', 'get!', 'get_by', 'get_by!']

export const READ_WRITE_OPERATIONS: readonly OperationId[] = [
  ...READ_OPERATIONS,
  'change',
  'create',
  'create!',
  'update',
  'update!',
]

const SHORTHANDS: Record<ShorthandPreset, readonly OperationId[]> = {
  read: READ_OPERATIONS,
  read_write: READ_WRITE_OPERATIONS,
}

const NONE: Selector = Object.freeze({ kind: 'none' })

const idList = z.array(z.string())
const idSet = z.set(z.string())
const shorthand = z.enum(['read', 'read_write'])

const selectorInputSchema = z.union([
  z.undefined().transform((): Selector => NONE),
  z.null().transform((): Selector => NONE),
  z.tuple([]).transform((): Selector => NONE),
  shorthand.transform((preset): Selector => ({ kind: 'shorthand', preset })),
  z
    .object({ only: idList })
    .strict()
    .transform(({ only }): Selector => ({ kind: 'only', ids: new Set(only) })),
  z
    .object({ except: idList })
    .strict()
    .transform(({ except }): Selector => ({ kind: 'except', ids: new Set(except) })),
  z.object({ kind: z.literal('none') }).strict().transform((): Selector => NONE),
  z
    .object({ kind: z.literal('shorthand'), preset: shorthand })
    .strict()
    .transform(({ preset }): Selector => ({ kind: 'shorthand', preset })),
  z
    .object({ kind: z.literal('only'), ids: idSet })
    .strict()
    .transform(({ ids }): Selector => ({ kind: 'only', ids: new Set(ids) })),
  z
    .object({ kind: z.literal('except'), ids: idSet })
    .strict()
    .transform(({ ids }): Selector => ({ kind: 'except', ids: new Set(ids) })),
])

/**
 * Normalize caller input into a Selector.
 *
 * @throws {InvalidSelectorError} for any shape that is not recognized
 */
export function parseSelector(input: unknown): Selector {
  const result = selectorInputSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidSelectorError(input, result.error.issues)
  }
  return result.data
}

/**
 * Expand a shorthand preset into the `only` selector it stands for
 */
export function expandShorthand(preset: ShorthandPreset): Selector {
  return { kind: 'only', ids: new Set(SHORTHANDS[preset]) }
}

/**
 * Keep the catalog entries the selector admits, in catalog order.
 * Membership is exact: `create` and `create!` are separate targets.
 */
export function filterOperations<Id extends string>(
  catalog: OperationCatalog<Id>,
  selector: Selector,
): OperationSpec<Id>[] {
  const entries = catalog.entries()

  switch (selector.kind) {
    case 'none':
      return [...entries]
    case 'shorthand':
      return filterOperations(catalog, expandShorthand(selector.preset))
    case 'only':
      return entries.filter((spec) => selector.ids.has(spec.id))
    case 'except':
      return entries.filter((spec) => !selector.ids.has(spec.id))
    default:
      return rejectSelector(selector)
  }
}

function rejectSelector(selector: never): never {
  throw new InvalidSelectorError(selector)
}
