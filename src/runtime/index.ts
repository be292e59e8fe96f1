/**
 * Runtime Module
 *
 * What generated resource modules import at run time: the operation
 * delegates, bindOperation, changesets and the Repository contract.
 *
 * @example
 * ```ts
 * import { usingRepo, defineSchema } from 'crud-resource/runtime'
 *
 * const Post = defineSchema('Post', z.object({ title: z.string() }))
 *
 * const Blog = usingRepo(repo, ({ resource }) => {
 *   resource(Post, 'read_write')
 * })
 *
 * Blog.__resource__()
 * ```
 */

export {
  all,
  get,
  getOrThrow,
  getBy,
  getByOrThrow,
  create,
  createOrThrow,
  update,
  updateOrThrow,
  remove,
  removeOrThrow,
  change,
  bindOperation,
  bindOperations,
  type OperationFunctions,
  type BoundFunction,
  type WriteResult,
} from './operations.js'

export {
  buildChangeset,
  mergeChangeset,
  isChangeset,
  type Changeset,
  type ChangesetAction,
  type ChangesetError,
} from './changeset.js'

export {
  defineResource,
  usingRepo,
  type BoundResource,
  type ResourceContext,
  type ResourceModule,
  type ResourceListing,
} from './define-resource.js'

export type { Repository, Query, Clauses, OrderBy, SortDirection } from './repository.js'

export {
  defineSchema,
  primaryKeyOf,
  type ResourceSchema,
  type SchemaOptions,
  type ResourceOptions,
  type RecordId,
  type Row,
  type Attributes,
} from '../core/resource-model.js'
