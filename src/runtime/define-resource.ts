/**
 * Resource Binding
 *
 * Binds the functions resolved for a schema to a repository. A resource
 * exposes its functions twice: by generated name (`create_user!`), which
 * is what a host module publishes, and by operation id, which is typed.
 *
 * usingRepo groups several resources behind one repository, the way a
 * context module groups them, and answers `__resource__()` with the
 * `name/arity` listing of everything it defines.
 */

import { DuplicateFunctionError } from '../core/errors.js'
import { computeSuffix } from '../core/naming.js'
import type { OperationId } from '../core/operation-catalog.js'
import { defaultResolver, type OptionResolver, type ResolvedOperations } from '../core/option-resolver.js'
import type { ResourceOptions, ResourceSchema } from '../core/resource-model.js'
import type { SelectorInput } from '../core/selector.js'
import { bindOperations, type BoundFunction, type OperationFunctions } from './operations.js'
import type { Repository } from './repository.js'

export interface BoundResource {
  readonly schema: ResourceSchema
  readonly repository: Repository
  readonly suffix: string
  readonly entries: ResolvedOperations
  /** Keyed by generated name */
  readonly functions: Readonly<Record<string, BoundFunction>>
  /** Keyed by operation id; only the selected operations are present */
  readonly operations: Readonly<Partial<OperationFunctions>>
  /** `name/arity` of every generated function, sorted */
  readonly descriptions: readonly string[]
}

export interface ResourceListing {
  repository: string
  schema: string
  descriptions: string[]
}

export interface ResourceContext {
  resource(schema: ResourceSchema, selector?: SelectorInput, options?: ResourceOptions): BoundResource
}

/**
 * A host module. Besides the members below it carries every generated
 * function as an own property (`Blog['get_post_by!']`); use `functions`
 * or a resource's `operations` for typed access.
 */
export interface ResourceModule {
  readonly [name: string]: unknown
  readonly repository: Repository
  readonly resources: readonly BoundResource[]
  readonly functions: Readonly<Record<string, BoundFunction>>
  has(name: string): boolean
  __resource__(): ResourceListing[]
}

const RESERVED_NAMES: ReadonlySet<string> = new Set([
  'repository',
  'resources',
  'functions',
  'has',
  '__resource__',
])

export function defineResource(
  repo: Repository,
  schema: ResourceSchema,
  selector?: SelectorInput,
  options: ResourceOptions = {},
  resolver: OptionResolver = defaultResolver,
): BoundResource {
  const suffix = computeSuffix(schema.name, options)
  const entries = resolver.resolve(suffix, selector)
  const bound = bindOperations(repo, schema)

  const functions: Record<string, BoundFunction> = {}
  const operations: Partial<OperationFunctions> = {}

  for (const [id, entry] of entries) {
    functions[entry.name] = bound[id]
    assignOperation(operations, bound, id)
  }

  return Object.freeze({
    schema,
    repository: repo,
    suffix,
    entries,
    functions: Object.freeze(functions),
    operations: Object.freeze(operations),
    descriptions: [...entries.values()].map((entry) => entry.description).sort(),
  })
}

/**
 * Define the resources of one repository
 *
 * @example
 * const Blog = usingRepo(repo, ({ resource }) => {
 *   resource(Post)
 *   resource(Comment, 'read')
 * })
 * await Blog['get_comment!'](1)
 * Blog.__resource__()
 * // => [{ repository: 'repo', schema: 'Post', descriptions: ['all_posts/1', ...] }, ...]
 *
 * @throws {DuplicateFunctionError} if two resources generate the same name,
 * or a name is taken by a member of the module itself
 */
export function usingRepo(
  repo: Repository,
  build: (context: ResourceContext) => void,
  resolver: OptionResolver = defaultResolver,
): ResourceModule {
  const resources: BoundResource[] = []
  const functions: Record<string, BoundFunction> = {}

  const context: ResourceContext = {
    resource(schema, selector, options) {
      const resource = defineResource(repo, schema, selector, options, resolver)

      for (const name of Object.keys(resource.functions)) {
        if (Object.hasOwn(functions, name) || RESERVED_NAMES.has(name)) {
          throw new DuplicateFunctionError(name, schema.name)
        }
      }

      Object.assign(functions, resource.functions)
      resources.push(resource)
      return resource
    },
  }

  build(context)

  return Object.freeze({
    ...functions,
    repository: repo,
    resources: Object.freeze([...resources]),
    functions: Object.freeze({ ...functions }),
    has: (name: string) => Object.hasOwn(functions, name),
    __resource__: () =>
      resources.map((resource) => ({
        repository: repo.name,
        schema: resource.schema.name,
        descriptions: [...resource.descriptions],
      })),
  })
}

function assignOperation<K extends OperationId>(
  target: Partial<OperationFunctions>,
  source: OperationFunctions,
  id: K,
): void {
  target[id] = source[id]
}
