/**
 * ResourceGenerator Tests
 */

import { describe, it, expect, beforeAll } from 'vitest'
import { resolve } from 'path'
import { fileURLToPath } from 'url'
import { ResourceGenerator, generateResources, stringLiteral } from '../../src/generators/resource-generator.js'
import {
  loadResourceConfig,
  parseResourceConfig,
  type ResourceConfig,
} from '../../src/generators/config-loader.js'
import { ConfigError } from '../../src/core/errors.js'

const fixturesDir = resolve(fileURLToPath(new URL('.', import.meta.url)), '../fixtures')

const HEADER_LINES = [
  ' *',
  ' * Auto-generated by crud-resource.',
  ' * Do not edit manually - regenerate using crud-resource CLI.',
  ' */',
]

describe('ResourceGenerator', () => {
  let config: ResourceConfig

  beforeAll(async () => {
    config = await loadResourceConfig(resolve(fixturesDir, 'crud-resource.json'))
  })

  describe('file generation', () => {
    it('generates one file per resource, named after the schema', () => {
      const output = generateResources(config)

      expect([...output.resources.keys()]).toEqual(['post.ts', 'user.ts', 'audit-entry.ts'])
    })

    it('generates an index re-exporting every resource', () => {
      const output = generateResources(config)

      expect(output.index).toBe(
        [
          '/**',
          ' * Resources',
          ...HEADER_LINES,
          '',
          "export * from './post.js'",
          "export * from './user.js'",
          "export * from './audit-entry.js'",
          '',
        ].join('\n'),
      )
    })

    it('rejects two resources writing the same file', () => {
      const clashing = parseResourceConfig({
        repository: { name: 'repo', import: './repo.js' },
        resources: [
          { schema: 'Blog.Post', import: './a.js' },
          { schema: 'Forum.Post', import: './b.js' },
        ],
      })

      expect(() => generateResources(clashing)).toThrow(ConfigError)
    })
  })

  describe('resource modules', () => {
    it('binds each resolved operation in catalog order', () => {
      const output = generateResources(config)

      expect(output.resources.get('post.ts')).toBe(
        [
          '/**',
          ' * Blog.Post Resource',
          ...HEADER_LINES,
          '',
          "import { bindOperation } from 'crud-resource/runtime'",
          "import { repo } from '../db/repo.js'",
          "import { Post } from '../schemas/post.js'",
          '',
          'export const postResource = {',
          '  /** get_post_by!/2 */',
          "  'get_post_by!': bindOperation(repo, Post, 'get_by!'),",
          '  /** create_post/1 */',
          "  create_post: bindOperation(repo, Post, 'create'),",
          '} as const',
          '',
          'export const postDescriptions = [',
          "  'create_post/1',",
          "  'get_post_by!/2',",
          '] as const',
          '',
        ].join('\n'),
      )
    })

    it('expands shorthands', () => {
      const code = generateResources(config).resources.get('user.ts') ?? ''

      expect(code).toContain("  all_users: bindOperation(repo, User, 'all'),")
      expect(code).toContain("  get_user_by: bindOperation(repo, User, 'get_by'),")
      expect(code).not.toContain('create_user')
    })

    it('uses bare names and the configured export without a suffix', () => {
      const code = generateResources(config).resources.get('audit-entry.ts') ?? ''

      expect(code).toContain("import { AuditEntrySchema } from '../schemas/audit.js'")
      expect(code).toContain('export const auditEntryResource = {')
      expect(code).toContain("  'get!': bindOperation(repo, AuditEntrySchema, 'get!'),")
      expect(code).toContain("  all: bindOperation(repo, AuditEntrySchema, 'all'),")
    })

    it('imports the runtime from the configured specifier', () => {
      const output = generateResources({ ...config, runtimeImport: '@app/runtime' })

      expect(output.resources.get('post.ts')).toContain(
        "import { bindOperation } from '@app/runtime'",
      )
    })

    it('omits the description comments when asked', () => {
      const generator = new ResourceGenerator({ includeJSDoc: false })
      const code = generator.generate(config).resources.get('post.ts') ?? ''

      expect(code).not.toContain('/** get_post_by!/2 */')
    })

    it('generates an empty resource for an empty selection', () => {
      const empty = parseResourceConfig({
        repository: { name: 'repo', import: './repo.js' },
        resources: [{ schema: 'Tag', import: './tag.js', selector: { only: [] } }],
      })
      const code = generateResources(empty).resources.get('tag.ts') ?? ''

      expect(code).toContain('export const tagResource = {\n} as const')
      expect(code).toContain('export const tagDescriptions: readonly string[] = []')
    })
  })

  describe('string literals', () => {
    it('escapes quotes and backslashes in import specifiers', () => {
      const quoted = parseResourceConfig({
        repository: { name: 'repo', import: "../it's.js" },
        resources: [{ schema: 'Post', import: './models\\post.js', selector: { only: ['get'] } }],
      })
      const source = generateResources(quoted).resources.get('post.ts') ?? ''

      expect(source.split('\n').slice(7, 10)).toEqual([
        "import { bindOperation } from 'crud-resource/runtime'",
        "import { repo } from '../it\\'s.js'",
        "import { Post } from './models\\\\post.js'",
      ])
    })

    it('escapes line breaks', () => {
      expect(stringLiteral('a\nb\rc')).toBe("'a\\nb\\rc'")
    })

    it('leaves plain specifiers untouched', () => {
      expect(stringLiteral('crud-resource/runtime')).toBe("'crud-resource/runtime'")
    })
  })
})
