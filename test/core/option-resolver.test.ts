/**
 * OptionResolver Tests
 *
 * These tests define the naming contract: which operations a selector
 * keeps and what each generated function is called.
 */

import { describe, it, expect } from 'vitest'
import {
  OptionResolver,
  defaultResolver,
  resolveOperations,
  toRecord,
} from '../../src/core/option-resolver.js'
import { DEFAULT_CATALOG, OperationCatalog } from '../../src/core/operation-catalog.js'
import {
  InvalidSelectorError,
  InvalidSuffixError,
  UnknownOperationError,
} from '../../src/core/errors.js'
import { catchError } from '../support/errors.js'

const ALL_SUFFIX_ENTRIES = {
  all: { name: 'all_suffixes', description: 'all_suffixes/1' },
  change: { name: 'change_suffix', description: 'change_suffix/1' },
  create: { name: 'create_suffix', description: 'create_suffix/1' },
  'create!': { name: 'create_suffix!', description: 'create_suffix!/1' },
  delete: { name: 'delete_suffix', description: 'delete_suffix/1' },
  'delete!': { name: 'delete_suffix!', description: 'delete_suffix!/1' },
  get: { name: 'get_suffix', description: 'get_suffix/2' },
  'get!': { name: 'get_suffix!', description: 'get_suffix!/2' },
  get_by: { name: 'get_suffix_by', description: 'get_suffix_by/2' },
  'get_by!': { name: 'get_suffix_by!', description: 'get_suffix_by!/2' },
  update: { name: 'update_suffix', description: 'update_suffix/2' },
  'update!': { name: 'update_suffix!', description: 'update_suffix!/2' },
}

function keysOf(resolved: ReadonlyMap<string, unknown>): string[] {
  return [...resolved.keys()].sort()
}

describe('OptionResolver', () => {
  describe('without a selector', () => {
    it('resolves every catalog operation', () => {
      const resolved = resolveOperations('suffix')

      expect(resolved.size).toBe(12)
      expect(toRecord(resolved)).toEqual(ALL_SUFFIX_ENTRIES)
    })

    it('treats an empty list and null like no selector', () => {
      expect(toRecord(resolveOperations('suffix', []))).toEqual(ALL_SUFFIX_ENTRIES)
      expect(toRecord(resolveOperations('suffix', null))).toEqual(ALL_SUFFIX_ENTRIES)
      expect(toRecord(resolveOperations('suffix', { kind: 'none' }))).toEqual(ALL_SUFFIX_ENTRIES)
    })

    it('keeps catalog order when iterating', () => {
      expect([...resolveOperations('suffix').keys()]).toEqual(DEFAULT_CATALOG.ids())
    })

    it('returns equal results for equal inputs', () => {
      const first = resolveOperations('user', { except: ['delete!'] })
      const second = resolveOperations('user', { except: ['delete!'] })

      expect(toRecord(first)).toEqual(toRecord(second))
    })
  })

  describe('only', () => {
    it('keeps exactly the listed ids', () => {
      const resolved = resolveOperations('suffix', { only: ['create', 'update'] })

      expect(toRecord(resolved)).toEqual({
        create: { name: 'create_suffix', description: 'create_suffix/1' },
        update: { name: 'update_suffix', description: 'update_suffix/2' },
      })
    })

    it('treats bang variants as separate ids', () => {
      const resolved = resolveOperations('suffix', {
        only: ['create!', 'delete!', 'get!', 'update!'],
      })

      expect(toRecord(resolved)).toEqual({
        'create!': { name: 'create_suffix!', description: 'create_suffix!/1' },
        'delete!': { name: 'delete_suffix!', description: 'delete_suffix!/1' },
        'get!': { name: 'get_suffix!', description: 'get_suffix!/2' },
        'update!': { name: 'update_suffix!', description: 'update_suffix!/2' },
      })
    })

    it('ignores ids that are not in the catalog', () => {
      const resolved = resolveOperations('suffix', { only: ['get', 'archive'] })

      expect(keysOf(resolved)).toEqual(['get'])
    })

    it('resolves nothing for an empty list', () => {
      expect(resolveOperations('suffix', { only: [] }).size).toBe(0)
    })
  })

  describe('except', () => {
    it('drops exactly the listed ids', () => {
      const resolved = resolveOperations('suffix', { except: ['create', 'delete'] })

      expect(keysOf(resolved)).toEqual([
        'all',
        'change',
        'create!',
        'delete!',
        'get',
        'get!',
        'get_by',
        'get_by!',
        'update',
        'update!',
      ])
    })

    it('drops only the bang variants when those are listed', () => {
      const resolved = resolveOperations('suffix', {
        except: ['create!', 'delete!', 'get!', 'update!'],
      })

      expect(toRecord(resolved)).toEqual({
        all: { name: 'all_suffixes', description: 'all_suffixes/1' },
        change: { name: 'change_suffix', description: 'change_suffix/1' },
        create: { name: 'create_suffix', description: 'create_suffix/1' },
        delete: { name: 'delete_suffix', description: 'delete_suffix/1' },
        get: { name: 'get_suffix', description: 'get_suffix/2' },
        get_by: { name: 'get_suffix_by', description: 'get_suffix_by/2' },
        'get_by!': { name: 'get_suffix_by!', description: 'get_suffix_by!/2' },
        update: { name: 'update_suffix', description: 'update_suffix/2' },
      })
    })

    it('partitions the catalog together with only', () => {
      const ids = ['get', 'create!', 'all', 'archive']
      const kept = keysOf(resolveOperations('post', { only: ids }))
      const dropped = keysOf(resolveOperations('post', { except: ids }))

      expect(kept).toEqual(['all', 'create!', 'get'])
      expect(kept.filter((id) => dropped.includes(id))).toEqual([])
      expect([...kept, ...dropped].sort()).toEqual([...DEFAULT_CATALOG.ids()].sort())
    })
  })

  describe('shorthands', () => {
    it('read equals its only expansion', () => {
      const shorthand = resolveOperations('suffix', 'read')
      const expanded = resolveOperations('suffix', {
        only: ['all', 'get', 'get!', 'get_by', 'get_by!'],
      })

      expect(toRecord(shorthand)).toEqual(toRecord(expanded))
      expect(keysOf(shorthand)).toEqual(['all', 'get', 'get!', 'get_by', 'get_by!'])
    })

    it('read_write equals its only expansion', () => {
      const shorthand = resolveOperations('suffix', 'read_write')
      const expanded = resolveOperations('suffix', {
        only: ['all', 'get', 'get!', 'get_by', 'get_by!', 'change', 'create', 'create!', 'update', 'update!'],
      })

      expect(toRecord(shorthand)).toEqual(toRecord(expanded))
      expect(shorthand.size).toBe(10)
      expect(shorthand.has('delete')).toBe(false)
      expect(shorthand.has('delete!')).toBe(false)
    })
  })

  describe('naming', () => {
    it('infixes the suffix in get_by', () => {
      const resolved = resolveOperations('user', 'read')

      expect(resolved.get('get_by')).toEqual({ name: 'get_user_by', description: 'get_user_by/2' })
      expect(resolved.get('get_by!')).toEqual({
        name: 'get_user_by!',
        description: 'get_user_by!/2',
      })
    })

    it('uses the bare ids when the suffix is empty', () => {
      const resolved = resolveOperations('')

      expect(resolved.get('all')).toEqual({ name: 'all', description: 'all/1' })
      expect(resolved.get('get_by!')).toEqual({ name: 'get_by!', description: 'get_by!/2' })
      expect(resolved.get('create!')).toEqual({ name: 'create!', description: 'create!/1' })
    })

    it('pluralizes only the last word of a compound suffix', () => {
      expect(resolveOperations('blog_post').get('all')).toEqual({
        name: 'all_blog_posts',
        description: 'all_blog_posts/1',
      })
    })
  })

  describe('errors', () => {
    it('rejects a selector read from loose input', () => {
      const selector = JSON.parse('"write"')
      const error = catchError(() => resolveOperations('user', selector))

      expect(error).toBeInstanceOf(InvalidSelectorError)
      expect(error).toMatchObject({
        code: 'INVALID_SELECTOR',
        message: 'Invalid selector: "write"',
      })
    })

    it('rejects only and except given together', () => {
      const selector = JSON.parse('{"only":["create"],"except":["delete"]}')

      expect(() => defaultResolver.resolve('user', selector)).toThrow(InvalidSelectorError)
    })

    it('rejects a suffix that is not snake case', () => {
      expect(() => resolveOperations('Blog Post')).toThrow(InvalidSuffixError)
    })
  })

  describe('custom catalogs', () => {
    const catalog = new OperationCatalog([
      { id: 'list', arity: 0 },
      { id: 'archive!', arity: 1 },
      { id: 'get_by', arity: 1 },
    ])
    const resolver = new OptionResolver(catalog)

    it('resolves against the injected catalog', () => {
      expect(toRecord(resolver.resolve('post'))).toEqual({
        list: { name: 'list_post', description: 'list_post/0' },
        'archive!': { name: 'archive_post!', description: 'archive_post!/1' },
        get_by: { name: 'get_post_by', description: 'get_post_by/1' },
      })
    })

    it('applies selectors to the injected catalog', () => {
      expect(keysOf(resolver.resolve('post', { except: ['list'] }))).toEqual(['archive!', 'get_by'])
    })

    it('resolves a single operation', () => {
      expect(resolver.resolveOne('archive!', 'post')).toEqual({
        name: 'archive_post!',
        description: 'archive_post!/1',
      })
    })

    it('rejects an operation outside the catalog', () => {
      expect(() => resolver.resolveOne('create', 'post')).toThrow(UnknownOperationError)
    })
  })
})
