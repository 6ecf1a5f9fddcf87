/**
 * Tests for the memory stores and term-vector ranking.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { cosineSimilarity, termVector, tokenize } from '../term-vector.js'
import { SqliteMemoryStore } from '../sqlite-memory-store.js'
import { DisabledMemoryStore } from '../disabled-memory-store.js'
import { createMemoryStore } from '../index.js'

describe('term vectors', () => {
  it('tokenizes case-insensitively on word characters', () => {
    expect(tokenize('Build a CLI-based calculator_app, v2!')).toEqual([
      'build',
      'a',
      'cli',
      'based',
      'calculator_app',
      'v2',
    ])
  })

  it('counts repeated terms', () => {
    expect([...termVector('add add sub')]).toEqual([
      ['add', 2],
      ['sub', 1],
    ])
  })

  it('scores identical texts 1 and disjoint texts 0', () => {
    expect(cosineSimilarity(termVector('flask blog'), termVector('blog flask'))).toBeCloseTo(1)
    expect(cosineSimilarity(termVector('flask blog'), termVector('rust kernel'))).toBe(0)
  })

  it('scores an empty vector 0', () => {
    expect(cosineSimilarity(termVector(''), termVector('anything'))).toBe(0)
  })
})

describe('SqliteMemoryStore', () => {
  let store: SqliteMemoryStore

  beforeEach(() => {
    store = new SqliteMemoryStore({ databasePath: ':memory:', collection: 'test_memory' })
  })

  afterEach(() => {
    store.close()
  })

  it('ranks the closest document first', async () => {
    await store.addMemory('flask blog with user accounts', { goal: 'blog' }, 'run-a')
    await store.addMemory('command line calculator in python', { goal: 'calculator' }, 'run-b')
    await store.addMemory('calculator web page', { goal: 'web calculator' }, 'run-c')

    const texts = await store.queryMemory('python calculator', 2)
    expect(texts).toEqual(['command line calculator in python', 'calculator web page'])
  })

  it('returns metadata and scores from search', async () => {
    await store.addMemory('inventory tracker', { goal: 'inventory', cycles: 2, approved: true }, 'run-1')

    const [match] = await store.search('inventory tracker')
    expect(match).toEqual({
      id: 'run-1',
      text: 'inventory tracker',
      metadata: { goal: 'inventory', cycles: 2, approved: true },
      score: expect.closeTo(1, 5),
    })
  })

  it('upserts by id instead of duplicating', async () => {
    await store.addMemory('first version of the plan', {}, 'run-42')
    await store.addMemory('second version of the plan', {}, 'run-42')

    const matches = await store.search('version plan', 10)
    expect(matches.map((m) => m.text)).toEqual(['second version of the plan'])
  })

  it('omits documents with nothing in common', async () => {
    await store.addMemory('todo list', {}, 'run-1')
    await expect(store.queryMemory('weather station')).resolves.toEqual([])
  })

  it('returns nothing for n <= 0', async () => {
    await store.addMemory('todo list', {}, 'run-1')
    await expect(store.queryMemory('todo', 0)).resolves.toEqual([])
  })

  it('defaults to three results', async () => {
    for (const id of ['a', 'b', 'c', 'd']) {
      await store.addMemory(`shared term ${id}`, {}, id)
    }
    await expect(store.queryMemory('shared term')).resolves.toHaveLength(3)
  })
})

describe('DisabledMemoryStore', () => {
  it('stores nothing and finds nothing', async () => {
    const store = new DisabledMemoryStore()
    await store.addMemory('anything', {}, 'run-1')
    expect(store.enabled).toBe(false)
    await expect(store.queryMemory('anything')).resolves.toEqual([])
  })
})

describe('createMemoryStore', () => {
  it('returns the disabled store when memory is off', () => {
    const store = createMemoryStore({ enabled: false, collection: 'c' }, '/unused')
    expect(store).toBeInstanceOf(DisabledMemoryStore)
  })

  it('returns a SQLite store when memory is on', () => {
    const store = createMemoryStore({ enabled: true, collection: 'c' }, '/unused')
    expect(store).toBeInstanceOf(SqliteMemoryStore)
    store.close()
  })
})
