/**
 * Tests for DatabaseWrapper and the migration runner.
 *
 * Uses :memory: databases for speed and zero cleanup.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { z } from 'zod'
import { DatabaseWrapper } from '../../src/persistence/database.js'
import {
  MEMORY_MIGRATIONS,
  STATE_MIGRATIONS,
  runMigrations,
} from '../../src/persistence/migrations/index.js'

const NameRowsSchema = z.array(z.object({ name: z.string() }))

function tableNames(wrapper: DatabaseWrapper): string[] {
  const rows = wrapper.db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
    .all()
  return NameRowsSchema.parse(rows).map((row) => row.name)
}

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(':memory:', STATE_MIGRATIONS)
  })

  afterEach(() => {
    if (wrapper.isOpen) wrapper.close()
  })

  it('starts closed', () => {
    expect(wrapper.isOpen).toBe(false)
  })

  it('throws when accessing db before open', () => {
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('is idempotent on repeated open calls', () => {
    wrapper.open()
    const db1 = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(db1)
  })

  it('is idempotent on repeated close calls', () => {
    wrapper.open()
    wrapper.close()
    wrapper.close()
    expect(wrapper.isOpen).toBe(false)
  })

  it('applies its migration set on open', () => {
    wrapper.open()
    expect(tableNames(wrapper)).toEqual(['schema_migrations', 'workflow_checkpoint'])
  })
})

describe('runMigrations', () => {
  it('records each applied migration once', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()
    runMigrations(wrapper.db, MEMORY_MIGRATIONS)
    runMigrations(wrapper.db, MEMORY_MIGRATIONS)

    const rows = wrapper.db.prepare('SELECT name FROM schema_migrations').all()
    expect(NameRowsSchema.parse(rows)).toEqual([{ name: '001-memory-documents' }])
    expect(tableNames(wrapper)).toContain('memory_documents')
    wrapper.close()
  })
})
