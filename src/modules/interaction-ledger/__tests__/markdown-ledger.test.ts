/**
 * Unit tests for MarkdownInteractionLedger and InMemoryInteractionLedger.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import {
  MarkdownInteractionLedger,
  formatLedgerEntry,
  ledgerHeader,
} from '../markdown-ledger.js'
import { InMemoryInteractionLedger } from '../memory-ledger.js'

const TS = '2026-01-01T00:00:00.000Z'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'workcell-ledger-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1
}

// ---------------------------------------------------------------------------
// formatLedgerEntry
// ---------------------------------------------------------------------------

describe('formatLedgerEntry', () => {
  it('renders a successful entry', () => {
    const text = formatLedgerEntry(
      { channel: 'codex', success: true, prompt: 'p', response: 'r', timestamp: TS },
      500
    )
    expect(text).toBe(
      `## Interaction at ${TS}\n\n**Status:** SUCCESS\n\n### Prompt Snippet\n\n\`\`\`\np\n\`\`\`\n\n` +
        '### Response Snippet\n\n```\nr\n```\n\n---\n\n'
    )
  })

  it('includes the error kind for failures', () => {
    const text = formatLedgerEntry(
      {
        channel: 'claude',
        success: false,
        errorKind: 'BackendInvocationFailed',
        prompt: 'p',
        response: 'ERROR: boom',
        timestamp: TS,
      },
      500
    )
    expect(text).toContain('**Status:** FAILED\n\n**Error kind:** BackendInvocationFailed\n\n')
  })

  it('truncates prompt and response snippets', () => {
    const text = formatLedgerEntry(
      { channel: 'gemini', success: true, prompt: 'abcdefgh', response: 'xy', timestamp: TS },
      4
    )
    expect(text).toContain('```\nabcd...\n```')
    expect(text).toContain('```\nxy\n```')
  })
})

// ---------------------------------------------------------------------------
// MarkdownInteractionLedger
// ---------------------------------------------------------------------------

describe('MarkdownInteractionLedger', () => {
  it('writes the header once, followed by entries in order', async () => {
    const ledger = new MarkdownInteractionLedger({ directory: join(dir, 'ledger') })

    await ledger.record({ channel: 'codex', success: true, prompt: 'first', response: 'a', timestamp: TS })
    await ledger.record({ channel: 'codex', success: false, prompt: 'second', response: 'b', timestamp: TS })

    const content = await readFile(ledger.pathFor('codex'), 'utf-8')
    expect(content.startsWith(ledgerHeader('codex'))).toBe(true)
    expect(countOccurrences(content, '# Interaction Ledger: codex')).toBe(1)
    expect(countOccurrences(content, '## Interaction at')).toBe(2)
    expect(content.indexOf('first')).toBeLessThan(content.indexOf('second'))
  })

  it('keeps one document per channel', async () => {
    const ledger = new MarkdownInteractionLedger({ directory: dir })

    await ledger.record({ channel: 'claude', success: true, prompt: 'p', response: 'r' })
    await ledger.record({ channel: 'static-analysis', success: true, prompt: 'src', response: 'clean' })

    const claude = await readFile(join(dir, 'claude.md'), 'utf-8')
    const lint = await readFile(join(dir, 'static-analysis.md'), 'utf-8')
    expect(claude).not.toContain('clean')
    expect(lint).toContain('# Interaction Ledger: static-analysis')
  })

  it('does not interleave concurrent appends', async () => {
    const ledger = new MarkdownInteractionLedger({ directory: dir })

    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        ledger.record({
          channel: 'gemini',
          success: true,
          prompt: `prompt-${String(i).padStart(2, '0')}`,
          response: 'r'.repeat(200),
          timestamp: TS,
        })
      )
    )

    const content = await readFile(ledger.pathFor('gemini'), 'utf-8')
    expect(countOccurrences(content, '# Interaction Ledger: gemini')).toBe(1)
    const blocks = content.split('## Interaction at ').slice(1)
    expect(blocks).toHaveLength(20)
    blocks.forEach((block, i) => {
      expect(block).toContain(`prompt-${String(i).padStart(2, '0')}`)
      expect(block.endsWith('---\n\n')).toBe(true)
    })
  })

  it('swallows write failures', async () => {
    const blocker = join(dir, 'not-a-directory')
    await writeFile(blocker, 'x', 'utf-8')
    const ledger = new MarkdownInteractionLedger({ directory: blocker })

    await expect(
      ledger.record({ channel: 'codex', success: true, prompt: 'p', response: 'r' })
    ).resolves.toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// InMemoryInteractionLedger
// ---------------------------------------------------------------------------

describe('InMemoryInteractionLedger', () => {
  it('stores entries with a timestamp', async () => {
    const ledger = new InMemoryInteractionLedger()
    await ledger.record({ channel: 'codex', success: true, prompt: 'p', response: 'r' })
    expect(ledger.entries).toHaveLength(1)
    expect(typeof ledger.entries[0]?.timestamp).toBe('string')
  })

  it('filters by channel', async () => {
    const ledger = new InMemoryInteractionLedger()
    await ledger.record({ channel: 'codex', success: true, prompt: 'a', response: 'r' })
    await ledger.record({ channel: 'claude', success: true, prompt: 'b', response: 'r' })
    expect(ledger.forChannel('claude').map((e) => e.prompt)).toEqual(['b'])
  })
})
