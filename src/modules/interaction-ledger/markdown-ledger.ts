/**
 * MarkdownInteractionLedger — one markdown document per channel under a
 * ledger directory.
 *
 * Each entry is rendered up front and written with a single appendFile call.
 * Appends to the same channel are chained so entries from concurrent review
 * tasks land whole and in call order.
 */

import { appendFile, mkdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { createLogger } from '../../utils/logger.js'
import { truncate } from '../../utils/helpers.js'
import { errorMessage } from '../../core/errors.js'
import type { InteractionLedger, LedgerChannel, LedgerEntry } from './types.js'

const logger = createLogger('interaction-ledger')

export const DEFAULT_SNIPPET_LENGTH = 500

export interface MarkdownLedgerOptions {
  /** Directory that holds `<channel>.md` files */
  directory: string
  /** Characters kept from each prompt and response */
  snippetLength?: number
}

/**
 * Render one entry as a markdown block.
 */
export function formatLedgerEntry(entry: LedgerEntry, snippetLength: number): string {
  const timestamp = entry.timestamp ?? new Date().toISOString()
  const lines = [
    `## Interaction at ${timestamp}`,
    '',
    `**Status:** ${entry.success ? 'SUCCESS' : 'FAILED'}`,
    '',
  ]
  if (entry.errorKind !== undefined) {
    lines.push(`**Error kind:** ${entry.errorKind}`, '')
  }
  lines.push(
    '### Prompt Snippet',
    '',
    '```',
    truncate(entry.prompt, snippetLength),
    '```',
    '',
    '### Response Snippet',
    '',
    '```',
    truncate(entry.response, snippetLength),
    '```',
    '',
    '---',
    '',
    ''
  )
  return lines.join('\n')
}

export function ledgerHeader(channel: LedgerChannel): string {
  return `# Interaction Ledger: ${channel}\n\n`
}

export class MarkdownInteractionLedger implements InteractionLedger {
  private readonly _directory: string
  private readonly _snippetLength: number
  private readonly _tails = new Map<LedgerChannel, Promise<void>>()

  constructor(options: MarkdownLedgerOptions) {
    this._directory = options.directory
    this._snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH
  }

  /** Path of the document for a channel */
  pathFor(channel: LedgerChannel): string {
    return join(this._directory, `${channel}.md`)
  }

  record(entry: LedgerEntry): Promise<void> {
    const block = formatLedgerEntry(entry, this._snippetLength)
    const previous = this._tails.get(entry.channel) ?? Promise.resolve()
    const next = previous.then(() => this._append(entry.channel, block))
    this._tails.set(entry.channel, next)
    return next
  }

  private async _append(channel: LedgerChannel, block: string): Promise<void> {
    const filePath = this.pathFor(channel)
    try {
      await mkdir(this._directory, { recursive: true })
      const isNew = await this._isEmptyOrMissing(filePath)
      await appendFile(filePath, isNew ? ledgerHeader(channel) + block : block, 'utf-8')
      logger.debug({ channel, filePath }, 'Ledger entry recorded')
    } catch (err) {
      logger.error({ channel, filePath, err: errorMessage(err) }, 'Failed to write ledger entry')
    }
  }

  private async _isEmptyOrMissing(filePath: string): Promise<boolean> {
    try {
      const info = await stat(filePath)
      return info.size === 0
    } catch {
      return true
    }
  }
}
