/**
 * FileStateStore — JSON checkpoint written with write-fsync-rename.
 */

import { mkdir, open, readFile, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { WorkflowState } from '../core/types.js'
import { StateCorruptedError, StatePersistenceError, errorMessage } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'
import { parseWorkflowState } from './schemas/workflow-state.js'
import type { StateStore } from './state-store.js'

const logger = createLogger('persistence:file-state')

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class FileStateStore implements StateStore {
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async load(): Promise<WorkflowState | null> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return null
      throw new StatePersistenceError(`Failed to read checkpoint at ${this.filePath}: ${errorMessage(err)}`, {
        filePath: this.filePath,
      })
    }

    let document: unknown
    try {
      document = JSON.parse(raw)
    } catch (err) {
      throw new StateCorruptedError(`Checkpoint at ${this.filePath} is not valid JSON: ${errorMessage(err)}`, {
        filePath: this.filePath,
      })
    }

    const parsed = parseWorkflowState(document)
    if (!parsed.success) {
      throw new StateCorruptedError(`Checkpoint at ${this.filePath} is invalid: ${parsed.message}`, {
        filePath: this.filePath,
      })
    }
    return parsed.data
  }

  async save(state: WorkflowState): Promise<void> {
    const dir = dirname(this.filePath)
    const tempPath = join(dir, `.${basename(this.filePath)}.${String(process.pid)}.tmp`)

    try {
      await mkdir(dir, { recursive: true })

      const handle = await open(tempPath, 'w')
      try {
        await handle.writeFile(`${JSON.stringify(state, null, 2)}\n`, 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }

      await rename(tempPath, this.filePath)

      // Persist the rename itself
      const dirHandle = await open(dir, 'r')
      try {
        await dirHandle.sync()
      } finally {
        await dirHandle.close()
      }
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn({ tempPath, err: errorMessage(cleanupErr) }, 'Failed to remove temp checkpoint')
      })
      throw new StatePersistenceError(`Failed to write checkpoint at ${this.filePath}: ${errorMessage(err)}`, {
        filePath: this.filePath,
        phase: state.phase,
      })
    }

    logger.debug({ filePath: this.filePath, phase: state.phase }, 'Checkpoint written')
  }

  async clear(): Promise<void> {
    try {
      await rm(this.filePath, { force: true })
    } catch (err) {
      throw new StatePersistenceError(`Failed to remove checkpoint at ${this.filePath}: ${errorMessage(err)}`, {
        filePath: this.filePath,
      })
    }
    logger.debug({ filePath: this.filePath }, 'Checkpoint cleared')
  }

  close(): void {
    // No handles are kept open between calls
  }
}
