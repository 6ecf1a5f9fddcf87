/**
 * Tests for `src/cli/commands/status.ts`
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { WorkflowState } from '../../../core/types.js'
import { FileStateStore } from '../../../persistence/file-state-store.js'
import {
  STATUS_EXIT_ERROR,
  STATUS_EXIT_SUCCESS,
  STATUS_EXIT_USAGE,
  runStatusAction,
  toStatusSnapshot,
} from '../status.js'

const STATE: WorkflowState = {
  runId: 'run-1',
  goal: 'build a todo API',
  phase: 'Feedback',
  artifacts: {
    'generated-code': 'print(1)',
    'architecture-plan': 'plan',
  },
  pendingFeedback: [{ source: 'QA', feedback: 'Missing\n  input checks' }],
  updatedAt: '2026-01-02T03:04:05.000Z',
}

let baseDir: string
let projectRoot: string
let stdoutWrites: string[]
let stderrWrites: string[]

beforeEach(async () => {
  baseDir = await mkdtemp(join(tmpdir(), 'workcell-status-'))
  projectRoot = join(baseDir, 'project')
  await mkdir(join(projectRoot, '.workcell'), { recursive: true })

  stdoutWrites = []
  stderrWrites = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdoutWrites.push(String(chunk))
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderrWrites.push(String(chunk))
    return true
  })
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(baseDir, { recursive: true, force: true })
})

function status(outputFormat: string): Promise<number> {
  return runStatusAction({
    outputFormat,
    projectRoot,
    globalConfigDir: join(baseDir, 'global'),
    env: {},
  })
}

async function writeCheckpoint(state: WorkflowState): Promise<void> {
  await new FileStateStore(join(projectRoot, '.workcell', 'workflow-state.json')).save(state)
}

// ---------------------------------------------------------------------------
// toStatusSnapshot
// ---------------------------------------------------------------------------

describe('toStatusSnapshot', () => {
  it('lists filled slots in pipeline order', () => {
    expect(toStatusSnapshot(STATE).filledSlots).toEqual(['architecture-plan', 'generated-code'])
  })

  it('reports Idle with no run id when there is no checkpoint', () => {
    expect(toStatusSnapshot(null)).toEqual({
      runId: null,
      phase: 'Idle',
      goal: '',
      filledSlots: [],
      pendingFeedback: [],
      updatedAt: null,
    })
  })
})

// ---------------------------------------------------------------------------
// runStatusAction
// ---------------------------------------------------------------------------

describe('runStatusAction', () => {
  it('prints a human report of the checkpoint', async () => {
    await writeCheckpoint(STATE)

    const exitCode = await status('human')

    expect(exitCode).toBe(STATUS_EXIT_SUCCESS)
    expect(stdoutWrites.join('')).toBe(
      [
        'Run run-1  Phase: Feedback',
        'Goal: build a todo API',
        'Last checkpoint: 2026-01-02T03:04:05.000Z',
        '',
        'Artifacts: architecture-plan, generated-code',
        '',
        'Pending feedback:',
        '  [QA] Missing input checks',
        '',
      ].join('\n')
    )
  })

  it('prints a notice when no run is in progress', async () => {
    const exitCode = await status('human')

    expect(exitCode).toBe(STATUS_EXIT_SUCCESS)
    expect(stdoutWrites.join('')).toBe('No run in progress.\n')
  })

  it('emits one NDJSON snapshot for --output-format json', async () => {
    await writeCheckpoint(STATE)

    const exitCode = await status('json')

    expect(exitCode).toBe(STATUS_EXIT_SUCCESS)
    expect(stdoutWrites).toHaveLength(1)
    const line: unknown = JSON.parse(stdoutWrites[0] ?? '')
    expect(line).toMatchObject({
      event: 'status:snapshot',
      data: {
        runId: 'run-1',
        phase: 'Feedback',
        goal: 'build a todo API',
        filledSlots: ['architecture-plan', 'generated-code'],
        pendingFeedback: [{ source: 'QA', feedback: 'Missing\n  input checks' }],
        updatedAt: '2026-01-02T03:04:05.000Z',
      },
    })
  })

  it('rejects an unknown output format', async () => {
    const exitCode = await status('xml')

    expect(exitCode).toBe(STATUS_EXIT_USAGE)
    expect(stderrWrites.join('')).toBe('Error: Unknown output format "xml" (expected human or json)\n')
  })

  it('exits 1 on a corrupted checkpoint', async () => {
    await writeFile(join(projectRoot, '.workcell', 'workflow-state.json'), 'not json', 'utf-8')

    const exitCode = await status('human')

    expect(exitCode).toBe(STATUS_EXIT_ERROR)
    expect(stderrWrites.join('')).toMatch(/^Error: Checkpoint at .+workflow-state\.json is not valid JSON: /)
  })
})
