/**
 * Unit tests for RefinementControllerImpl and the confidence helpers.
 */

import { describe, it, expect, vi } from 'vitest'
import type { Mock } from 'vitest'
import { RefinementControllerImpl } from '../refinement-controller-impl.js'
import { confidenceThreshold, parseConfidence } from '../confidence.js'
import type { RefinementPolicy } from '../types.js'
import type { CapabilityDispatcher } from '../../capability-dispatch/types.js'
import type { StaticAnalyzer, StaticAnalysisReport } from '../../tools/static-analyzer.js'
import { InMemoryInteractionLedger } from '../../interaction-ledger/memory-ledger.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { WorkcellEvents } from '../../../core/event-bus.types.js'
import type { CapabilityFamily } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Dispatcher that answers with `responses` in order, then repeats `fallback` */
function createScriptedDispatcher(responses: string[], fallback = '1') {
  const queue = [...responses]
  const invoke = vi.fn((_family: CapabilityFamily, _prompt: string) =>
    Promise.resolve(queue.shift() ?? fallback)
  )
  const dispatcher: CapabilityDispatcher = {
    invoke,
    dispatch: vi.fn(),
    availableFamilies: () => ['codex'],
    assertConfigured: () => undefined,
  }
  return { dispatcher, invoke }
}

function critiques(n: number, prefix = 'reasoning'): string[] {
  return Array.from({ length: n }, (_, i) => `${prefix} ${String(i + 1)}`)
}

function createAnalyzer(reports: StaticAnalysisReport[]): { analyze: Mock<StaticAnalyzer['analyze']> } {
  const queue = [...reports]
  return {
    analyze: vi.fn<StaticAnalyzer['analyze']>(() =>
      Promise.resolve(queue.shift() ?? { status: 'clean' as const })
    ),
  }
}

const SMALL_POLICY: RefinementPolicy = {
  maxCycles: 3,
  critiqueRounds: 2,
  confidenceBase: 7,
  confidenceStepPeriod: 4,
}

// ---------------------------------------------------------------------------
// confidence helpers
// ---------------------------------------------------------------------------

describe('confidenceThreshold', () => {
  it('starts at the base and steps up every period', () => {
    expect([0, 3, 4, 7, 8, 15].map((c) => confidenceThreshold(c))).toEqual([7, 7, 8, 8, 9, 10])
  })

  it('is non-decreasing', () => {
    for (let c = 0; c < 64; c++) {
      expect(confidenceThreshold(c + 1)).toBeGreaterThanOrEqual(confidenceThreshold(c))
    }
  })

  it('honours a custom policy', () => {
    expect(confidenceThreshold(5, { base: 3, stepPeriod: 2 })).toBe(5)
  })
})

describe('parseConfidence', () => {
  it('reads a bare integer', () => {
    expect(parseConfidence('9')).toBe(9)
  })

  it('reads the first run of digits only', () => {
    expect(parseConfidence('Score: 8/10')).toBe(8)
    expect(parseConfidence('I would say 10.')).toBe(10)
  })

  it('returns null when there are no digits', () => {
    expect(parseConfidence('very confident')).toBeNull()
    expect(parseConfidence('')).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// RefinementControllerImpl
// ---------------------------------------------------------------------------

describe('RefinementControllerImpl', () => {
  it('stops after one cycle when the first score meets the threshold', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher([
      'Initial draft.',
      ...critiques(6),
      'Revised draft.',
      '10',
    ])
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
    })

    const result = await controller.refine('A simple function.')

    expect(result).toEqual({ artifact: 'Revised draft.', cycles: 1, confident: true, lastScore: 10 })
    expect(invoke).toHaveBeenCalledTimes(9)
    expect(invoke.mock.calls.every(([family]) => family === 'codex')).toBe(true)
  })

  it('runs a second cycle after a low score and returns the second revision (calculator)', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher([
      'calculator draft',
      ...critiques(6, 'first pass'),
      'calculator v1',
      '6',
      ...critiques(6, 'second pass'),
      'calculator v2',
      '9',
    ])
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
    })

    const result = await controller.refine('build a calculator')

    expect(result).toEqual({ artifact: 'calculator v2', cycles: 2, confident: true, lastScore: 9 })
    expect(invoke).toHaveBeenCalledTimes(17)
  })

  it('drafts once and critiques the latest revision in later cycles', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher([
      'draft-0',
      ...critiques(2),
      'draft-1',
      '2',
      ...critiques(2),
      'draft-2',
      '9',
    ])
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
      policy: SMALL_POLICY,
    })

    await controller.refine('spec')

    const prompts = invoke.mock.calls.map(([, prompt]) => prompt)
    expect(prompts.filter((p) => p.startsWith('Generate a complete, rough draft'))).toHaveLength(1)
    // First critique of cycle 2 sees draft-1 and the seed reasoning again
    expect(prompts[5]).toContain('draft-1')
    expect(prompts[5]).toContain('Initial thoughts')
  })

  it('passes only the latest reasoning to the revise call', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher(['d0', 'r1', 'r2', 'd1', '10'])
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
      policy: SMALL_POLICY,
    })

    await controller.refine('spec')

    const secondCritique = invoke.mock.calls[2]?.[1] ?? ''
    const revise = invoke.mock.calls[3]?.[1] ?? ''
    expect(secondCritique).toContain("Your current reasoning is: 'r1'")
    expect(revise).toContain('Your Final, Refined Reasoning:\nr2')
    expect(revise).not.toContain('r1')
  })

  it('treats an unparseable score as not confident and stops at the cycle cap', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher([], 'no digits here')
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
      policy: SMALL_POLICY,
    })

    const result = await controller.refine('spec')

    expect(result.cycles).toBe(3)
    expect(result.confident).toBe(false)
    expect(result.lastScore).toBeNull()
    // draft + 3 × (2 critiques + revise + confidence)
    expect(invoke).toHaveBeenCalledTimes(13)
  })

  it('records each unparseable confidence reply in the ledger', async () => {
    const { dispatcher } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', 'sure', 'c', 'c', 'd2', '9'])
    const ledger = new InMemoryInteractionLedger()
    const controller = new RefinementControllerImpl({ dispatcher, ledger, policy: SMALL_POLICY })

    const result = await controller.refine('spec')

    expect(result).toEqual({ artifact: 'd2', cycles: 2, confident: true, lastScore: 9 })
    expect(ledger.entries).toHaveLength(1)
    expect(ledger.entries[0]).toMatchObject({
      channel: 'codex',
      success: false,
      errorKind: 'ConfidenceUnparseable',
      response: 'sure',
    })
    expect(ledger.entries[0]?.prompt).toContain('On a scale of 1 to 10')
  })

  it('adds no confidence entry when the confidence call itself failed', async () => {
    const { dispatcher } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', 'ERROR: upstream 500', 'c', 'c', 'd2', '9'])
    const ledger = new InMemoryInteractionLedger()
    const controller = new RefinementControllerImpl({ dispatcher, ledger, policy: SMALL_POLICY })

    await controller.refine('spec')

    expect(ledger.entries).toHaveLength(0)
  })

  it('returns the last draft when the threshold is never met', async () => {
    const { dispatcher } = createScriptedDispatcher([
      'd0', 'c', 'c', 'd1', '5', 'c', 'c', 'd2', '5', 'c', 'c', 'd3', '6',
    ])
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
      policy: SMALL_POLICY,
    })

    expect(await controller.refineText('spec')).toBe('d3')
  })

  it('uses the requested family when overridden', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', '9'])
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
      policy: SMALL_POLICY,
    })

    await controller.refine('spec', { family: 'claude' })

    expect(invoke.mock.calls.every(([family]) => family === 'claude')).toBe(true)
  })

  it('emits a refinement:cycle event per cycle', async () => {
    const { dispatcher } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', '3', 'c', 'c', 'd2', '8'])
    const eventBus = createEventBus()
    const cycles: WorkcellEvents['refinement:cycle'][] = []
    eventBus.on('refinement:cycle', (payload) => cycles.push(payload))
    const controller = new RefinementControllerImpl({
      dispatcher,
      ledger: new InMemoryInteractionLedger(),
      policy: SMALL_POLICY,
      eventBus,
    })

    await controller.refine('spec')

    expect(cycles).toEqual([
      { cycle: 1, score: 3, threshold: 7, confident: false },
      { cycle: 2, score: 8, threshold: 7, confident: true },
    ])
  })
})

// ---------------------------------------------------------------------------
// Static analysis
// ---------------------------------------------------------------------------

describe('RefinementControllerImpl - static analysis', () => {
  it('makes exactly one correction call when issues are reported', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', 'd1-fixed', '9'])
    const analyzer = createAnalyzer([{ status: 'issues', text: 'line 3: undefined name' }])
    const ledger = new InMemoryInteractionLedger()
    const controller = new RefinementControllerImpl({ dispatcher, ledger, analyzer, policy: SMALL_POLICY })

    const result = await controller.refine('spec')

    expect(result.artifact).toBe('d1-fixed')
    expect(invoke).toHaveBeenCalledTimes(6)
    expect(invoke.mock.calls[4]?.[1]).toContain('line 3: undefined name')
    expect(analyzer.analyze).toHaveBeenCalledWith('d1')
    expect(ledger.forChannel('static-analysis')).toEqual([
      expect.objectContaining({ success: true, prompt: 'd1', response: 'line 3: undefined name' }),
    ])
  })

  it('makes no correction call for clean code', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', '9'])
    const analyzer = createAnalyzer([{ status: 'clean' }])
    const ledger = new InMemoryInteractionLedger()
    const controller = new RefinementControllerImpl({ dispatcher, ledger, analyzer, policy: SMALL_POLICY })

    const result = await controller.refine('spec')

    expect(result.artifact).toBe('d1')
    expect(invoke).toHaveBeenCalledTimes(5)
    expect(ledger.forChannel('static-analysis')[0]?.response).toBe('No issues reported.')
  })

  it('treats an unavailable tool as no findings and records the failure', async () => {
    const { dispatcher, invoke } = createScriptedDispatcher(['d0', 'c', 'c', 'd1', '9'])
    const analyzer = createAnalyzer([
      { status: 'unavailable', text: 'Static analysis unavailable: `python3` not found.' },
    ])
    const ledger = new InMemoryInteractionLedger()
    const controller = new RefinementControllerImpl({ dispatcher, ledger, analyzer, policy: SMALL_POLICY })

    await controller.refine('spec')

    expect(invoke).toHaveBeenCalledTimes(5)
    expect(ledger.forChannel('static-analysis')[0]).toMatchObject({
      success: false,
      errorKind: 'ToolUnavailableOrTimedOut',
    })
  })
})
