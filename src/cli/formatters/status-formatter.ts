/**
 * Human-readable status formatter for the `workcell status` command.
 */

import type { StatusSnapshot } from '../types/status.js'

/** Feedback longer than this is cut in the human report */
const FEEDBACK_PREVIEW_LENGTH = 200

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > FEEDBACK_PREVIEW_LENGTH ? `${flat.slice(0, FEEDBACK_PREVIEW_LENGTH)}...` : flat
}

// ---------------------------------------------------------------------------
// renderStatusHuman
// ---------------------------------------------------------------------------

/**
 * Render a status report from a snapshot.
 *
 * Output sections:
 *  - Header: Run <id>  Phase: <phase>
 *  - Goal and last checkpoint time
 *  - Filled artifact slots
 *  - Pending feedback, one line per entry
 */
export function renderStatusHuman(snapshot: StatusSnapshot): string {
  if (snapshot.runId === null) {
    return 'No run in progress.'
  }

  const lines: string[] = []
  lines.push(`Run ${snapshot.runId}  Phase: ${snapshot.phase}`)
  lines.push(`Goal: ${snapshot.goal}`)
  if (snapshot.updatedAt !== null) {
    lines.push(`Last checkpoint: ${snapshot.updatedAt}`)
  }

  lines.push('')
  lines.push(
    snapshot.filledSlots.length > 0
      ? `Artifacts: ${snapshot.filledSlots.join(', ')}`
      : 'Artifacts: (none)'
  )

  if (snapshot.pendingFeedback.length > 0) {
    lines.push('')
    lines.push('Pending feedback:')
    for (const entry of snapshot.pendingFeedback) {
      lines.push(`  [${entry.source}] ${preview(entry.feedback)}`)
    }
  }

  return lines.join('\n')
}
