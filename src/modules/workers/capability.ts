/**
 * Capability — the single-method contract every worker role satisfies.
 */

export const WORKER_ROLES = [
  'architect',
  'database',
  'ui-designer',
  'coder',
  'qa',
  'security',
  'documentation',
] as const

export type WorkerRole = (typeof WORKER_ROLES)[number]

export interface Capability {
  readonly role: WorkerRole
  /**
   * Produce the role's artifact for `input`.
   * Backend failures come back as `ERROR: ...` text rather than rejections.
   */
  execute(input: string): Promise<string>
}

/** The full set of workers handed to the engine */
export type WorkerSet = Readonly<Record<WorkerRole, Capability>>
