export type { OperatorPrompt } from './types.js'
export { APPROVE_SENTINEL, isApproval } from './types.js'
export { ReadlineOperatorPrompt } from './readline-operator-prompt.js'
export type { ReadlineOperatorPromptOptions } from './readline-operator-prompt.js'
