/**
 * Prompt builders for the draft / critique / revise / confidence loop.
 */

/** Seed reasoning handed to the first critique round of every cycle */
export const INITIAL_REASONING = 'Initial thoughts: the draft seems to cover the basics.'

export function draftPrompt(specification: string, language: string): string {
  return (
    `Generate a complete, rough draft of a ${language} module for the following specification. ` +
    'Focus on getting a full implementation down quickly; refinement will happen later.\n\n' +
    specification
  )
}

export function critiquePrompt(
  specification: string,
  draft: string,
  reasoning: string,
  language: string
): string {
  return (
    'You are self-critiquing a draft solution. Your goal is to improve your reasoning. ' +
    `The original problem was: '${specification}'\n\n` +
    `The current draft is:\n\`\`\`${language.toLowerCase()}\n${draft}\n\`\`\`\n\n` +
    `Your current reasoning is: '${reasoning}'\n\n` +
    'Review your reasoning. Does it fully address the problem? Where are the logical errors or gaps? ' +
    'Provide a new, more refined line of reasoning.'
  )
}

export function revisePrompt(
  specification: string,
  draft: string,
  reasoning: string,
  language: string
): string {
  return (
    'You will revise a code draft. You have already thought deeply about the problem. ' +
    'Use your refined reasoning to create a new, much better version of the code.\n\n' +
    `Original Specification:\n${specification}\n\n` +
    `Original (Flawed) Draft:\n\`\`\`${language.toLowerCase()}\n${draft}\n\`\`\`\n\n` +
    `Your Final, Refined Reasoning:\n${reasoning}\n\n` +
    `Now, write the new, complete, and correct ${language} module.`
  )
}

export function correctionPrompt(
  specification: string,
  draft: string,
  issues: string,
  language: string
): string {
  return (
    'A static analysis tool reported the following issues in your code. ' +
    'Fix exactly these issues and return the complete corrected module.\n\n' +
    `Specification:\n${specification}\n\n` +
    `Code:\n\`\`\`${language.toLowerCase()}\n${draft}\n\`\`\`\n\n` +
    `Reported issues:\n${issues}`
  )
}

export function confidencePrompt(draft: string, language: string): string {
  return (
    "You are a code reviewer. On a scale of 1 to 10, where 1 is 'completely wrong' " +
    "and 10 is 'perfectly correct and production-ready', rate the following code. " +
    'Your answer must be a single integer and nothing else.' +
    `\n\n--- Code to Rate ---\n\`\`\`${language.toLowerCase()}\n${draft}\n\`\`\``
  )
}
