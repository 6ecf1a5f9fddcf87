/**
 * Remove a surrounding markdown code fence (```lang ... ```) from model output.
 * Text without a fence is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  let result = text.trim()
  if (result.startsWith('```')) {
    const firstNewline = result.indexOf('\n')
    result = firstNewline === -1 ? '' : result.slice(firstNewline + 1)
  }
  if (result.endsWith('```')) {
    result = result.slice(0, -3)
  }
  return result.trim()
}
