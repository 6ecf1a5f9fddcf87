/**
 * Prompt builders for the worker roles.
 * The wording is tunable; only the inputs each prompt embeds matter.
 */

export function architecturePrompt(goal: string): string {
  return (
    'Based on the following requirements, design a high-level system architecture, ' +
    `including the technology stack, data models, and a modular breakdown:\n\n${goal}`
  )
}

export function databasePrompt(architecturePlan: string): string {
  return (
    'Based on the following data models, design a normalized SQL database schema (DDL). ' +
    'Also, provide example SELECT, INSERT, UPDATE, and DELETE queries for the primary tables.' +
    `\n\n--- Data Models ---\n${architecturePlan}`
  )
}

export function uiDesignPrompt(architecturePlan: string): string {
  return (
    'Design the HTML structure for the user-facing components of the following system. ' +
    'Ensure it is fully WCAG compliant. Specifically, include `<label>` tags for all form inputs ' +
    'and use appropriate ARIA roles where necessary. ' +
    'Provide the HTML structure and a list of accessibility considerations.' +
    `\n\n--- System Architecture ---\n${architecturePlan}`
  )
}

export function securityReviewPrompt(code: string, language: string): string {
  return (
    `Review the following ${language} code for security vulnerabilities. ` +
    'Focus on common issues like injection flaws, improper error handling, and insecure dependencies. ' +
    `Provide a list of findings with suggested fixes:\n\n\`\`\`${language.toLowerCase()}\n${code}\n\`\`\``
  )
}

export function documentationPrompt(code: string, language: string): string {
  return (
    `Given the following ${language} code, please generate comprehensive documentation. ` +
    "This should include: 1. A high-level description of the module's purpose. " +
    '2. Docstrings for all public classes and functions. ' +
    "3. A 'How to Run' section, including how to run the unit tests. " +
    '4. A list of dependencies.' +
    `\n\n--- Code ---\n${code}`
  )
}

export function qaCritiquePrompt(code: string, language: string): string {
  return (
    `Critically review the following ${language} code. Identify potential bugs, inefficiencies, ` +
    'style violations, and areas with poor logging or error handling. ' +
    `Provide a clear, actionable list of feedback.\n\n\`\`\`${language.toLowerCase()}\n${code}\n\`\`\``
  )
}

export function testGenerationPrompt(code: string, language: string): string {
  return (
    `Based on the following ${language} code, generate a complete and runnable unit test file ` +
    "using the language's standard unit testing framework. " +
    'The code must be self-contained, executable, and import all necessary modules. ' +
    'Do not use placeholder comments.' +
    `\n\n--- Code to Test ---\n\`\`\`${language.toLowerCase()}\n${code}\n\`\`\``
  )
}
