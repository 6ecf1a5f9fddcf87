/**
 * tools module — external static analysis and test execution.
 */

export { runProcess } from './process-runner.js'
export type { ProcessRunner, ProcessResult, ProcessRunOptions } from './process-runner.js'
export { stripCodeFences } from './source-text.js'
export { CommandStaticAnalyzer } from './static-analyzer.js'
export type { StaticAnalyzer, StaticAnalysisReport } from './static-analyzer.js'
export { CommandTestRunner } from './test-runner.js'
export type { TestRunner, TestRunResult } from './test-runner.js'
