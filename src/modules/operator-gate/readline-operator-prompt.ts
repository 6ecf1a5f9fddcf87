import * as readline from 'node:readline'
import { OperatorInputClosedError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { OperatorPrompt } from './types.js'

const logger = createLogger('operator-gate')

export interface ReadlineOperatorPromptOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/**
 * Operator prompt over a terminal (stdin/stdout by default).
 */
export class ReadlineOperatorPrompt implements OperatorPrompt {
  private readonly _input: NodeJS.ReadableStream
  private readonly _output: NodeJS.WritableStream

  constructor(options: ReadlineOperatorPromptOptions = {}) {
    this._input = options.input ?? process.stdin
    this._output = options.output ?? process.stdout
  }

  display(text: string): void {
    this._output.write(`${text}\n`)
  }

  ask(question: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const rl = readline.createInterface({ input: this._input, output: this._output, terminal: false })
      let answered = false

      rl.on('close', () => {
        if (!answered) {
          logger.warn('Operator input closed without an answer')
          reject(new OperatorInputClosedError())
        }
      })

      rl.question(question, (answer) => {
        answered = true
        rl.close()
        resolve(answer)
      })
    })
  }
}
