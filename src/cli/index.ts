#!/usr/bin/env node
/**
 * workcell CLI - Main entry point
 * Provides the `workcell` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerRunCommand } from './commands/run.js'
import { registerStatusCommand } from './commands/status.js'
import { registerMemoryCommand } from './commands/memory.js'

const logger = createLogger('cli')

const PackageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
})

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli and dist/cli both sit two levels below the package root
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    let raw: string
    try {
      raw = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const parsed = PackageManifestSchema.safeParse(JSON.parse(raw))
    if (parsed.success && parsed.data.name === 'workcell') {
      return parsed.data.version ?? '0.0.0'
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('workcell')
    .description('workcell - carry a goal from design through review, repair and documentation')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerMemoryCommand(program, version, projectRoot)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
