import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

/**
 * Write `source` to `<fresh temp dir>/<fileName>`, run `fn` inside that
 * directory, then remove the directory whatever the outcome.
 */
export async function withTempSource<T>(
  source: string,
  fileName: string,
  fn: (dir: string, fileName: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'workcell-tool-'))
  try {
    await writeFile(join(dir, fileName), source, 'utf-8')
    return await fn(dir, fileName)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
