/**
 * Where input tables are read from and output tables written to
 * @module io/table-store
 */

import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'

/**
 * Named text file to write.
 */
export interface TableFile {
  name: string
  content: string
}

/**
 * Source and sink of CSV text, addressed by file name.
 */
export interface TableStore {
  read(name: string): Promise<string>
  exists(name: string): Promise<boolean>
  /**
   * Writes the files as one batch. No file is replaced unless every file
   * could be prepared.
   */
  writeAll(files: readonly TableFile[]): Promise<void>
}

/**
 * Table store over a directory.
 *
 * Each output is first written to a temporary file beside its target; the
 * temporary files are renamed into place only after all of them were
 * written, and removed when any write fails. A rename that fails after
 * others succeeded leaves the earlier targets replaced and removes the
 * temporary files not yet renamed.
 *
 * @example
 * ```typescript
 * const store = createFileTableStore('./data')
 * const text = await store.read('olympics_country.csv')
 * ```
 */
export function createFileTableStore(directory: string): TableStore {
  const pathOf = (name: string) => join(directory, name)

  return {
    async read(name) {
      return readFile(pathOf(name), 'utf8')
    },

    async exists(name) {
      try {
        await access(pathOf(name))
        return true
      } catch {
        return false
      }
    },

    async writeAll(files) {
      const staged: Array<{ temporary: string; target: string }> = []
      try {
        for (const file of files) {
          const target = pathOf(file.name)
          const temporary = `${target}.${process.pid}.tmp`
          await mkdir(dirname(target), { recursive: true })
          staged.push({ temporary, target })
          await writeFile(temporary, file.content, 'utf8')
        }
      } catch (error) {
        await Promise.all(staged.map(({ temporary }) => rm(temporary, { force: true })))
        throw error
      }

      let renamed = 0
      try {
        for (const { temporary, target } of staged) {
          await rename(temporary, target)
          renamed++
        }
      } catch (error) {
        await Promise.all(
          staged.slice(renamed).map(({ temporary }) => rm(temporary, { force: true }))
        )
        throw error
      }
    },
  }
}

/**
 * In-memory table store, for tests and for callers that hold the CSV text
 * themselves.
 */
export interface MemoryTableStore extends TableStore {
  readonly files: Map<string, string>
}

export function createMemoryTableStore(initial: Record<string, string> = {}): MemoryTableStore {
  const files = new Map(Object.entries(initial))

  return {
    files,

    async read(name) {
      const content = files.get(name)
      if (content === undefined) {
        throw new Error(`No such table file: ${name}`)
      }
      return content
    },

    async exists(name) {
      return files.has(name)
    },

    async writeAll(outputs) {
      for (const file of outputs) {
        files.set(file.name, file.content)
      }
    },
  }
}
