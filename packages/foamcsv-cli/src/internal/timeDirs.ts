import { Effect } from 'effect'
import fs from 'node:fs/promises'
import path from 'node:path'

import { parseFloatLiteral } from '@foamcsv/core'

import { type CliError, makeCliError } from './errors.js'
import { isDirectory } from './output.js'

export const RESERVED_DIR_NAMES: ReadonlySet<string> = new Set(['system', 'constant', '0.orig'])

export type TimeDir = {
  readonly name: string
  readonly time: number
  readonly path: string
}

export const timeValueOfDirName = (name: string): number | undefined =>
  RESERVED_DIR_NAMES.has(name) ? undefined : parseFloatLiteral(name)

const compareTimeDirs = (a: TimeDir, b: TimeDir): number => {
  if (a.time !== b.time) return a.time < b.time ? -1 : 1
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
}

/**
 * Lists the time directories of a case, ascending by time value.
 * Symlinked directories count; `system`, `constant` and `0.orig` never do.
 */
export const listTimeDirs = (caseDir: string): Effect.Effect<ReadonlyArray<TimeDir>, CliError> =>
  Effect.gen(function* () {
    const names = yield* Effect.tryPromise({
      try: () => fs.readdir(caseDir),
      catch: (cause) =>
        makeCliError({
          code: 'CLI_IO_ERROR',
          message: `[foamcsv] Could not list case directory: ${caseDir}`,
          cause,
        }),
    })

    const dirs: TimeDir[] = []
    for (const name of names) {
      const time = timeValueOfDirName(name)
      if (time === undefined || Number.isNaN(time)) continue
      const dirPath = path.join(caseDir, name)
      if (!(yield* isDirectory(dirPath))) continue
      dirs.push({ name, time, path: dirPath })
    }

    return dirs.sort(compareTimeDirs)
  })
