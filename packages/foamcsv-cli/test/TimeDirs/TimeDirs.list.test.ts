import fs from 'node:fs/promises'
import path from 'node:path'

import { Effect } from 'effect'
import { describe, expect, it } from 'vitest'

import { CliError } from '../../src/internal/errors.js'
import { listTimeDirs, timeValueOfDirName } from '../../src/internal/timeDirs.js'
import { makeTmpDir } from '../helpers/tmpCase.js'

describe('foamcsv time directories', () => {
  it('should map directory names to time values', () => {
    expect(timeValueOfDirName('0')).toBe(0)
    expect(timeValueOfDirName('0.005')).toBe(0.005)
    expect(timeValueOfDirName('1e-1')).toBe(0.1)
    expect(timeValueOfDirName('constant')).toBeUndefined()
    expect(timeValueOfDirName('0.orig')).toBeUndefined()
    expect(timeValueOfDirName('postProcessing')).toBeUndefined()
  })

  it('should keep numeric directories only, sorted by time value', async () => {
    const caseDir = await makeTmpDir('timedirs')
    for (const name of ['10', '0', '2', '0.5', '1e-1', 'constant', 'system', '0.orig', 'postProcessing', 'nan']) {
      await fs.mkdir(path.join(caseDir, name))
    }
    await fs.writeFile(path.join(caseDir, '1'), 'not a directory', 'utf8')

    const dirs = await Effect.runPromise(listTimeDirs(caseDir))

    expect(dirs.map((d) => d.name)).toEqual(['0', '1e-1', '0.5', '2', '10'])
    expect(dirs.map((d) => d.time)).toEqual([0, 0.1, 0.5, 2, 10])
    expect(dirs[0]?.path).toBe(path.join(caseDir, '0'))
  })

  it('should fail with CLI_IO_ERROR for an unreadable case directory', async () => {
    const tmp = await makeTmpDir('timedirs-missing')
    const cause = await Effect.runPromise(Effect.flip(listTimeDirs(path.join(tmp, 'nope'))))

    expect(cause).toBeInstanceOf(CliError)
    if (!(cause instanceof CliError)) return
    expect(cause.code).toBe('CLI_IO_ERROR')
  })
})
