import fs from 'node:fs/promises'
import path from 'node:path'

import { Effect } from 'effect'
import { describe, expect, it } from 'vitest'

import { type RunOutcome, runCli } from '../../src/Commands.js'
import type { CommandResult } from '../../src/internal/result.js'
import { makeTmpDir, nonUniformField, uniformScalarField, uniformVectorField, writeCase } from '../helpers/tmpCase.js'

const expectResult = (outcome: RunOutcome): CommandResult => {
  if (outcome.kind !== 'result') throw new Error('expected result')
  return outcome.result
}

const makeCase = async (root: string): Promise<string> => {
  const caseDir = path.join(root, 'cavity')
  await writeCase(caseDir, {
    '0/U': uniformVectorField('U', '(1 0 0)'),
    '0/p': uniformScalarField('p', '0'),
    '0.5/U': nonUniformField({ object: 'U', vector: true, count: 2, lines: ['(1 0 0)', '0.5 -0.25 1e-3'] }),
    '0.5/p': nonUniformField({ object: 'p', count: 3, lines: ['0.125', '', '// probe', '-3.5'] }),
    '0.5/k': nonUniformField({ object: 'k', count: 1, lines: ['abc'] }),
    'constant/transportProperties': 'nu 1e-05;\n',
  })
  return caseDir
}

describe('foamcsv integration: convert', () => {
  it('should convert every field of every time directory and isolate failures', async () => {
    const tmp = await makeTmpDir('convert')
    const caseDir = await makeCase(tmp)
    const outDir = path.join(tmp, 'out')
    const consoleLines: string[] = []

    const outcome = await Effect.runPromise(
      runCli([caseDir, '--fields', 'U', 'p', 'k', '--out', outDir], {
        cwd: tmp,
        writeLog: (text) => consoleLines.push(text),
      }),
    )

    expect(outcome.exitCode).toBe(0)
    const result = expectResult(outcome)
    expect(result.ok).toBe(true)
    expect(result.runId).toBe('cavity')
    expect(result.command).toBe('convert')
    expect(result.outDir).toBe(outDir)
    expect(result.artifacts.map((a) => a.outputKey)).toEqual(['0.5/U', '0.5/k', '0.5/p', '0/U', '0/p', 'summary'])

    expect(await fs.readFile(path.join(outDir, '0', 'U.csv'), 'utf8')).toBe('cellId,ux,uy,uz\n0,1.0,0.0,0.0\n')
    expect(await fs.readFile(path.join(outDir, '0', 'p.csv'), 'utf8')).toBe('cellId,value\n0,0.0\n')
    expect(await fs.readFile(path.join(outDir, '0.5', 'U.csv'), 'utf8')).toBe('cellId,ux,uy,uz\n0,1.0,0.0,0.0\n1,0.5,-0.25,0.001\n')
    expect(await fs.readFile(path.join(outDir, '0.5', 'p.csv'), 'utf8')).toBe('cellId,value\n0,0.125\n1,-3.5\n')
    await expect(fs.stat(path.join(outDir, '0.5', 'k.csv'))).rejects.toThrow()

    const byKey = new Map(result.artifacts.map((a) => [a.outputKey, a]))
    expect(byKey.get('0.5/p')).toEqual({
      outputKey: '0.5/p',
      kind: 'FieldCsv',
      ok: true,
      file: '0.5/p.csv',
      rows: 2,
      reasonCodes: ['COUNT_ANOMALY'],
    })
    expect(byKey.get('0.5/k')).toEqual({
      outputKey: '0.5/k',
      kind: 'FieldCsv',
      ok: false,
      reasonCodes: ['MalformedNumber'],
      error: { name: 'MalformedNumber', message: "Could not parse number 'abc' in: abc" },
    })
    expect(byKey.get('summary')?.inline).toEqual({
      timeDirs: ['0', '0.5'],
      fields: ['U', 'p', 'k'],
      converted: 4,
      skipped: 1,
      failed: 1,
      anomalies: 1,
    })

    expect(consoleLines).toContain(`  [skip] k not found in ${path.join(caseDir, '0')}\n`)
    expect(consoleLines).toContain('=== Time 0.5 ===\n')
    expect(consoleLines.slice(0, 4)).toEqual([
      `Starting CSV export for case: ${caseDir}\n`,
      `Output folder: ${outDir}\n`,
      `Found 2 time directories in ${caseDir}\n`,
      `Writing CSV output under ${outDir}\n`,
    ])

    const log = (await fs.readFile(path.join(outDir, 'log.txt'), 'utf8')).split('\n')
    expect(log[0]).toMatch(new RegExp(`^\\S+ - INFO - Starting CSV export for case: `))
    expect(log[0]?.endsWith(`Starting CSV export for case: ${caseDir}`)).toBe(true)
    expect(log.some((line) => line.endsWith(` - WARN -   [warn] ${path.join(caseDir, '0.5', 'p')}: Declared 3 entries but parsed 2`))).toBe(true)
    expect(
      log.some((line) =>
        line.endsWith(` - ERROR -   [error] Failed to convert ${path.join(caseDir, '0.5', 'k')}: Could not parse number 'abc' in: abc`),
      ),
    ).toBe(true)
  })

  it('should write next to the case as <caseName>_csv by default and keep earlier runs in the log', async () => {
    const tmp = await makeTmpDir('convert-default-out')
    const caseDir = await makeCase(tmp)
    const run = () => Effect.runPromise(runCli([caseDir, '--fields', 'p'], { cwd: tmp, writeLog: () => {} }))

    await run()
    const outcome = await run()

    const result = expectResult(outcome)
    expect(result.outDir).toBe(`${caseDir}_csv`)
    expect(await fs.readFile(path.join(`${caseDir}_csv`, '0', 'p.csv'), 'utf8')).toBe('cellId,value\n0,0.0\n')

    const log = await fs.readFile(path.join(`${caseDir}_csv`, 'log.txt'), 'utf8')
    const startLines = log.split('\n').filter((line) => line.includes('Starting CSV export'))
    expect(startLines).toHaveLength(2)
    expect(log.endsWith('\n')).toBe(true)
  })

  it('should take defaults from foamcsv.cli.json and let flags override them', async () => {
    const tmp = await makeTmpDir('convert-config')
    const caseDir = await makeCase(tmp)
    const outRoot = path.join(tmp, 'exports')
    await fs.writeFile(
      path.join(tmp, 'foamcsv.cli.json'),
      JSON.stringify({ schemaVersion: 1, defaults: { fields: ['p'], outRoot }, profiles: { vel: { fields: ['U'] } } }),
      'utf8',
    )

    const fromDefaults = expectResult(await Effect.runPromise(runCli([caseDir], { cwd: tmp, writeLog: () => {} })))
    expect(fromDefaults.outDir).toBe(path.join(outRoot, 'cavity_csv'))
    expect(fromDefaults.artifacts.map((a) => a.outputKey)).toEqual(['0.5/p', '0/p', 'summary'])

    const fromProfile = expectResult(
      await Effect.runPromise(runCli([caseDir, '--profile', 'vel'], { cwd: tmp, writeLog: () => {} })),
    )
    expect(fromProfile.artifacts.map((a) => a.outputKey)).toEqual(['0.5/U', '0/U', 'summary'])

    const fromFlags = expectResult(
      await Effect.runPromise(runCli([caseDir, '--profile', 'vel', '--fields', 'p', 'U'], { cwd: tmp, writeLog: () => {} })),
    )
    expect(fromFlags.artifacts.map((a) => a.outputKey)).toEqual(['0.5/U', '0.5/p', '0/U', '0/p', 'summary'])
  })

  it('should exit with 2 when the case directory does not exist', async () => {
    const tmp = await makeTmpDir('convert-missing')
    const missing = path.join(tmp, 'nope')

    const outcome = await Effect.runPromise(runCli([missing], { cwd: tmp, writeLog: () => {} }))

    expect(outcome.exitCode).toBe(2)
    const result = expectResult(outcome)
    expect(result.ok).toBe(false)
    expect(result.runId).toBe('nope')
    expect(result.error).toEqual({
      name: 'CliError',
      message: `Case directory does not exist: ${missing}`,
      code: 'CLI_CASE_NOT_FOUND',
    })
  })

  it('should print help without touching the file system', async () => {
    const outcome = await Effect.runPromise(runCli(['--help']))
    expect(outcome.kind).toBe('help')
    expect(outcome.exitCode).toBe(0)
    if (outcome.kind !== 'help') return
    expect(outcome.text).toContain('foamcsv <caseDir>')
  })
})
