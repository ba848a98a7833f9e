import { Effect } from 'effect'
import fs from 'node:fs/promises'
import path from 'node:path'

import type { FieldValues, Vector3 } from '@foamcsv/core'

import { type CliError, makeCliError } from './errors.js'

export const SCALAR_CSV_HEADER = 'cellId,value'
export const VECTOR_CSV_HEADER = 'cellId,ux,uy,uz'

/**
 * Writes a number the way a float repr reads in the exported CSVs: shortest round-trip digits,
 * `.0` on integral values, and scientific notation below `1e-4` or from `1e16` on with a
 * two-digit exponent (`0.0`, `2.0`, `0.125`, `1e-05`, `1.5e+16`).
 * Non-finite values use the spelling the field-file parser reads back.
 */
export const formatCsvNumber = (value: number): string => {
  if (Number.isNaN(value)) return 'nan'
  if (value === Infinity) return 'inf'
  if (value === -Infinity) return '-inf'

  const sign = value < 0 || Object.is(value, -0) ? '-' : ''
  const [mantissa, exponentText] = Math.abs(value).toExponential().split('e')
  const exponent = Number(exponentText)
  const digits = mantissa.replace('.', '')

  if (exponent < -4 || exponent >= 16) {
    const fraction = digits.slice(1)
    const exponentDigits = String(Math.abs(exponent)).padStart(2, '0')
    return `${sign}${digits.slice(0, 1)}${fraction ? `.${fraction}` : ''}e${exponent < 0 ? '-' : '+'}${exponentDigits}`
  }
  if (exponent < 0) return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`

  const integer = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0')
  const fraction = digits.slice(exponent + 1)
  return `${sign}${integer}.${fraction || '0'}`
}

export const formatScalarCsv = (values: ReadonlyArray<number>): string => {
  const rows = [SCALAR_CSV_HEADER]
  values.forEach((v, i) => rows.push(`${i},${formatCsvNumber(v)}`))
  return `${rows.join('\n')}\n`
}

export const formatVectorCsv = (values: ReadonlyArray<Vector3>): string => {
  const rows = [VECTOR_CSV_HEADER]
  values.forEach(([x, y, z], i) => rows.push(`${i},${formatCsvNumber(x)},${formatCsvNumber(y)},${formatCsvNumber(z)}`))
  return `${rows.join('\n')}\n`
}

export const formatFieldCsv = (values: FieldValues): string => {
  switch (values._tag) {
    case 'Scalar':
      return formatScalarCsv(values.values)
    case 'Vector':
      return formatVectorCsv(values.values)
  }
}

export const ensureDir = (dir: string): Effect.Effect<void, CliError> =>
  Effect.tryPromise({
    try: () => fs.mkdir(dir, { recursive: true }),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_IO_ERROR',
        message: `[foamcsv] Could not create directory: ${dir}`,
        cause,
      }),
  }).pipe(Effect.asVoid)

export const writeTextFile = (filePath: string, text: string): Effect.Effect<void, CliError> =>
  Effect.gen(function* () {
    yield* ensureDir(path.dirname(filePath))
    yield* Effect.tryPromise({
      try: () => fs.writeFile(filePath, text, 'utf8'),
      catch: (cause) =>
        makeCliError({
          code: 'CLI_IO_ERROR',
          message: `[foamcsv] Could not write: ${filePath}`,
          cause,
        }),
    })
  })

export const readTextFile = (filePath: string): Effect.Effect<string, CliError> =>
  Effect.tryPromise({
    try: () => fs.readFile(filePath, 'utf8'),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_IO_ERROR',
        message: `[foamcsv] Could not read: ${filePath}`,
        cause,
      }),
  })

export const pathExists = (filePath: string): Effect.Effect<boolean, never> =>
  Effect.tryPromise({
    try: async () => {
      await fs.stat(filePath)
      return true
    },
    catch: (cause) => cause,
  }).pipe(Effect.catchAll(() => Effect.succeed(false)))

export const isDirectory = (filePath: string): Effect.Effect<boolean, never> =>
  Effect.tryPromise({
    try: async () => (await fs.stat(filePath)).isDirectory(),
    catch: (cause) => cause,
  }).pipe(Effect.catchAll(() => Effect.succeed(false)))

export const writeFieldCsv = (filePath: string, values: FieldValues): Effect.Effect<void, CliError> =>
  writeTextFile(filePath, formatFieldCsv(values))
