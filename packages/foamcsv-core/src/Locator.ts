import { Effect } from 'effect'

import { InternalFieldBlock } from './FieldBlock.js'
import {
  type LocateError,
  missingCloseDelimiter,
  missingCount,
  missingEntry,
  missingOpenDelimiter,
} from './internal/errors.js'

export const INTERNAL_FIELD_MARKER = 'internalField'
export const UNIFORM_MARKER = 'uniform'
export const NON_UNIFORM_MARKER = 'nonuniform'

const COUNT_LINE = /^\s*\d+\s*$/
const CLOSE_DELIMITERS: ReadonlySet<string> = new Set([')', ');'])

/**
 * `nonuniform` contains `uniform`, so the longer marker has to be excluded explicitly.
 */
export const isUniformDeclaration = (text: string): boolean =>
  text.includes(UNIFORM_MARKER) && !text.includes(NON_UNIFORM_MARKER)

const uniformRawValue = (text: string): string =>
  text
    .slice(text.indexOf(UNIFORM_MARKER) + UNIFORM_MARKER.length)
    .replaceAll(';', ' ')
    .trim()

const findIndexFrom = (lines: ReadonlyArray<string>, from: number, predicate: (line: string) => boolean): number => {
  for (let i = from; i < lines.length; i++) {
    if (predicate(lines[i])) return i
  }
  return -1
}

/**
 * Finds the `internalField` entry of a field file and returns its raw text.
 *
 * Layout between the tokens is free-form (blank lines, comments, indentation), so every
 * structural element is found by content:
 *
 * ```
 * internalField   nonuniform List<scalar>
 * 3
 * (
 * 0.1
 * 0.2
 * 0.3
 * )
 * ;
 * ```
 */
export const locate = (lines: ReadonlyArray<string>): Effect.Effect<InternalFieldBlock, LocateError> =>
  Effect.gen(function* () {
    const markerIdx = findIndexFrom(lines, 0, (line) => line.includes(INTERNAL_FIELD_MARKER))
    if (markerIdx < 0) return yield* Effect.fail(missingEntry(INTERNAL_FIELD_MARKER))

    const markerLine = lines[markerIdx]
    const declaration = markerLine.slice(markerLine.indexOf(INTERNAL_FIELD_MARKER) + INTERNAL_FIELD_MARKER.length)
    if (isUniformDeclaration(declaration)) {
      return InternalFieldBlock.Uniform({ raw: uniformRawValue(declaration) })
    }

    const countIdx = findIndexFrom(lines, markerIdx, (line) => COUNT_LINE.test(line))
    if (countIdx < 0) return yield* Effect.fail(missingCount(markerIdx + 1))
    const declaredCount = Number.parseInt(lines[countIdx].trim(), 10)

    const openIdx = findIndexFrom(lines, countIdx + 1, (line) => line.trim() === '(')
    if (openIdx < 0) return yield* Effect.fail(missingOpenDelimiter(countIdx + 2))

    const dataLines: string[] = []
    for (let i = openIdx + 1; i < lines.length; i++) {
      const stripped = lines[i].trim()
      if (CLOSE_DELIMITERS.has(stripped)) {
        return InternalFieldBlock.NonUniform({ declaredCount, lines: dataLines })
      }
      if (stripped.length === 0 || stripped.startsWith('//')) continue
      dataLines.push(stripped)
    }

    return yield* Effect.fail(missingCloseDelimiter(openIdx + 2))
  })
