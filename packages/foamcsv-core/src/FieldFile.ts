import { Effect } from 'effect'

import { extract } from './Extractor.js'
import { type Arity, type FieldValues, fieldValuesLength } from './FieldBlock.js'
import { locate } from './Locator.js'
import type { ParseError } from './internal/errors.js'

export const VECTOR_FIELDS: ReadonlySet<string> = new Set(['U'])

export const arityForField = (fieldName: string): Arity => (VECTOR_FIELDS.has(fieldName) ? 'vector' : 'scalar')

/**
 * A nonuniform list whose parsed entry count differs from its declared size.
 * Informational only: the parsed values are still returned.
 */
export type CountAnomaly = {
  readonly _tag: 'CountAnomaly'
  readonly declared: number
  readonly observed: number
  readonly message: string
}

export const makeCountAnomaly = (declared: number, observed: number): CountAnomaly => ({
  _tag: 'CountAnomaly',
  declared,
  observed,
  message: `Declared ${declared} entries but parsed ${observed}`,
})

export type FieldParseResult = {
  readonly classification: 'uniform' | 'nonuniform'
  readonly arity: Arity
  readonly values: FieldValues
  readonly declaredCount?: number
  readonly observedCount: number
  readonly anomaly?: CountAnomaly
}

export const splitLines = (text: string): ReadonlyArray<string> => text.split(/\r\n|\r|\n/)

export const parseFieldLines = (lines: ReadonlyArray<string>, arity: Arity): Effect.Effect<FieldParseResult, ParseError> =>
  Effect.gen(function* () {
    const block = yield* locate(lines)
    const values = yield* extract(block, arity)
    const observedCount = fieldValuesLength(values)

    if (block._tag === 'Uniform') {
      const uniform: FieldParseResult = { classification: 'uniform', arity, values, observedCount }
      return uniform
    }

    const declaredCount = block.declaredCount
    const nonUniform: FieldParseResult = {
      classification: 'nonuniform',
      arity,
      values,
      declaredCount,
      observedCount,
      ...(observedCount !== declaredCount ? { anomaly: makeCountAnomaly(declaredCount, observedCount) } : null),
    }
    return nonUniform
  })

export const parseFieldText = (text: string, arity: Arity): Effect.Effect<FieldParseResult, ParseError> =>
  parseFieldLines(splitLines(text), arity)
