import { Effect } from 'effect'

import { type Arity, FieldValues, type InternalFieldBlock, VECTOR_COMPONENTS, type Vector3 } from './FieldBlock.js'
import { type ExtractError, type MalformedNumber, arityMismatch, malformedNumber } from './internal/errors.js'
import { parseFloatLiteral, splitWhitespace } from './internal/floatLiteral.js'

const parseToken = (token: string, text: string): Effect.Effect<number, MalformedNumber> => {
  const value = parseFloatLiteral(token)
  return value === undefined ? Effect.fail(malformedNumber({ token, text })) : Effect.succeed(value)
}

const parseVectorTokens = (tokens: ReadonlyArray<string>, text: string): Effect.Effect<Vector3, ExtractError> =>
  Effect.gen(function* () {
    if (tokens.length !== VECTOR_COMPONENTS) {
      return yield* Effect.fail(arityMismatch({ expected: VECTOR_COMPONENTS, actual: tokens.length, text }))
    }
    const x = yield* parseToken(tokens[0], text)
    const y = yield* parseToken(tokens[1], text)
    const z = yield* parseToken(tokens[2], text)
    return [x, y, z] as const
  })

const stripEnclosingParens = (text: string): string => text.trim().replace(/^[()]+|[()]+$/g, '')

const stripTerminator = (text: string): string => text.trim().replace(/;+$/, '').trim()

// Extra tokens after the first one are tolerated on uniform scalars.
const uniformScalar = (raw: string): Effect.Effect<FieldValues, ExtractError> =>
  Effect.gen(function* () {
    const first = splitWhitespace(stripEnclosingParens(raw))[0] ?? ''
    const value = yield* parseToken(first, raw)
    return FieldValues.Scalar({ values: [value] })
  })

const uniformVector = (raw: string): Effect.Effect<FieldValues, ExtractError> =>
  Effect.gen(function* () {
    const inner = stripEnclosingParens(raw)
    const vector = yield* parseVectorTokens(splitWhitespace(inner), inner)
    return FieldValues.Vector({ values: [vector] })
  })

const nonUniformScalar = (lines: ReadonlyArray<string>): Effect.Effect<FieldValues, ExtractError> =>
  Effect.gen(function* () {
    const values: number[] = []
    for (const line of lines) {
      const text = stripTerminator(line)
      if (text.length === 0) continue
      values.push(yield* parseToken(text, line))
    }
    return FieldValues.Scalar({ values })
  })

const nonUniformVector = (lines: ReadonlyArray<string>): Effect.Effect<FieldValues, ExtractError> =>
  Effect.gen(function* () {
    const values: Vector3[] = []
    for (const line of lines) {
      let text = stripTerminator(line)
      if (text.startsWith('(') && text.endsWith(')')) text = text.slice(1, -1)
      values.push(yield* parseVectorTokens(splitWhitespace(text), text))
    }
    return FieldValues.Vector({ values })
  })

/**
 * Parses a located block into numbers.
 *
 * Vector entries may be written `(x y z)` or bare `x y z`. The declared list size is not
 * enforced here; see `parseFieldLines` for the count check.
 */
export const extract = (block: InternalFieldBlock, arity: Arity): Effect.Effect<FieldValues, ExtractError> => {
  switch (block._tag) {
    case 'Uniform':
      return arity === 'scalar' ? uniformScalar(block.raw) : uniformVector(block.raw)
    case 'NonUniform':
      return arity === 'scalar' ? nonUniformScalar(block.lines) : nonUniformVector(block.lines)
  }
}
