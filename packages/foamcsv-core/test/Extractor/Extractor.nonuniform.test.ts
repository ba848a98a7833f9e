import { Effect } from 'effect'
import { describe, expect, it } from 'vitest'

import { extract } from '../../src/Extractor.js'
import { InternalFieldBlock } from '../../src/FieldBlock.js'

const nonUniform = (declaredCount: number, lines: ReadonlyArray<string>) =>
  InternalFieldBlock.NonUniform({ declaredCount, lines })

describe('extractor: nonuniform scalar', () => {
  it('should parse values in file order', () => {
    const values = Effect.runSync(extract(nonUniform(3, ['0.1', '0.2', '0.3']), 'scalar'))
    expect(values._tag).toBe('Scalar')
    expect(values.values).toEqual([0.1, 0.2, 0.3])
  })

  it('should strip trailing terminators and skip lines left empty', () => {
    const values = Effect.runSync(extract(nonUniform(2, ['1.5;', ';', '-2e3 ;']), 'scalar'))
    expect(values.values).toEqual([1.5, -2000])
  })

  it('should accept inf and nan literals', () => {
    const values = Effect.runSync(extract(nonUniform(3, ['inf', '-Infinity', 'nan']), 'scalar'))
    expect(values.values).toEqual([Infinity, -Infinity, Number.NaN])
  })

  it('should fail with MalformedNumber when a line holds more than one number', () => {
    const error = Effect.runSync(Effect.flip(extract(nonUniform(1, ['1 2']), 'scalar')))
    expect(error._tag).toBe('MalformedNumber')
    if (error._tag !== 'MalformedNumber') throw new Error('expected MalformedNumber')
    expect(error.token).toBe('1 2')
  })

  it('should reject hexadecimal literals', () => {
    const error = Effect.runSync(Effect.flip(extract(nonUniform(1, ['0x10']), 'scalar')))
    expect(error._tag).toBe('MalformedNumber')
  })

  it('should not enforce the declared count', () => {
    const values = Effect.runSync(extract(nonUniform(5, ['1']), 'scalar'))
    expect(values.values).toEqual([1])
  })
})

describe('extractor: nonuniform vector', () => {
  it('should accept parenthesized and bare entries', () => {
    const values = Effect.runSync(extract(nonUniform(3, ['(1 2 3)', '4 5 6', '(7 8 9);']), 'vector'))
    expect(values._tag).toBe('Vector')
    expect(values.values).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ])
  })

  it('should fail with ArityMismatch on a short entry', () => {
    const error = Effect.runSync(Effect.flip(extract(nonUniform(2, ['(1 2 3)', '(1 2)']), 'vector')))
    expect(error._tag).toBe('ArityMismatch')
    if (error._tag !== 'ArityMismatch') throw new Error('expected ArityMismatch')
    expect(error.actual).toBe(2)
    expect(error.text).toBe('1 2')
  })

  it('should fail with ArityMismatch on a scalar list read as vectors', () => {
    const error = Effect.runSync(Effect.flip(extract(nonUniform(2, ['0.1', '0.2']), 'vector')))
    expect(error._tag).toBe('ArityMismatch')
  })

  it('should fail with MalformedNumber on a bad component', () => {
    const error = Effect.runSync(Effect.flip(extract(nonUniform(1, ['(1 2 z)']), 'vector')))
    expect(error._tag).toBe('MalformedNumber')
    if (error._tag !== 'MalformedNumber') throw new Error('expected MalformedNumber')
    expect(error.token).toBe('z')
    expect(error.text).toBe('1 2 z')
  })
})
