import { Data } from 'effect'

/**
 * Number of components per cell: `scalar` fields carry one, `vector` fields three.
 */
export type Arity = 'scalar' | 'vector'

export const VECTOR_COMPONENTS = 3

/**
 * InternalFieldBlock is the raw text of an `internalField` entry, before any number is parsed.
 *
 * - Uniform: the text after the `uniform` keyword, one value for the whole field;
 * - NonUniform: the declared list size and the trimmed data lines between `(` and `)`,
 *   with blank and `//` comment lines already removed.
 */
export type InternalFieldBlock = Data.TaggedEnum<{
  Uniform: { readonly raw: string }
  NonUniform: { readonly declaredCount: number; readonly lines: ReadonlyArray<string> }
}>

export const InternalFieldBlock = Data.taggedEnum<InternalFieldBlock>()

export type Vector3 = readonly [number, number, number]

/**
 * FieldValues holds one entry per cell for NonUniform blocks, and exactly one entry for Uniform
 * blocks (broadcasting over the mesh is left to the caller, which knows the cell count).
 */
export type FieldValues = Data.TaggedEnum<{
  Scalar: { readonly values: ReadonlyArray<number> }
  Vector: { readonly values: ReadonlyArray<Vector3> }
}>

export const FieldValues = Data.taggedEnum<FieldValues>()

export const fieldValuesLength = (values: FieldValues): number => values.values.length
