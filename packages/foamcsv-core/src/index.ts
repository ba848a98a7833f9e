// Public barrel for @foamcsv/core
//   import { parseFieldText, arityForField } from '@foamcsv/core'

export { type Arity, FieldValues, InternalFieldBlock, VECTOR_COMPONENTS, type Vector3, fieldValuesLength } from './FieldBlock.js'
export { INTERNAL_FIELD_MARKER, NON_UNIFORM_MARKER, UNIFORM_MARKER, isUniformDeclaration, locate } from './Locator.js'
export { extract } from './Extractor.js'
export {
  type CountAnomaly,
  type FieldParseResult,
  VECTOR_FIELDS,
  arityForField,
  makeCountAnomaly,
  parseFieldLines,
  parseFieldText,
  splitLines,
} from './FieldFile.js'
export {
  ArityMismatch,
  type ExtractError,
  type LocateError,
  MalformedNumber,
  MissingCloseDelimiter,
  MissingCount,
  MissingEntry,
  MissingOpenDelimiter,
  type ParseError,
  type ParseErrorTag,
} from './internal/errors.js'
export { isFloatLiteral, parseFloatLiteral } from './internal/floatLiteral.js'
