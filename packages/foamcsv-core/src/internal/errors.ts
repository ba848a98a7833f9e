import { Data } from 'effect'

export class MissingEntry extends Data.TaggedError('MissingEntry')<{
  readonly marker: string
  readonly message: string
}> {}

export class MissingCount extends Data.TaggedError('MissingCount')<{
  readonly line: number
  readonly message: string
}> {}

export class MissingOpenDelimiter extends Data.TaggedError('MissingOpenDelimiter')<{
  readonly line: number
  readonly message: string
}> {}

export class MissingCloseDelimiter extends Data.TaggedError('MissingCloseDelimiter')<{
  readonly line: number
  readonly message: string
}> {}

export class ArityMismatch extends Data.TaggedError('ArityMismatch')<{
  readonly expected: number
  readonly actual: number
  readonly text: string
  readonly message: string
}> {}

export class MalformedNumber extends Data.TaggedError('MalformedNumber')<{
  readonly token: string
  readonly text: string
  readonly message: string
}> {}

export type LocateError = MissingEntry | MissingCount | MissingOpenDelimiter | MissingCloseDelimiter

export type ExtractError = ArityMismatch | MalformedNumber

export type ParseError = LocateError | ExtractError

export type ParseErrorTag = ParseError['_tag']

export const missingEntry = (marker: string): MissingEntry =>
  new MissingEntry({ marker, message: `No ${marker} entry found` })

// `line` is 1-based: where the scan started (count/open) or where the data block began (close).
export const missingCount = (line: number): MissingCount =>
  new MissingCount({ line, message: `Could not find the entry count of the nonuniform list (scanned from line ${line})` })

export const missingOpenDelimiter = (line: number): MissingOpenDelimiter =>
  new MissingOpenDelimiter({ line, message: `Could not find opening '(' for value list (scanned from line ${line})` })

export const missingCloseDelimiter = (line: number): MissingCloseDelimiter =>
  new MissingCloseDelimiter({ line, message: `Could not find closing ')' for value list opened before line ${line}` })

export const arityMismatch = (args: { readonly expected: number; readonly actual: number; readonly text: string }): ArityMismatch =>
  new ArityMismatch({
    ...args,
    message: `Expected ${args.expected} components, got ${args.actual}: ${args.text}`,
  })

export const malformedNumber = (args: { readonly token: string; readonly text: string }): MalformedNumber =>
  new MalformedNumber({
    ...args,
    message: args.token.length > 0 ? `Could not parse number '${args.token}' in: ${args.text}` : `Missing number in: ${args.text}`,
  })
