import { Cause } from 'effect'

export type SerializableErrorSummary = {
  readonly name?: string
  readonly message: string
  readonly code?: string
  readonly hint?: string
}

export type CliExitCode = 0 | 1 | 2

export type CliErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_INVALID_INPUT'
  | 'CLI_CASE_NOT_FOUND'
  | 'CLI_IO_ERROR'
  | 'CLI_COMMAND_FAILED'
  | 'CLI_INTERNAL'

const usageCodes: ReadonlySet<string> = new Set(['CLI_INVALID_ARGUMENT', 'CLI_INVALID_INPUT', 'CLI_CASE_NOT_FOUND'])

export const isCliUsageCode = (code: string | undefined): boolean => typeof code === 'string' && usageCodes.has(code)

export const exitCodeFromErrorSummary = (error: SerializableErrorSummary | undefined): CliExitCode =>
  isCliUsageCode(error?.code) ? 2 : 1

export class CliError extends Error {
  readonly code: CliErrorCode
  readonly hint?: string
  override readonly cause?: unknown

  constructor(params: {
    readonly code: CliErrorCode
    readonly message: string
    readonly hint?: string
    readonly cause?: unknown
  }) {
    super(params.message)
    this.name = 'CliError'
    this.code = params.code
    this.hint = params.hint
    this.cause = params.cause
  }
}

export const makeCliError = (params: {
  readonly code: CliErrorCode
  readonly message: string
  readonly hint?: string
  readonly cause?: unknown
}): CliError => new CliError(params)

const truncate = (value: string, maxLen: number): string => (value.length <= maxLen ? value : value.slice(0, maxLen))

const readStringProp = (value: object, key: string): string | undefined => {
  const prop: unknown = Reflect.get(value, key)
  return typeof prop === 'string' && prop.length > 0 ? prop : undefined
}

const getMessageFromUnknown = (cause: unknown): string => {
  if (typeof cause === 'string') return cause
  if (typeof cause === 'number' || typeof cause === 'boolean' || typeof cause === 'bigint') return String(cause)
  if (cause instanceof CliError && typeof cause.cause !== 'undefined') {
    const inner = getMessageFromUnknown(cause.cause)
    return inner.length > 0 ? `${cause.message} | cause: ${inner}` : cause.message
  }
  if (Cause.isCause(cause)) {
    const failure = Cause.failureOption(cause)
    if (failure._tag === 'Some') return getMessageFromUnknown(failure.value)
    return Cause.pretty(cause)
  }
  if (cause instanceof Error) return cause.message || cause.name || 'Error'
  if (cause && typeof cause === 'object') {
    const message = readStringProp(cause, 'message')
    if (message) return message
  }
  return 'Unknown error'
}

/**
 * Flattens any failure (CliError, tagged parse error, Cause, plain Error) into the shape written to the run summary.
 * The `_tag` of Effect tagged errors is reported as `name`.
 */
export const asSerializableErrorSummary = (cause: unknown): SerializableErrorSummary => {
  const message = truncate(getMessageFromUnknown(cause), 512)

  const source = Cause.isCause(cause)
    ? (() => {
        const failure = Cause.failureOption(cause)
        return failure._tag === 'Some' ? failure.value : undefined
      })()
    : cause

  if (source && typeof source === 'object') {
    const name = readStringProp(source, '_tag') ?? readStringProp(source, 'name')
    const code = readStringProp(source, 'code')
    const hint = readStringProp(source, 'hint')
    return {
      ...(name ? { name } : null),
      message,
      ...(code ? { code } : null),
      ...(hint ? { hint } : null),
    }
  }

  return { message }
}
