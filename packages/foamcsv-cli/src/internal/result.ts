import type { SerializableErrorSummary } from './errors.js'

export type JsonValue = null | boolean | number | string | { readonly [k: string]: JsonValue } | ReadonlyArray<JsonValue>

/**
 * One entry per field/timestep pair that was attempted, plus the `summary` entry.
 * `file` is relative to the output root.
 */
export type ArtifactOutput = {
  readonly outputKey: string
  readonly kind: 'FieldCsv' | 'RunSummary'
  readonly ok: boolean
  readonly file?: string
  readonly inline?: JsonValue
  readonly rows?: number
  readonly reasonCodes?: ReadonlyArray<string>
  readonly error?: SerializableErrorSummary
}

export type CommandResult = {
  readonly schemaVersion: 1
  readonly kind: 'CommandResult'
  readonly runId: string
  readonly command: string
  readonly ok: boolean
  readonly outDir?: string
  readonly artifacts: ReadonlyArray<ArtifactOutput>
  readonly error?: SerializableErrorSummary
}

export const sortArtifactsByOutputKey = (artifacts: ReadonlyArray<ArtifactOutput>): ReadonlyArray<ArtifactOutput> =>
  Array.from(artifacts).sort((a, b) => (a.outputKey < b.outputKey ? -1 : a.outputKey > b.outputKey ? 1 : 0))

export const makeCommandResult = (input: Omit<CommandResult, 'schemaVersion' | 'kind'>): CommandResult => ({
  schemaVersion: 1,
  kind: 'CommandResult',
  runId: input.runId,
  command: input.command,
  ok: input.ok,
  ...(input.outDir ? { outDir: input.outDir } : null),
  artifacts: input.artifacts,
  ...(input.ok ? null : { error: input.error }),
})

export const makeErrorCommandResult = (args: {
  readonly runId: string
  readonly command: string
  readonly error: SerializableErrorSummary
}): CommandResult =>
  makeCommandResult({
    runId: args.runId,
    command: args.command,
    ok: false,
    artifacts: [],
    error: args.error,
  })
