import { Effect, Logger } from 'effect'

import type { SerializableErrorSummary } from './internal/errors.js'
import { asSerializableErrorSummary, exitCodeFromErrorSummary, makeCliError } from './internal/errors.js'
import type { CommandResult } from './internal/result.js'
import { makeErrorCommandResult, sortArtifactsByOutputKey } from './internal/result.js'
import { stableStringifyJson } from './internal/stableJson.js'
import { DEFAULT_FIELDS, parseCliInvocation, type CliInvocation } from './internal/args.js'
import { CLI_CONFIG_FILE_NAME, resolveCliConfigArgvPrefix } from './internal/cliConfig.js'
import type { LogWriter } from './internal/logging.js'
import { runConvert } from './internal/commands/convert.js'

export type RunOutcome =
  | { readonly kind: 'help'; readonly text: string; readonly exitCode: 0 }
  | { readonly kind: 'result'; readonly result: CommandResult; readonly exitCode: 0 | 1 | 2 }

export type RunCliOptions = {
  /** Directory the config file lookup starts from; defaults to `process.cwd()`. */
  readonly cwd?: string
  /** Receives the live log stream; defaults to stderr. */
  readonly writeLog?: LogWriter
}

export const formatCommandResult = (result: CommandResult): string => stableStringifyJson(result)

export const printHelp = (): string => `foamcsv

Usage:
  foamcsv <caseDir> [--fields U k p ...] [--out <dir>] [--outRoot <dir>] [--runId <id>]

Converts the internalField of every field file in every time directory of an OpenFOAM case to CSV:
  <out>/<time>/<field>.csv   one row per cell (cellId,value or cellId,ux,uy,uz)
  <out>/log.txt              run log

Options:
  --fields <names...>  fields to convert (default: ${DEFAULT_FIELDS.join(' ')})
  --out <dir>          output directory (default: <caseDir>_csv next to the case)
  --outRoot <dir>      when --out is not given, write to <outRoot>/<caseName>_csv
  --runId <string>     id reported in the result (default: the case directory name)
  --cliConfig <path>   config file (default: ${CLI_CONFIG_FILE_NAME} found from cwd upwards)
  --profile <name>     profile from the config file, applied over its defaults
  -h, --help           show this help

stdout carries one CommandResult JSON document; logs go to stderr.
`

const runCommand = (inv: CliInvocation, options?: RunCliOptions): Effect.Effect<CommandResult, never> => {
  switch (inv.command) {
    case 'convert':
      return runConvert(inv, { writeConsole: options?.writeLog })
  }
}

const tryGetRunId = (argv: ReadonlyArray<string>): string | undefined => {
  const idx = argv.lastIndexOf('--runId')
  if (idx < 0) return undefined
  const next = argv[idx + 1]
  if (!next || next.startsWith('--')) return undefined
  return next
}

const isHelpFlag = (argv: ReadonlyArray<string>): boolean =>
  argv.includes('-h') || argv.includes('--help') || argv.length === 0

export const runCli = (argv: ReadonlyArray<string>, options?: RunCliOptions): Effect.Effect<RunOutcome, never> =>
  (isHelpFlag(argv)
    ? Effect.succeed(argv)
    : resolveCliConfigArgvPrefix(argv, { cwd: options?.cwd }).pipe(
        Effect.map((prefix) => (prefix.length > 0 ? [...prefix, ...argv] : argv)),
      )
  ).pipe(
    Effect.flatMap((argv2) => parseCliInvocation(argv2, { helpText: printHelp() })),
    Effect.matchEffect({
      onFailure: (cause) => {
        const runId = tryGetRunId(argv) ?? 'unknown'
        const error = asSerializableErrorSummary(cause)
        const outcome: RunOutcome = {
          kind: 'result',
          result: makeErrorCommandResult({ runId, command: 'unknown', error }),
          exitCode: exitCodeFromErrorSummary(error),
        }
        return Effect.succeed(outcome)
      },
      onSuccess: (parsed) => {
        if (parsed.kind === 'help') {
          const outcome: RunOutcome = { kind: 'help', text: parsed.text, exitCode: 0 }
          return Effect.succeed(outcome)
        }

        const inv: CliInvocation = parsed
        return runCommand(inv, options).pipe(
          Effect.map((result): RunOutcome => ({
            kind: 'result',
            result: { ...result, artifacts: sortArtifactsByOutputKey(result.artifacts) },
            exitCode: result.ok ? 0 : exitCodeFromErrorSummary(result.error),
          })),
          Effect.catchAllCause((cause) => {
            const error: SerializableErrorSummary = asSerializableErrorSummary(
              makeCliError({
                code: 'CLI_COMMAND_FAILED',
                message: `[foamcsv] Command failed: ${inv.command}`,
                cause,
              }),
            )
            const outcome: RunOutcome = {
              kind: 'result',
              result: makeErrorCommandResult({ runId: inv.global.runId, command: inv.command, error }),
              exitCode: 1,
            }
            return Effect.succeed(outcome)
          }),
        )
      },
    }),
    Effect.catchAllCause((cause) => {
      const error: SerializableErrorSummary = asSerializableErrorSummary(
        makeCliError({ code: 'CLI_INTERNAL', message: '[foamcsv] Entry point failed', cause }),
      )
      const outcome: RunOutcome = {
        kind: 'result',
        result: makeErrorCommandResult({ runId: tryGetRunId(argv) ?? 'unknown', command: 'unknown', error }),
        exitCode: 1,
      }
      return Effect.succeed(outcome)
    }),
    // Only a conversion run installs log sinks; anything logged outside one stays off stdout.
    Effect.provide(Logger.replace(Logger.defaultLogger, Logger.make(() => {}))),
  )

export const main = runCli
