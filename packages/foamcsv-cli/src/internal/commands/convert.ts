import path from 'node:path'

import { Effect } from 'effect'

import { type CountAnomaly, arityForField, parseFieldText } from '@foamcsv/core'

import type { CliInvocation } from '../args.js'
import { asSerializableErrorSummary, makeCliError } from '../errors.js'
import { LOG_FILE_NAME, type LogWriter, makeRunLoggerLayer } from '../logging.js'
import { ensureDir, isDirectory, pathExists, readTextFile, writeFieldCsv } from '../output.js'
import type { ArtifactOutput, CommandResult } from '../result.js'
import { makeCommandResult } from '../result.js'
import { type TimeDir, listTimeDirs } from '../timeDirs.js'

export type FieldOutcome =
  | { readonly status: 'converted'; readonly artifact: ArtifactOutput; readonly anomaly?: CountAnomaly }
  | { readonly status: 'skipped' }
  | { readonly status: 'failed'; readonly artifact: ArtifactOutput }

export type RunConvertOptions = {
  readonly writeConsole?: LogWriter
}

export const defaultOutDirForCase = (caseDir: string): string =>
  path.join(path.dirname(caseDir), `${path.basename(caseDir)}_csv`)

const toPosix = (p: string): string => p.split(path.sep).join('/')

const convertField = (args: {
  readonly timeDir: TimeDir
  readonly field: string
  readonly outRoot: string
}): Effect.Effect<FieldOutcome, never> =>
  Effect.gen(function* () {
    const { timeDir, field, outRoot } = args
    const fieldPath = path.join(timeDir.path, field)
    if (!(yield* pathExists(fieldPath))) {
      yield* Effect.log(`  [skip] ${field} not found in ${timeDir.path}`)
      return { status: 'skipped' } as const
    }

    const outputKey = `${timeDir.name}/${field}`
    const outPath = path.join(outRoot, timeDir.name, `${field}.csv`)
    const arity = arityForField(field)

    return yield* Effect.gen(function* () {
      yield* Effect.log(`  [${arity}] Converting ${fieldPath} -> ${outPath}`)
      const text = yield* readTextFile(fieldPath)
      const parsed = yield* parseFieldText(text, arity)
      if (parsed.anomaly) {
        yield* Effect.logWarning(`  [warn] ${fieldPath}: ${parsed.anomaly.message}`)
      }
      yield* writeFieldCsv(outPath, parsed.values)

      const artifact: ArtifactOutput = {
        outputKey,
        kind: 'FieldCsv',
        ok: true,
        file: toPosix(path.relative(outRoot, outPath)),
        rows: parsed.observedCount,
        ...(parsed.anomaly ? { reasonCodes: ['COUNT_ANOMALY'] } : null),
      }
      const outcome: FieldOutcome = {
        status: 'converted',
        artifact,
        ...(parsed.anomaly ? { anomaly: parsed.anomaly } : null),
      }
      return outcome
    }).pipe(
      Effect.catchAll((cause) => {
        const error = asSerializableErrorSummary(cause)
        return Effect.logError(`  [error] Failed to convert ${fieldPath}: ${error.message}`).pipe(
          Effect.as<FieldOutcome>({
            status: 'failed',
            artifact: { outputKey, kind: 'FieldCsv', ok: false, ...(error.name ? { reasonCodes: [error.name] } : null), error },
          }),
        )
      }),
    )
  })

const convertCase = (args: {
  readonly caseDir: string
  readonly outRoot: string
  readonly fields: ReadonlyArray<string>
}): Effect.Effect<ReadonlyArray<ArtifactOutput>, unknown> =>
  Effect.gen(function* () {
    const { caseDir, outRoot, fields } = args
    yield* Effect.log(`Starting CSV export for case: ${caseDir}`)
    yield* Effect.log(`Output folder: ${outRoot}`)

    const timeDirs = yield* listTimeDirs(caseDir)
    yield* Effect.log(`Found ${timeDirs.length} time directories in ${caseDir}`)
    yield* Effect.log(`Writing CSV output under ${outRoot}`)

    const artifacts: ArtifactOutput[] = []
    let converted = 0
    let skipped = 0
    let failed = 0
    let anomalies = 0

    for (const timeDir of timeDirs) {
      yield* Effect.log(`=== Time ${timeDir.name} ===`)
      for (const field of fields) {
        const outcome = yield* convertField({ timeDir, field, outRoot })
        switch (outcome.status) {
          case 'converted':
            converted += 1
            if (outcome.anomaly) anomalies += 1
            artifacts.push(outcome.artifact)
            break
          case 'skipped':
            skipped += 1
            break
          case 'failed':
            failed += 1
            artifacts.push(outcome.artifact)
            break
        }
      }
    }

    yield* Effect.log(`Done: ${converted} converted, ${skipped} skipped, ${failed} failed`)

    artifacts.push({
      outputKey: 'summary',
      kind: 'RunSummary',
      ok: true,
      inline: {
        timeDirs: timeDirs.map((t) => t.name),
        fields: [...fields],
        converted,
        skipped,
        failed,
        anomalies,
      },
    })
    return artifacts
  })

/**
 * Converts every requested field of every time directory of a case to CSV.
 *
 * A missing field file is skipped and a field that fails to parse is logged and reported as a failed artifact;
 * neither stops the run. Only a missing case directory or an unusable output directory fails the command.
 */
export const runConvert = (inv: CliInvocation, options?: RunConvertOptions): Effect.Effect<CommandResult, never> => {
  const runId = inv.global.runId

  return Effect.gen(function* () {
    const caseDir = path.resolve(inv.caseDir)
    if (!(yield* isDirectory(caseDir))) {
      return yield* Effect.fail(
        makeCliError({ code: 'CLI_CASE_NOT_FOUND', message: `Case directory does not exist: ${caseDir}` }),
      )
    }

    const outRoot = inv.global.outDir ? path.resolve(inv.global.outDir) : defaultOutDirForCase(caseDir)
    yield* ensureDir(outRoot)
    const logFile = path.join(outRoot, LOG_FILE_NAME)

    const artifacts = yield* convertCase({ caseDir, outRoot, fields: inv.fields }).pipe(
      Effect.provide(makeRunLoggerLayer({ logFile, writeConsole: options?.writeConsole })),
    )

    return makeCommandResult({ runId, command: inv.command, ok: true, outDir: outRoot, artifacts })
  }).pipe(
    Effect.catchAllCause((cause) =>
      Effect.succeed(
        makeCommandResult({
          runId,
          command: inv.command,
          ok: false,
          artifacts: [],
          error: asSerializableErrorSummary(cause),
        }),
      ),
    ),
  )
}
