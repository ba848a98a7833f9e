import path from 'node:path'

import { Args, CliConfig, CommandDescriptor, CommandDirective, HelpDoc, Options, ValidationError } from '@effect/cli'
import { NodeContext } from '@effect/platform-node'
import { Effect, Option as FxOption } from 'effect'

import { makeCliError } from './errors.js'

export const DEFAULT_FIELDS: ReadonlyArray<string> = ['U', 'k', 'nut', 'omega', 'p', 'phi']

export type CliInvocation = {
  readonly kind: 'command'
  readonly command: 'convert'
  readonly global: CliInvocation.Global
  readonly caseDir: string
  readonly fields: ReadonlyArray<string>
}

export declare namespace CliInvocation {
  export type Global = {
    readonly runId: string
    readonly outDir?: string
  }
}

export type CliHelpResult = { readonly kind: 'help'; readonly text: string }

const optionalText = (name: string): Options.Options<string | undefined> =>
  Options.text(name).pipe(
    Options.optional,
    Options.map((opt) => FxOption.getOrUndefined(opt)),
  )

export type ParsedOptions = {
  readonly runId?: string
  readonly out?: string
  readonly outRoot?: string
  readonly fields?: string
  readonly cliConfig?: string
  readonly profile?: string
}

const baseOptions: Options.Options<ParsedOptions> = Options.all({
  runId: optionalText('runId'),
  out: optionalText('out'),
  outRoot: optionalText('outRoot'),
  fields: optionalText('fields'),
  cliConfig: optionalText('cliConfig'),
  profile: optionalText('profile'),
})

const rootCommand = CommandDescriptor.make('foamcsv', baseOptions, Args.text({ name: 'caseDir' })).pipe(
  CommandDescriptor.map(({ options, args }) => ({ options, caseDir: args })),
)

const flagsWithValue: ReadonlySet<string> = new Set(['--cliConfig', '--fields', '--out', '--outRoot', '--profile', '--runId'])

// A field name becomes a file name under the time directory, so path separators are rejected.
const FIELD_NAME = /^[A-Za-z0-9_.:-]+$/

export const parseFieldList = (raw: string): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const fields: string[] = []
  for (const token of raw.split(/[\s,]+/)) {
    if (token.length === 0 || seen.has(token)) continue
    seen.add(token)
    fields.push(token)
  }
  return fields
}

const validateFields = (fields: ReadonlyArray<string>): Effect.Effect<ReadonlyArray<string>, ValidationError.ValidationError> => {
  if (fields.length === 0) {
    return Effect.fail(ValidationError.invalidValue(HelpDoc.p('--fields requires at least one field name')))
  }
  const invalid = fields.find((f) => !FIELD_NAME.test(f) || f === '.' || f === '..')
  if (invalid !== undefined) {
    return Effect.fail(ValidationError.invalidValue(HelpDoc.p(`Invalid field name: ${invalid}`)))
  }
  return Effect.succeed(fields)
}

const optionKey = (token: string): string => token.slice(2).split('=')[0] ?? token

type OptionOccurrence = { readonly key: string; readonly tokens: ReadonlyArray<string> }

/**
 * Rewrites argv into the shape @effect/cli expects:
 * - `--flag=value` is split into two tokens;
 * - `--fields U k p` (space separated, until the next flag) becomes `--fields U,k,p`;
 * - repeated flags keep their last occurrence, so explicit flags override config defaults;
 * - options come first, positionals last.
 */
export const normalizeArgv = (argv: ReadonlyArray<string>): ReadonlyArray<string> => {
  const occurrences: OptionOccurrence[] = []
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    const eq = token.startsWith('--') ? token.indexOf('=') : -1
    if (eq > 0 && flagsWithValue.has(token.slice(0, eq))) {
      const flag = token.slice(0, eq)
      occurrences.push({ key: optionKey(flag), tokens: [flag, token.slice(eq + 1)] })
      continue
    }
    if (token === '--fields') {
      const values: string[] = []
      while (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
        values.push(argv[i + 1])
        i += 1
      }
      occurrences.push({ key: 'fields', tokens: values.length > 0 ? [token, values.join(',')] : [token] })
      continue
    }
    if (flagsWithValue.has(token)) {
      const value = argv[i + 1]
      occurrences.push({ key: optionKey(token), tokens: value !== undefined ? [token, value] : [token] })
      if (value !== undefined) i += 1
      continue
    }
    if (token.startsWith('--')) {
      occurrences.push({ key: optionKey(token), tokens: [token] })
      continue
    }
    positionals.push(token)
  }

  const seen = new Set<string>()
  const kept: OptionOccurrence[] = []
  for (let i = occurrences.length - 1; i >= 0; i--) {
    const occ = occurrences[i]
    if (seen.has(occ.key)) continue
    seen.add(occ.key)
    kept.push(occ)
  }
  kept.reverse()

  return [...kept.flatMap((o) => o.tokens), ...positionals]
}

const renderValidationError = (err: ValidationError.ValidationError): string =>
  HelpDoc.toAnsiText(err.error).replace(/\u001b\[[0-9;]*m/g, '').trim()

export const parseCliInvocation = (
  argv: ReadonlyArray<string>,
  options: { readonly helpText: string },
): Effect.Effect<CliHelpResult | CliInvocation, unknown> => {
  if (argv.includes('-h') || argv.includes('--help') || argv.length === 0) {
    return Effect.succeed({ kind: 'help', text: options.helpText } as const satisfies CliHelpResult)
  }

  const normalized = normalizeArgv(argv)

  return CommandDescriptor.parse(rootCommand, ['foamcsv', ...normalized], CliConfig.defaultConfig).pipe(
    Effect.provide(NodeContext.layer),
    Effect.flatMap((directive): Effect.Effect<CliHelpResult | CliInvocation, unknown> => {
      if (CommandDirective.isBuiltIn(directive)) {
        return Effect.succeed({ kind: 'help', text: options.helpText } as const satisfies CliHelpResult)
      }

      if (directive.leftover.length > 0) {
        return Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_ARGUMENT',
            message: `Unknown argument: ${directive.leftover[0]}`,
            hint: options.helpText,
          }),
        )
      }

      const parsed = directive.value
      const caseDir = parsed.caseDir.trim()
      const fieldsRaw = parsed.options.fields
      const fields = fieldsRaw !== undefined ? parseFieldList(fieldsRaw) : DEFAULT_FIELDS

      return validateFields(fields).pipe(
        Effect.map((validFields): CliInvocation => {
          const caseName = path.basename(path.resolve(caseDir))
          const runId = parsed.options.runId?.trim() || caseName
          const outExplicit = parsed.options.out?.trim() || undefined
          const outRoot = parsed.options.outRoot?.trim() || undefined
          const outDir = outExplicit ?? (outRoot ? path.join(outRoot, `${caseName}_csv`) : undefined)

          return {
            kind: 'command',
            command: 'convert',
            global: { runId, ...(outDir ? { outDir } : null) },
            caseDir,
            fields: validFields,
          }
        }),
      )
    }),
    Effect.catchAll((cause) => {
      if (ValidationError.isValidationError(cause)) {
        return Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_ARGUMENT',
            message: renderValidationError(cause),
            hint: options.helpText,
            cause,
          }),
        )
      }
      return Effect.fail(cause)
    }),
  )
}
