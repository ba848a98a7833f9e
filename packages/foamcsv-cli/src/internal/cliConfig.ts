import { Effect } from 'effect'
import fs from 'node:fs/promises'
import path from 'node:path'

import { makeCliError } from './errors.js'

export const CLI_CONFIG_FILE_NAME = 'foamcsv.cli.json'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const asNonEmptyString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined

export type CliProfileDefaults = {
  readonly fields?: ReadonlyArray<string>
  readonly outRoot?: string
}

export type FoamCsvCliConfigFile = {
  readonly schemaVersion: 1
  readonly defaults?: CliProfileDefaults
  readonly profiles?: Readonly<Record<string, CliProfileDefaults>>
}

const knownKeys: ReadonlySet<string> = new Set(['fields', 'outRoot'])

const readJsonFile = (filePath: string): Effect.Effect<unknown, unknown> =>
  Effect.tryPromise({
    try: async () => JSON.parse(await fs.readFile(filePath, 'utf8')) as unknown,
    catch: (cause) =>
      makeCliError({
        code: 'CLI_INVALID_INPUT',
        message: `[foamcsv] Could not read or parse config file: ${filePath}`,
        cause,
      }),
  })

const statExists = (filePath: string): Effect.Effect<boolean, never> =>
  Effect.tryPromise({
    try: async () => {
      await fs.stat(filePath)
      return true
    },
    catch: (cause) => cause,
  }).pipe(Effect.catchAll(() => Effect.succeed(false)))

const findUp = (startDir: string, fileName: string): Effect.Effect<string | undefined, never> =>
  Effect.gen(function* () {
    let dir = path.resolve(startDir)
    while (true) {
      const candidate = path.join(dir, fileName)
      if (yield* statExists(candidate)) return candidate
      const parent = path.dirname(dir)
      if (parent === dir) return undefined
      dir = parent
    }
  })

const getFlag = (argv: ReadonlyArray<string>, name: string): Effect.Effect<string | undefined, unknown> => {
  const flag = `--${name}`
  for (let i = argv.length - 1; i >= 0; i--) {
    const token = argv[i]
    if (token.startsWith(`${flag}=`)) return Effect.succeed(token.slice(flag.length + 1))
    if (token !== flag) continue
    const next = argv[i + 1]
    if (!next || next.startsWith('--')) {
      return Effect.fail(makeCliError({ code: 'CLI_INVALID_ARGUMENT', message: `${flag} requires a value` }))
    }
    return Effect.succeed(next)
  }
  return Effect.succeed(undefined)
}

const validateDefaults = (input: unknown, label: string): Effect.Effect<CliProfileDefaults, unknown> =>
  Effect.gen(function* () {
    if (!isRecord(input)) {
      return yield* Effect.fail(makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] ${label} must be an object` }))
    }

    for (const key of Object.keys(input)) {
      if (!knownKeys.has(key)) {
        return yield* Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_INPUT',
            message: `[foamcsv] ${label} has an unknown key: ${key}`,
            hint: `Supported keys: ${Array.from(knownKeys).join(', ')}`,
          }),
        )
      }
    }

    const fields = input.fields
    let validFields: ReadonlyArray<string> | undefined
    if (fields !== undefined) {
      if (!Array.isArray(fields) || fields.length === 0) {
        return yield* Effect.fail(
          makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] ${label}.fields must be a non-empty array of strings` }),
        )
      }
      const names: string[] = []
      for (const field of fields) {
        const name = asNonEmptyString(field)
        if (!name) {
          return yield* Effect.fail(
            makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] ${label}.fields must be a non-empty array of strings` }),
          )
        }
        names.push(name)
      }
      validFields = names
    }

    const outRootRaw = input.outRoot
    const outRoot = asNonEmptyString(outRootRaw)
    if (outRootRaw !== undefined && outRoot === undefined) {
      return yield* Effect.fail(
        makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] ${label}.outRoot must be a non-empty string` }),
      )
    }

    const defaults: CliProfileDefaults = {
      ...(validFields ? { fields: validFields } : null),
      ...(outRoot ? { outRoot } : null),
    }
    return defaults
  })

export const validateConfigFile = (input: unknown, filePath: string): Effect.Effect<FoamCsvCliConfigFile, unknown> =>
  Effect.gen(function* () {
    if (!isRecord(input)) {
      return yield* Effect.fail(
        makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] Config file must be a JSON object: ${filePath}` }),
      )
    }
    if (input.schemaVersion !== 1) {
      return yield* Effect.fail(
        makeCliError({
          code: 'CLI_INVALID_INPUT',
          message: `[foamcsv] Unsupported config schemaVersion: ${String(input.schemaVersion)} (expected 1)`,
        }),
      )
    }

    const defaults = input.defaults !== undefined ? yield* validateDefaults(input.defaults, 'defaults') : undefined

    let profiles: Record<string, CliProfileDefaults> | undefined
    if (input.profiles !== undefined) {
      if (!isRecord(input.profiles)) {
        return yield* Effect.fail(
          makeCliError({ code: 'CLI_INVALID_INPUT', message: '[foamcsv] profiles must be an object (Record<string, defaults>)' }),
        )
      }
      profiles = {}
      for (const [name, raw] of Object.entries(input.profiles)) {
        const key = asNonEmptyString(name)
        if (!key) continue
        profiles[key] = yield* validateDefaults(raw, `profiles.${key}`)
      }
    }

    const config: FoamCsvCliConfigFile = {
      schemaVersion: 1,
      ...(defaults ? { defaults } : null),
      ...(profiles ? { profiles } : null),
    }
    return config
  })

const toArgvPrefix = (defaults: CliProfileDefaults): ReadonlyArray<string> => {
  const tokens: string[] = []
  // `--flag=value` keeps a prefixed `--fields` list from swallowing the user's positional case directory.
  if (defaults.fields) tokens.push(`--fields=${defaults.fields.join(',')}`)
  if (defaults.outRoot) tokens.push(`--outRoot=${defaults.outRoot}`)
  return tokens
}

/**
 * Turns `foamcsv.cli.json` (found from `cwd` upwards, or given by `--cliConfig`) into argv tokens
 * to prepend to the user's argv: defaults first, then the selected `--profile`.
 */
export const resolveCliConfigArgvPrefix = (
  argv: ReadonlyArray<string>,
  options?: { readonly cwd?: string },
): Effect.Effect<ReadonlyArray<string>, unknown> =>
  Effect.gen(function* () {
    const cwd = options?.cwd ?? process.cwd()
    const explicitPathRaw = yield* getFlag(argv, 'cliConfig')
    const profile = asNonEmptyString(yield* getFlag(argv, 'profile'))

    const configPath = explicitPathRaw ? path.resolve(cwd, explicitPathRaw) : yield* findUp(cwd, CLI_CONFIG_FILE_NAME)

    if (!configPath) {
      if (profile) {
        return yield* Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_INPUT',
            message: `[foamcsv] --profile ${profile} was given but no config file was found`,
            hint: `Place ${CLI_CONFIG_FILE_NAME} in the working directory or a parent, or pass --cliConfig <path>.`,
          }),
        )
      }
      return []
    }

    if (explicitPathRaw && !(yield* statExists(configPath))) {
      return yield* Effect.fail(
        makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] Config file does not exist: ${explicitPathRaw}` }),
      )
    }

    const raw = yield* readJsonFile(configPath)
    const config = yield* validateConfigFile(raw, configPath)

    const tokens: string[] = []
    if (config.defaults) tokens.push(...toArgvPrefix(config.defaults))

    if (profile) {
      const profileDefaults = config.profiles?.[profile]
      if (!profileDefaults) {
        return yield* Effect.fail(makeCliError({ code: 'CLI_INVALID_INPUT', message: `[foamcsv] Unknown profile: ${profile}` }))
      }
      tokens.push(...toArgvPrefix(profileDefaults))
    }

    return tokens
  })
