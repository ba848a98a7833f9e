export { formatCommandResult, main, printHelp, runCli } from './Commands.js'
export type { RunCliOptions, RunOutcome } from './Commands.js'
export { DEFAULT_FIELDS, normalizeArgv, parseCliInvocation, parseFieldList } from './internal/args.js'
export type { CliInvocation } from './internal/args.js'
export { CLI_CONFIG_FILE_NAME, resolveCliConfigArgvPrefix, validateConfigFile } from './internal/cliConfig.js'
export type { CliProfileDefaults, FoamCsvCliConfigFile } from './internal/cliConfig.js'
export { CliError, asSerializableErrorSummary, exitCodeFromErrorSummary, makeCliError } from './internal/errors.js'
export type { CliErrorCode, CliExitCode, SerializableErrorSummary } from './internal/errors.js'
export { defaultOutDirForCase, runConvert } from './internal/commands/convert.js'
export { LOG_FILE_NAME, formatLogFileLine, makeRunLoggerLayer } from './internal/logging.js'
export { SCALAR_CSV_HEADER, VECTOR_CSV_HEADER, formatCsvNumber, formatFieldCsv } from './internal/output.js'
export type { ArtifactOutput, CommandResult } from './internal/result.js'
export { listTimeDirs, timeValueOfDirName } from './internal/timeDirs.js'
export type { TimeDir } from './internal/timeDirs.js'
