import { type Layer, type LogLevel, Logger } from 'effect'
import fs from 'node:fs'

export const LOG_FILE_NAME = 'log.txt'

export type LogWriter = (text: string) => void

export const formatLogMessage = (message: unknown): string => {
  const parts = Array.isArray(message) ? message : [message]
  return parts.map((part) => (typeof part === 'string' ? part : String(part))).join(' ')
}

export const formatLogFileLine = (args: { readonly date: Date; readonly logLevel: LogLevel.LogLevel; readonly message: unknown }): string =>
  `${args.date.toISOString()} - ${args.logLevel.label} - ${formatLogMessage(args.message)}`

// Live stream: message only, one line per entry.
export const makeConsoleLogger = (write: LogWriter): Logger.Logger<unknown, void> =>
  Logger.make(({ message }) => {
    write(`${formatLogMessage(message)}\n`)
  })

// Persisted log: `<timestamp> - <LEVEL> - <message>`, appended synchronously so a crash keeps earlier lines.
export const makeFileLogger = (filePath: string): Logger.Logger<unknown, void> =>
  Logger.make(({ date, logLevel, message }) => {
    fs.appendFileSync(filePath, `${formatLogFileLine({ date, logLevel, message })}\n`, 'utf8')
  })

export const writeToStderr: LogWriter = (text) => {
  process.stderr.write(text)
}

/**
 * Replaces the default logger for one conversion run with the console + file pair.
 * The log file is appended to, so earlier runs stay in it.
 */
export const makeRunLoggerLayer = (args: { readonly logFile: string; readonly writeConsole?: LogWriter }): Layer.Layer<never> =>
  Logger.replace(
    Logger.defaultLogger,
    Logger.zip(makeConsoleLogger(args.writeConsole ?? writeToStderr), makeFileLogger(args.logFile)),
  )
