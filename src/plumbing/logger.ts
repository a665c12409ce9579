import info from '../../package.json' with { type: 'json' }

const { name, version } = info

export type LogLevel = 'info' | 'warn' | 'error'

type LogValue = string | number | boolean | null | undefined | object

export interface LogEntry {
  message: string
  level?: LogLevel
  [key: string]: LogValue
}

export const log = (message: string | LogEntry) => {
  let logMessage: LogEntry & { level: LogLevel; app: string; version: string }
  if (typeof message === 'string') {
    logMessage = {
      message,
      level: 'info',
      app: name,
      version,
    }
  } else {
    logMessage = {
      ...message,
      level: message.level ?? 'info',
      app: name,
      version,
    }
  }

  if (logMessage.level === 'error') {
    console.error(logMessage)
  } else if (logMessage.level === 'warn') {
    console.warn(logMessage)
  } else {
    console.log(logMessage)
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
