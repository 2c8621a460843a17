interface LogFields {
  [key: string]: unknown
}

export type LogLevel = 'info' | 'warn' | 'error'

const stringify = (level: LogLevel, event: string, fields: LogFields): string => {
  try {
    return JSON.stringify({ level, event, time: new Date().toISOString(), ...fields })
  } catch (error) {
    return JSON.stringify({ level, event, message: 'failed_to_stringify', original: String(error) })
  }
}

export const logInfo = (event: string, fields: LogFields = {}): void => {
  console.log(stringify('info', event, fields))
}

export const logWarn = (event: string, fields: LogFields = {}): void => {
  console.warn(stringify('warn', event, fields))
}

export const logError = (event: string, fields: LogFields = {}): void => {
  console.error(stringify('error', event, fields))
}

export const log = (level: LogLevel, event: string, fields: LogFields = {}): void => {
  if (level === 'error') {
    logError(event, fields)
    return
  }
  if (level === 'warn') {
    logWarn(event, fields)
    return
  }
  logInfo(event, fields)
}
