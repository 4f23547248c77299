type LogLevel = 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export type Logger = {
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
}

function normalizeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    }
  }
  if (typeof value === 'bigint') return value.toString()
  return value
}

export function formatLogLine(level: LogLevel, scope: string, event: string, fields: LogFields = {}) {
  const normalized: LogFields = {}
  for (const [key, value] of Object.entries(fields)) {
    normalized[key] = normalizeValue(value)
  }

  try {
    return JSON.stringify({ ts: new Date().toISOString(), level, scope, event, ...normalized })
  } catch (error) {
    return JSON.stringify({
      ts: new Date().toISOString(),
      level: 'error',
      scope,
      event: 'log_serialize_error',
      originalEvent: event,
      error: normalizeValue(error),
    })
  }
}

export function createLogger(scope: string): Logger {
  return {
    info(event, fields) {
      console.log(formatLogLine('info', scope, event, fields))
    },
    warn(event, fields) {
      console.warn(formatLogLine('warn', scope, event, fields))
    },
    error(event, fields) {
      console.error(formatLogLine('error', scope, event, fields))
    },
  }
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
}
