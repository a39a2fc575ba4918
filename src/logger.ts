type Fields = Record<string, unknown>

export type Level = 'debug' | 'info' | 'warn' | 'error'

let isVerbose = process.env.MUXTREE_DEBUG === '1'

/**
 * Turns on debug output for pattern registration and dispatch.
 */
export function verbose(): void {
  isVerbose = true
}

export function silent(): void {
  isVerbose = false
}

export function isEnabled(level: Level): boolean {
  return level !== 'debug' || isVerbose
}

export function format(level: Level, message: string, fields: Fields = {}): string {
  const pairs = Object.entries(fields).map(([key, value]) => `${key}=${quote(value)}`)
  return [`level=${level.toUpperCase()}`, `msg=${quote(message)}`, ...pairs].join(' ')
}

function quote(value: unknown): string {
  const text = value instanceof Error ? value.message : String(value)
  return /^[^\s"=]+$/.test(text) ? text : JSON.stringify(text)
}

function log(level: Level, message: string, fields?: Fields): void {
  if (!isEnabled(level)) return
  const line = format(level, message, fields)
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

export const logger = {
  debug: (message: string, fields?: Fields) => log('debug', message, fields),
  info: (message: string, fields?: Fields) => log('info', message, fields),
  warn: (message: string, fields?: Fields) => log('warn', message, fields),
  error: (message: string, fields?: Fields) => log('error', message, fields)
}
