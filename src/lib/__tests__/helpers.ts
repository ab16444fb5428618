import pino from 'pino'
import type { Logger } from '@/lib/logger'

export interface LogEntry {
  level: number
  msg?: string
  [key: string]: unknown
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const

/** A real pino logger that keeps every JSON line in memory. */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      entries.push(JSON.parse(line))
    },
  })
  return { logger, entries }
}

export function messages(entries: LogEntry[], level?: number): Array<string | undefined> {
  return entries.filter((e) => level === undefined || e.level === level).map((e) => e.msg)
}
