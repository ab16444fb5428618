import { createRequire } from 'node:module'
import pino from 'pino'

export type { Logger } from 'pino'

const require = createRequire(import.meta.url)

function hasPinoPretty(): boolean {
  try {
    require.resolve('pino-pretty')
    return true
  } catch {
    return false
  }
}

const usePretty = process.env.NODE_ENV !== 'production' && hasPinoPretty()

export const logger = pino({
  name: 'provisioner',
  level: process.env.LOG_LEVEL || 'info',
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:yyyy-mm-dd HH:MM:ss' },
    },
  }),
})
