import { object } from '@optique/core/constructs'
import { message } from '@optique/core/message'
import { optional } from '@optique/core/modifiers'
import { argument, option } from '@optique/core/primitives'
import { integer, string } from '@optique/core/valueparser'
import { run } from '@optique/run'
import { logger } from '@/lib/logger'
import { runProvisionCommand } from './provision'

const parser = object({
  inventory: argument(string({ metavar: 'INVENTORY' }), {
    description: message`Inventory file with one hostname,address per line (- reads stdin)`,
  }),
  retries: optional(option('--retries', integer({ min: 0 }), {
    description: message`Retries per host after a failed attempt`,
  })),
  dryRun: option('--dry-run', { description: message`Don't call the API; just show what would be done` }),
  concurrency: optional(option('--concurrency', integer({ min: 1 }), {
    description: message`Number of concurrent workers (capped at 256)`,
  })),
  timeout: optional(option('--timeout', integer({ min: 1 }), {
    description: message`Per-attempt API timeout in milliseconds`,
  })),
  apiUrl: optional(option('--api-url', string({ metavar: 'URL' }), {
    description: message`Provisioning API endpoint`,
  })),
  apiKey: optional(option('--api-key', string({ metavar: 'KEY' }), {
    description: message`API key sent as a bearer token`,
  })),
  simulate: option('--simulate', { description: message`Use the simulated API instead of HTTP` }),
  reportEmptyFields: option('--report-empty-fields', {
    description: message`Report lines with an empty hostname or address as parse errors`,
  }),
})

const result = run(parser, {
  programName: 'provision',
  description: message`Provision hosts from an inventory file`,
  help: 'both',
})

void (async () => {
  try {
    const { exitCode } = await runProvisionCommand(result, { logger })
    process.exitCode = exitCode
  } catch (err) {
    logger.fatal({ err }, 'Provisioning command failed')
    process.exitCode = 1
  }
})()
