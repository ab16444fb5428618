import { createInterface } from 'node:readline'
import { config } from '@/lib/config'
import { runProvisioning } from '@/lib/dispatcher'
import {
  InventoryReadError,
  parseInventoryStream,
  readInventory,
  type ParseOptions,
} from '@/lib/inventory'
import type { Logger } from '@/lib/logger'
import { createHttpProvisionApi, createSimulatedProvisionApi } from '@/lib/provisioner-client'
import { formatSummary } from '@/lib/utils'
import { validateConfig } from '@/lib/validation'
import type { InventoryParseResult, ProvisionApi, RunSummary } from '@/types'

export const EXIT_OK = 0
export const EXIT_INVALID_CONFIG = 1
export const EXIT_INVENTORY_UNREADABLE = 2

export interface ProvisionCommandOptions {
  /** Inventory path, or `-` for stdin */
  inventory: string
  retries?: number
  dryRun: boolean
  concurrency?: number
  timeout?: number
  apiUrl?: string
  apiKey?: string
  simulate: boolean
  reportEmptyFields: boolean
}

export interface ProvisionCommandDeps {
  logger: Logger
  api?: ProvisionApi
  stdin?: NodeJS.ReadableStream
}

export interface ProvisionCommandResult {
  exitCode: number
  summary?: RunSummary
}

async function loadInventory(
  opts: ProvisionCommandOptions,
  deps: ProvisionCommandDeps,
  parseOptions: ParseOptions
): Promise<InventoryParseResult> {
  if (opts.inventory !== '-') {
    return readInventory(opts.inventory, parseOptions)
  }

  const lines = createInterface({ input: deps.stdin ?? process.stdin, crlfDelay: Infinity })
  let result: InventoryParseResult
  try {
    result = await parseInventoryStream(lines, parseOptions)
  } catch (err) {
    throw new InventoryReadError('-', err)
  } finally {
    lines.close()
  }
  deps.logger.info(
    { path: '-', valid: result.records.length, parseErrors: result.diagnostics.length },
    `Parsed inventory: ${result.records.length} valid entries, ${result.diagnostics.length} parse errors`
  )
  return result
}

/**
 * Validate settings, read and parse the inventory, then provision every valid
 * host. Per-host failures still exit 0; only an unreadable inventory or
 * invalid settings stop the run before dispatch.
 */
export async function runProvisionCommand(
  opts: ProvisionCommandOptions,
  deps: ProvisionCommandDeps
): Promise<ProvisionCommandResult> {
  const { logger } = deps

  const validated = validateConfig({
    dryRun: opts.dryRun,
    maxRetries: opts.retries ?? config.retries,
    timeoutMs: opts.timeout ?? config.timeoutMs,
    endpoint: opts.apiUrl ?? config.apiUrl,
    credential: opts.apiKey ?? config.apiKey,
    concurrency: opts.concurrency ?? config.concurrency,
    // Only an explicit 0 disables backoff; anything else goes through validation.
    backoff: config.backoff.baseDelayMs === 0 ? undefined : config.backoff,
  })
  if ('error' in validated) {
    for (const issue of validated.error) logger.error(`Invalid setting: ${issue}`)
    return { exitCode: EXIT_INVALID_CONFIG }
  }

  let inventory: InventoryParseResult
  try {
    inventory = await loadInventory(opts, deps, {
      logger,
      reportEmptyFields: opts.reportEmptyFields,
    })
  } catch (err) {
    if (err instanceof InventoryReadError) {
      logger.error({ path: err.path }, err.message)
      return { exitCode: EXIT_INVENTORY_UNREADABLE }
    }
    throw err
  }

  const api = deps.api ?? (opts.simulate ? createSimulatedProvisionApi() : createHttpProvisionApi())
  const summary = await runProvisioning(inventory.records, validated.data, { api, logger }, {
    parseErrors: inventory.diagnostics.length,
  })

  logger.info(`Summary: ${formatSummary(summary)}`)
  return { exitCode: EXIT_OK, summary }
}
