import pLimit from 'p-limit'
import type { Logger } from './logger'
import { provisionHost, type WorkerDeps } from './provision-worker'
import { errorMessage, formatOutcome } from './utils'
import type {
  InventoryRecord,
  ProvisionConfig,
  ProvisionOutcome,
  RunSummary,
} from '@/types'

export const MAX_WORKERS = 256

export interface DispatchDeps extends WorkerDeps {
  /** Worker override, mostly for tests */
  provision?: typeof provisionHost
}

export interface DispatchOptions {
  /** Parse diagnostics count carried into the summary */
  parseErrors?: number
  onOutcome?: (outcome: ProvisionOutcome) => void
}

/** Pool size: whole number in [1, min(recordCount, MAX_WORKERS)]; non-finite input counts as 1. */
export function effectiveWorkers(concurrency: number, recordCount: number): number {
  const requested = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1
  return Math.max(1, Math.min(requested, recordCount, MAX_WORKERS))
}

function emptySummary(valid: number, parseErrors: number): RunSummary {
  return {
    valid,
    parseErrors,
    completed: 0,
    failed: 0,
    dryRun: 0,
    workers: 0,
    durationMs: 0,
    outcomes: [],
  }
}

function logOutcome(log: Logger, outcome: ProvisionOutcome) {
  const fields = {
    hostname: outcome.hostname,
    address: outcome.address,
    status: outcome.status,
    attempts: outcome.attempts,
  }
  if (outcome.status === 'Failed') {
    log.warn({ ...fields, error: outcome.error }, formatOutcome(outcome))
  } else {
    log.info(fields, formatOutcome(outcome))
  }
}

/**
 * Provision every record through a pool of at most `workers` concurrent
 * worker invocations. Resolves only once each record has produced exactly one
 * outcome. Outcomes are folded into the summary here, in arrival order; a
 * worker that rejects is recorded as a Failed outcome with zero attempts.
 */
export async function runProvisioning(
  records: readonly InventoryRecord[],
  config: ProvisionConfig,
  deps: DispatchDeps,
  options: DispatchOptions = {}
): Promise<RunSummary> {
  const log = deps.logger.child({ component: 'dispatcher' })
  const summary = emptySummary(records.length, options.parseErrors ?? 0)

  if (records.length === 0) {
    log.info('No valid entries to process')
    return summary
  }

  const startedAt = Date.now()
  const workers = effectiveWorkers(config.concurrency, records.length)
  const limit = pLimit(workers)
  const provision = deps.provision ?? provisionHost
  const workerDeps: WorkerDeps = { ...deps, logger: deps.logger.child({ component: 'worker' }) }
  summary.workers = workers

  log.info(
    { workers, hosts: records.length, dryRun: config.dryRun },
    `Begin provisioning with ${workers} workers (dry-run=${config.dryRun})`
  )

  const collect = (outcome: ProvisionOutcome) => {
    summary.outcomes.push(outcome)
    switch (outcome.status) {
      case 'Completed':
        summary.completed++
        break
      case 'Failed':
        summary.failed++
        break
      case 'DryRun':
        summary.dryRun++
        break
    }
    logOutcome(log, outcome)

    if (options.onOutcome) {
      try {
        options.onOutcome(outcome)
      } catch (err) {
        log.error({ err, hostname: outcome.hostname }, 'Outcome listener failed')
      }
    }
  }

  const crashed = (record: InventoryRecord, err: unknown): ProvisionOutcome => {
    log.error({ err, hostname: record.hostname, address: record.address }, 'Provisioning task crashed')
    return Object.freeze({
      hostname: record.hostname,
      address: record.address,
      status: 'Failed' as const,
      attempts: 0,
      error: errorMessage(err),
    })
  }

  await Promise.all(
    records.map((record) =>
      limit(() => provision(record, config, workerDeps)).then(
        collect,
        (err: unknown) => collect(crashed(record, err))
      )
    )
  )

  summary.durationMs = Date.now() - startedAt
  log.info(
    {
      valid: summary.valid,
      parseErrors: summary.parseErrors,
      completed: summary.completed,
      failed: summary.failed,
      dryRun: summary.dryRun,
      durationMs: summary.durationMs,
    },
    'Provisioning run finished'
  )

  return summary
}
