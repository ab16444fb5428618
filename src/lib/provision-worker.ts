import type { Logger } from './logger'
import { RetryBackoff } from './retry/backoff'
import { delay, errorMessage } from './utils'
import type {
  InventoryRecord,
  ProvisionApi,
  ProvisionConfig,
  ProvisionOutcome,
  ProvisionResponse,
} from '@/types'

export type WorkerConfig = Pick<
  ProvisionConfig,
  'dryRun' | 'maxRetries' | 'timeoutMs' | 'endpoint' | 'credential' | 'backoff'
>

export interface WorkerDeps {
  api: ProvisionApi
  logger: Logger
  sleep?: (ms: number) => Promise<void>
  random?: () => number
}

function outcome(value: ProvisionOutcome): ProvisionOutcome {
  return Object.freeze(value)
}

function describeFailure(response: ProvisionResponse): string {
  if (response.error) return response.error
  if (response.statusCode) return `HTTP ${response.statusCode}`
  return 'Provisioning API reported failure'
}

/**
 * Provision one host. Attempts the API call up to `maxRetries + 1` times and
 * returns on the first success. Failures never escape as exceptions; the
 * last failure reason ends up in the outcome.
 */
export async function provisionHost(
  record: InventoryRecord,
  config: WorkerConfig,
  deps: WorkerDeps
): Promise<ProvisionOutcome> {
  const { hostname, address } = record
  const payload = { hostname, address }

  if (config.dryRun) {
    deps.logger.info(
      { hostname, address, payload, status: 'DryRun', attempts: 0 },
      `DRY-RUN: would call API for ${hostname} (${address})`
    )
    return outcome({ hostname, address, status: 'DryRun', attempts: 0 })
  }

  const maxAttempts = config.maxRetries + 1
  const backoff = config.backoff ? new RetryBackoff(config.backoff, deps.random) : null
  const sleep = deps.sleep ?? delay
  let lastError = ''

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1 && backoff?.enabled) {
      await sleep(backoff.delayFor(attempt - 1))
    }

    try {
      const response = await deps.api.provision({
        endpoint: config.endpoint,
        credential: config.credential,
        payload,
        timeoutMs: config.timeoutMs,
      })

      if (response.ok) {
        deps.logger.debug(
          { hostname, address, attempt, statusCode: response.statusCode },
          'Provisioning call succeeded'
        )
        return outcome({ hostname, address, status: 'Completed', attempts: attempt })
      }
      lastError = describeFailure(response)
    } catch (err) {
      lastError = errorMessage(err)
    }

    deps.logger.warn(
      { hostname, address, attempt, maxAttempts, error: lastError },
      `Provisioning attempt ${attempt}/${maxAttempts} failed for ${hostname} (${address})`
    )
  }

  return outcome({
    hostname,
    address,
    status: 'Failed',
    attempts: maxAttempts,
    error: lastError,
  })
}
