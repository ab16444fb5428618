import type { ProvisionApi, ProvisionRequest, ProvisionResponse } from '@/types'
import { delay } from './utils'

const USER_AGENT = 'InventoryProvisioner/0.1'
const BODY_PREVIEW_LIMIT = 200

export interface SimulatedApiOptions {
  minLatencyMs?: number
  maxLatencyMs?: number
  /** Probability in [0, 1] that a call reports a 503 */
  failureRate?: number
  random?: () => number
  sleep?: (ms: number) => Promise<void>
}

function parseBody(raw: string): unknown {
  if (!raw) return undefined
  try {
    return JSON.parse(raw)
  } catch {
    return raw
  }
}

/**
 * Provisioning API over HTTP: POSTs the host payload as JSON, 2xx is success.
 * Network errors other than the timeout are thrown to the caller.
 */
export function createHttpProvisionApi(): ProvisionApi {
  return {
    async provision(request: ProvisionRequest): Promise<ProvisionResponse> {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
      }
      if (request.credential) {
        headers.Authorization = `Bearer ${request.credential}`
      }

      const controller = new AbortController()
      const timeout = setTimeout(() => controller.abort(), request.timeoutMs)

      try {
        const res = await fetch(request.endpoint, {
          method: 'POST',
          headers,
          body: JSON.stringify(request.payload),
          signal: controller.signal,
        })

        const raw = await res.text().catch(() => '')
        if (res.ok) {
          return { ok: true, statusCode: res.status, body: parseBody(raw) }
        }

        const preview = raw.trim().slice(0, BODY_PREVIEW_LIMIT)
        return {
          ok: false,
          statusCode: res.status,
          body: parseBody(raw),
          error: preview ? `HTTP ${res.status}: ${preview}` : `HTTP ${res.status}`,
        }
      } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') {
          return { ok: false, error: `Timeout (${request.timeoutMs}ms)` }
        }
        throw err
      } finally {
        clearTimeout(timeout)
      }
    },
  }
}

/** Stand-in API for rehearsals: random latency, optional simulated outages. */
export function createSimulatedProvisionApi(options: SimulatedApiOptions = {}): ProvisionApi {
  const {
    minLatencyMs = 50,
    maxLatencyMs = 600,
    failureRate = 0,
    random = Math.random,
    sleep = delay,
  } = options

  return {
    async provision(request: ProvisionRequest): Promise<ProvisionResponse> {
      const latency = Math.round(minLatencyMs + random() * (maxLatencyMs - minLatencyMs))
      await sleep(Math.min(latency, request.timeoutMs))

      if (latency > request.timeoutMs) {
        return { ok: false, error: `Timeout (${request.timeoutMs}ms)` }
      }
      if (random() < failureRate) {
        return { ok: false, statusCode: 503, error: 'HTTP 503: simulated outage' }
      }
      return {
        ok: true,
        statusCode: 200,
        body: { message: 'provisioned', payload: request.payload },
      }
    },
  }
}
