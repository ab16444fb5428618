export interface InventoryRecord {
  readonly hostname: string
  readonly address: string
}

export type DiagnosticKind = 'MalformedLine' | 'InvalidAddress' | 'EmptyField'

export interface ParseDiagnostic {
  readonly lineNumber: number
  readonly rawLine: string
  readonly kind: DiagnosticKind
  readonly reason: string
}

export interface ParseStats {
  totalLines: number
  /** Blank and comment lines */
  skipped: number
  /** Lines with an empty hostname or address that were not reported */
  dropped: number
}

export interface InventoryParseResult {
  records: InventoryRecord[]
  diagnostics: ParseDiagnostic[]
  stats: ParseStats
}

export type ProvisionStatus = 'DryRun' | 'Completed' | 'Failed'

export interface ProvisionOutcome {
  readonly hostname: string
  readonly address: string
  readonly status: ProvisionStatus
  readonly attempts: number
  readonly error?: string
}

export interface RunSummary {
  valid: number
  parseErrors: number
  completed: number
  failed: number
  dryRun: number
  workers: number
  durationMs: number
  /** Arrival order, not submission order */
  outcomes: ProvisionOutcome[]
}

export interface BackoffPolicy {
  baseDelayMs: number
  maxDelayMs: number
  jitterFactor: number
}

export interface ProvisionConfig {
  dryRun: boolean
  maxRetries: number
  timeoutMs: number
  endpoint: string
  credential: string
  concurrency: number
  backoff?: BackoffPolicy
}

export interface ProvisionPayload {
  hostname: string
  address: string
}

export interface ProvisionRequest {
  endpoint: string
  credential: string
  payload: ProvisionPayload
  timeoutMs: number
}

export interface ProvisionResponse {
  ok: boolean
  statusCode?: number
  body?: unknown
  error?: string
}

export interface ProvisionApi {
  provision(request: ProvisionRequest): Promise<ProvisionResponse>
}
