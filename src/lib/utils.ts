import type { ProvisionOutcome, RunSummary } from '@/types'

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000)
  const minutes = Math.floor(seconds / 60)
  const hours = Math.floor(minutes / 60)

  if (hours > 0) return `${hours}h ${minutes % 60}m`
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`
  if (seconds > 0) return `${seconds}s`
  return `${milliseconds}ms`
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function formatOutcome(outcome: ProvisionOutcome): string {
  const base = `${outcome.hostname} (${outcome.address}) ${outcome.status} after ${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'}`
  return outcome.error ? `${base}: ${outcome.error}` : base
}

export function formatSummary(summary: RunSummary): string {
  return [
    `${summary.valid} valid`,
    `${summary.parseErrors} parse error${summary.parseErrors === 1 ? '' : 's'}`,
    `${summary.completed} completed`,
    `${summary.failed} failed`,
    `${summary.dryRun} dry-run`,
  ].join(', ') + ` in ${formatDuration(summary.durationMs)}`
}
