import { ZodError } from 'zod'
import { z } from 'zod'
import type { ProvisionConfig } from '@/types'

export function validateConfig(input: unknown): { data: ProvisionConfig } | { error: string[] } {
  try {
    const data = provisionConfigSchema.parse(input)
    return { data }
  } catch (err) {
    if (err instanceof ZodError) {
      return { error: err.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`) }
    }
    return { error: [err instanceof Error ? err.message : String(err)] }
  }
}

export const backoffPolicySchema = z.object({
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  jitterFactor: z.number().min(0).max(1),
})

export const provisionConfigSchema = z.object({
  dryRun: z.boolean().default(false),
  maxRetries: z.number().int().min(0, 'Retries cannot be negative'),
  timeoutMs: z.number().int().positive('Timeout must be positive'),
  endpoint: z.string().url('Invalid API URL'),
  credential: z.string().default(''),
  concurrency: z.number().int().min(1, 'Concurrency must be at least 1'),
  backoff: backoffPolicySchema.optional(),
})
