export const config = {
  apiUrl: process.env.PROVISION_API_URL || 'https://api.example.local/',
  apiKey: process.env.PROVISION_API_KEY || '',
  concurrency: Number(process.env.PROVISION_CONCURRENCY || '12'),
  retries: Number(process.env.PROVISION_RETRIES || '3'),
  timeoutMs: Number(process.env.PROVISION_TIMEOUT_MS || '10000'),
  // Backoff between attempts. baseDelayMs = 0 retries immediately.
  backoff: {
    baseDelayMs: Number(process.env.PROVISION_BACKOFF_BASE_MS || '0'),
    maxDelayMs: Number(process.env.PROVISION_BACKOFF_MAX_MS || '30000'),
    jitterFactor: Number(process.env.PROVISION_BACKOFF_JITTER || '0.5'),
  },
}
