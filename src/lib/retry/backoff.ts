import type { BackoffPolicy } from '@/types'

/**
 * Exponential backoff with jitter between provisioning attempts.
 * A policy with baseDelayMs <= 0 never waits.
 */
export class RetryBackoff {
    constructor(
        private policy: BackoffPolicy,
        private random: () => number = Math.random,
    ) { }

    /** Delay before retry number `retry` (1 = the second attempt). */
    delayFor(retry: number): number {
        if (this.policy.baseDelayMs <= 0 || retry < 1) return 0

        const base = Math.min(this.policy.baseDelayMs * Math.pow(2, retry - 1), this.policy.maxDelayMs)
        const jitter = this.random() * base * this.policy.jitterFactor
        return Math.round(base + jitter)
    }


    get enabled(): boolean {
        return this.policy.baseDelayMs > 0
    }
}
