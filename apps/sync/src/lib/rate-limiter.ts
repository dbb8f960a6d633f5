import type { Logger } from './logger';

export interface RateLimiterConfig {
    initialRate: number;      // Requests per second
    minRate: number;          // Minimum rate after backoff
    burstCapacity: number;    // Max tokens in bucket
    recoveryFactor: number;   // Rate increase factor after success streak
    successStreakThreshold: number; // Successes before rate recovery
}

export interface RateLimiterDeps {
    logger: Logger;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
    initialRate: 2,           // Two calls per second, the pace YouTube tolerates for writes
    minRate: 0.2,
    burstCapacity: 1,         // Mutations are never bursted
    recoveryFactor: 1.25,
    successStreakThreshold: 20,
};

function defaultSleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// Token bucket that halves its rate on every rate-limit response and creeps
// back up after a streak of successes
export class AdaptiveRateLimiter {
    private tokens: number;
    private lastRefill: number;
    private currentRate: number;
    private successStreak = 0;
    private pauseUntil = 0;
    private readonly config: RateLimiterConfig;
    private readonly log: Logger;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(deps: RateLimiterDeps, config: Partial<RateLimiterConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.log = deps.logger;
        this.now = deps.now ?? Date.now;
        this.sleep = deps.sleep ?? defaultSleep;
        this.tokens = this.config.burstCapacity;
        this.lastRefill = this.now();
        this.currentRate = this.config.initialRate;
    }

    private refillTokens(): void {
        const now = this.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.config.burstCapacity, this.tokens + elapsed * this.currentRate);
        this.lastRefill = now;
    }

    async acquire(): Promise<void> {
        const pausedFor = this.pauseUntil - this.now();
        if (pausedFor > 0) {
            this.log.info({ waitTime: pausedFor }, 'Rate limiter paused, waiting...');
            await this.sleep(pausedFor);
        }

        this.refillTokens();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitTime = ((1 - this.tokens) / this.currentRate) * 1000;
        this.log.debug({ waitTime, currentRate: this.currentRate }, 'Rate limiter waiting for token');
        await this.sleep(waitTime);

        this.refillTokens();
        this.tokens = Math.max(0, this.tokens - 1);
    }

    recordSuccess(): void {
        this.successStreak++;

        if (this.successStreak >= this.config.successStreakThreshold) {
            const newRate = Math.min(this.config.initialRate, this.currentRate * this.config.recoveryFactor);
            if (newRate > this.currentRate) {
                this.log.info(
                    { oldRate: this.currentRate, newRate },
                    'Rate limiter recovering rate after success streak'
                );
                this.currentRate = newRate;
            }
            this.successStreak = 0;
        }
    }

    handleRateLimit(retryAfterSeconds: number): void {
        this.successStreak = 0;
        this.pauseUntil = this.now() + retryAfterSeconds * 1000;

        const newRate = Math.max(this.config.minRate, this.currentRate / 2);
        this.log.warn(
            {
                retryAfterSeconds,
                oldRate: this.currentRate,
                newRate,
                pauseUntil: new Date(this.pauseUntil).toISOString(),
            },
            'Rate limiter backing off after rate limit'
        );
        this.currentRate = newRate;
    }

    getState(): { currentRate: number; tokens: number; isPaused: boolean } {
        this.refillTokens();
        return {
            currentRate: this.currentRate,
            tokens: this.tokens,
            isPaused: this.pauseUntil > this.now(),
        };
    }
}
