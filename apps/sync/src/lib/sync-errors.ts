// Raised by a destination when a mutation may or may not have been applied.
// The playlist's true order is unknown afterwards, so the run must stop.
export class AmbiguousStateError extends Error {
    constructor(message = 'Destination state is uncertain') {
        super(message);
        this.name = 'AmbiguousStateError';
    }
}

export class QuotaExhaustedError extends Error {
    constructor(message = 'Destination API quota exhausted') {
        super(message);
        this.name = 'QuotaExhaustedError';
    }
}

export class UpstreamFetchError extends Error {
    constructor(
        public readonly service: 'source' | 'destination',
        message: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'UpstreamFetchError';
    }
}

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
