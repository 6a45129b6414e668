import Bottleneck from "bottleneck";
import type { ProviderLimitsConfig } from "../config/types";

const ONE_MINUTE_MS = 60_000;

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

/**
 * Limiter allowing `concurrency` jobs at once and, when `perMinute` is set,
 * at most that much weight per rolling minute.
 */
export function createRateLimiter(concurrency: number, perMinute?: number): Bottleneck {
    const maxConcurrent = Math.max(1, concurrency);

    if (!perMinute || !Number.isFinite(perMinute)) {
        return new Bottleneck({ maxConcurrent });
    }

    const amount = Math.max(1, Math.floor(perMinute));
    return new Bottleneck({
        maxConcurrent,
        reservoir: amount,
        reservoirRefreshAmount: amount,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    });
}

export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const merged: ProviderRateLimits = { ...defaults };
    for (const [key, value] of Object.entries(override)) {
        if (value !== undefined && isLimitKey(key)) {
            merged[key] = value;
        }
    }
    return merged;
}

const LIMIT_KEYS = ["batchSize", "concurrency", "maxRequestsPerMinute", "maxTokensPerMinute", "retries"] as const;

function isLimitKey(key: string): key is (typeof LIMIT_KEYS)[number] {
    return LIMIT_KEYS.some((known) => known === key);
}

export function splitIntoBatches<T>(items: T[], batchSize: number): T[][] {
    if (batchSize <= 0) {
        throw new Error("batchSize must be > 0");
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
        batches.push(items.slice(i, i + batchSize));
    }
    return batches;
}

export function resolveBaseUrl(url: string | undefined): string | undefined {
    if (!url) {
        return undefined;
    }
    return url.endsWith("/") ? url.slice(0, -1) : url;
}
