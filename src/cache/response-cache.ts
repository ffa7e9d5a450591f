import { mkdirSync, existsSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

/**
 * Simple file-system cache for judgment responses.
 * Stores JSON files in a configurable cache directory.
 *
 * Cache key = SHA-256 of the request identity (provider, model, prompt).
 * TTL = 30 days by default.
 */
export class ResponseCache {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? join('.grantmap', 'cache');
        this.ttlMs = (options.ttlHours ?? 24 * 30) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    /**
     * Generate a deterministic cache key.
     */
    private makeKey(identity: string): string {
        return createHash('sha256').update(identity).digest('hex');
    }

    /**
     * Get a cached entry, or null if not found/expired/unreadable.
     */
    get(identity: string): unknown {
        if (!this.enabled) return null;

        const filePath = join(this.cacheDir, `${this.makeKey(identity)}.json`);
        if (!existsSync(filePath)) return null;

        try {
            const entry: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
            if (!isCacheEntry(entry)) return null;

            // Check TTL
            if (Date.now() - entry.timestamp > this.ttlMs) {
                getLogger().debug({ key: identity.slice(0, 80) }, 'Cache expired');
                return null;
            }

            getLogger().debug({ key: identity.slice(0, 80) }, 'Cache hit');
            return entry.data;
        } catch (error) {
            getLogger().debug({ error, filePath }, 'Unreadable cache entry ignored');
            return null;
        }
    }

    /**
     * Store an entry in the cache.
     */
    set(identity: string, data: unknown): void {
        if (!this.enabled) return;

        const filePath = join(this.cacheDir, `${this.makeKey(identity)}.json`);

        try {
            const entry = {
                timestamp: Date.now(),
                key: identity.slice(0, 200), // Truncated identity for debugging
                data,
            };
            writeFileSync(filePath, JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Check if an identity is cached and not expired.
     */
    has(identity: string): boolean {
        return this.get(identity) !== null;
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) mkdirSync(this.cacheDir, { recursive: true });
    }

    /**
     * Get cache stats.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;

        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.json')) continue;
                entries++;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries,
            bytes,
        };
    }
}

function isCacheEntry(value: unknown): value is { timestamp: number; data: unknown } {
    return (
        typeof value === 'object' &&
        value !== null &&
        'timestamp' in value &&
        typeof value.timestamp === 'number' &&
        'data' in value
    );
}
