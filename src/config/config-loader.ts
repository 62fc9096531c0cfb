import * as fs from 'node:fs/promises';
import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import type { KnowledgeBaseOptions } from '../types/knowledge-base.js';

export interface FactGraphConfig {
    propagation: {
        recursionLimit: number;
        /** `null` means unbounded. */
        propagationLimit: number | null;
        maxChainLength: number;
        maxPendingNotifications: number;
    };
    resolution: {
        minIterations: number;
        growthExponent: number;
    };
    logging: {
        enabled: boolean;
        directory: string;
    };
}

export const DEFAULT_CONFIG: FactGraphConfig = {
    propagation: {
        recursionLimit: 1,
        propagationLimit: null,
        maxChainLength: 100_000,
        maxPendingNotifications: 1_000_000,
    },
    resolution: {
        minIterations: 100,
        growthExponent: 1.5,
    },
    logging: {
        enabled: false,
        directory: 'logs',
    },
};

export const CONFIG_FILE_NAME = 'factgraph.json';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.FACTGRAPH_CONFIG_PATH) {
        return path.resolve(process.env.FACTGRAPH_CONFIG_PATH);
    }
    return path.resolve(CONFIG_FILE_NAME);
}

export async function readConfig(overridePath?: string): Promise<FactGraphConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${fsError.message}`);
    }
    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

function mergeWithDefaults(loaded: unknown): FactGraphConfig {
    const config: FactGraphConfig = structuredClone(DEFAULT_CONFIG);
    if (!isRecord(loaded)) return config;

    const { propagation, resolution, logging } = loaded;
    if (isRecord(propagation)) {
        config.propagation.recursionLimit = numberOr(propagation.recursionLimit, config.propagation.recursionLimit);
        config.propagation.propagationLimit = propagation.propagationLimit === null
            ? null
            : numberOr(propagation.propagationLimit, config.propagation.propagationLimit);
        config.propagation.maxChainLength = numberOr(propagation.maxChainLength, config.propagation.maxChainLength);
        config.propagation.maxPendingNotifications = numberOr(
            propagation.maxPendingNotifications,
            config.propagation.maxPendingNotifications,
        );
    }
    if (isRecord(resolution)) {
        config.resolution.minIterations = numberOr(resolution.minIterations, config.resolution.minIterations);
        config.resolution.growthExponent = numberOr(resolution.growthExponent, config.resolution.growthExponent);
    }
    if (isRecord(logging)) {
        if (typeof logging.enabled === 'boolean') config.logging.enabled = logging.enabled;
        if (typeof logging.directory === 'string' && logging.directory.trim()) {
            config.logging.directory = logging.directory;
        }
    }

    return config;
}

// ── Flat key access ─────────────────────────────────────────────────────────

let cachedConfig: FactGraphConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): FactGraphConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[FactGraph Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

/**
 * Gets a configured value, environment variable first, then `factgraph.json`
 * merged over the defaults.
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();
    let jsonValue: unknown = undefined;

    switch (key) {
        case 'FACTGRAPH_RECURSION_LIMIT': jsonValue = config.propagation.recursionLimit; break;
        case 'FACTGRAPH_PROPAGATION_LIMIT': jsonValue = config.propagation.propagationLimit; break;
        case 'FACTGRAPH_MAX_CHAIN_LENGTH': jsonValue = config.propagation.maxChainLength; break;
        case 'FACTGRAPH_MAX_PENDING_NOTIFICATIONS': jsonValue = config.propagation.maxPendingNotifications; break;
        case 'FACTGRAPH_RESOLUTION_MIN_ITERATIONS': jsonValue = config.resolution.minIterations; break;
        case 'FACTGRAPH_RESOLUTION_GROWTH_EXPONENT': jsonValue = config.resolution.growthExponent; break;
        case 'FACTGRAPH_LOG_ENABLED': jsonValue = config.logging.enabled; break;
        case 'FACTGRAPH_LOG_DIR': jsonValue = config.logging.directory; break;
    }

    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }
    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }
    return undefined;
}

/** Engine limits from configuration; explicit overrides win. */
export function resolveKnowledgeBaseOptions(overrides: DeepPartial<KnowledgeBaseOptions> = {}): KnowledgeBaseOptions {
    return {
        propagation: {
            recursionLimit: overrides.propagation?.recursionLimit
                ?? parseLimit(getConfigValue('FACTGRAPH_RECURSION_LIMIT'))
                ?? DEFAULT_CONFIG.propagation.recursionLimit,
            propagationLimit: overrides.propagation?.propagationLimit
                ?? parseLimit(getConfigValue('FACTGRAPH_PROPAGATION_LIMIT'))
                ?? Infinity,
            maxChainLength: overrides.propagation?.maxChainLength
                ?? parseLimit(getConfigValue('FACTGRAPH_MAX_CHAIN_LENGTH'))
                ?? DEFAULT_CONFIG.propagation.maxChainLength,
            maxPendingNotifications: overrides.propagation?.maxPendingNotifications
                ?? parseLimit(getConfigValue('FACTGRAPH_MAX_PENDING_NOTIFICATIONS'))
                ?? DEFAULT_CONFIG.propagation.maxPendingNotifications,
        },
        resolution: {
            minIterations: overrides.resolution?.minIterations
                ?? parseLimit(getConfigValue('FACTGRAPH_RESOLUTION_MIN_ITERATIONS'))
                ?? DEFAULT_CONFIG.resolution.minIterations,
            growthExponent: overrides.resolution?.growthExponent
                ?? parsePositiveNumber(getConfigValue('FACTGRAPH_RESOLUTION_GROWTH_EXPONENT'))
                ?? DEFAULT_CONFIG.resolution.growthExponent,
        },
    };
}

export type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

/** Non-negative integer, or Infinity for `inf`/`infinity`. */
export function parseLimit(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'inf' || normalized === 'infinity') return Infinity;
    const parsed = Number(normalized);
    if (!Number.isFinite(parsed) || parsed < 0) return undefined;
    return Math.floor(parsed);
}

export function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
}

function parsePositiveNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function numberOr(value: unknown, fallback: number): number;
function numberOr(value: unknown, fallback: number | null): number | null;
function numberOr(value: unknown, fallback: number | null): number | null {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
