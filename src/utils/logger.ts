import * as fs from 'node:fs/promises';
import path from 'node:path';
import { getConfigValue, parseBoolean } from '../config/config-loader.js';

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

export function isLoggingEnabled(): boolean {
    return parseBoolean(getConfigValue('FACTGRAPH_LOG_ENABLED')) ?? false;
}

export function getLogPath(date: string = currentDateIso()): string {
    const directory = getConfigValue('FACTGRAPH_LOG_DIR') ?? 'logs';
    return path.resolve(directory, `${date}.md`);
}

/**
 * Appends one timestamped line to the daily engine log.
 * Never rejects: write failures are reported on stderr.
 */
export async function logThought(message: string): Promise<void> {
    if (!isLoggingEnabled()) return;

    const now = new Date();
    const logPath = getLogPath(now.toISOString().slice(0, 10));
    const line = `- ${now.toISOString().slice(11, 19)} ${message.replace(/\s*\n\s*/g, ' ')}\n`;
    try {
        await fs.mkdir(path.dirname(logPath), { recursive: true });
        await fs.appendFile(logPath, line, 'utf8');
    } catch (err) {
        console.error(`[FactGraph Logs] Failed to write ${logPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
}
