import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export const DEFAULT_API_BASE = 'https://app.buhologistics.com/api/global/beta/shipments/';
export const DEFAULT_API_VERSION = '2020-10';

// Last-resort token for single-user local runs. Never fill this in for a shared deployment;
// use SHIPSTREAM_AUTH_TOKEN or --token instead.
export const FALLBACK_AUTH_TOKEN = '';

export interface ShipStreamConfig {
    baseUrl: string;
    apiVersion: string;
    authToken: string;
}

export interface AppConfig {
    nodeEnv: string;
    requestTimeoutMs: number;
    shipstream: ShipStreamConfig;
}
function readEnv(key: string, fallback?: string): string {
    const val = process.env[key] ?? fallback;
    if (val === undefined) {
        throw new Error(
            `Missing required environment variable: ${key}. ` +
            `Check your .env file or environment.`
        );
    }
    return val;
}

function readTimeoutMs(): number {
    const raw = readEnv('REQUEST_TIMEOUT_MS', '30000');
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed) || parsed <= 0) {
        throw new Error(`REQUEST_TIMEOUT_MS must be a positive number of milliseconds, got "${raw}"`);
    }
    return parsed;
}

export function loadConfig(): AppConfig {
    return {
        nodeEnv: readEnv('NODE_ENV', 'development'),
        requestTimeoutMs: readTimeoutMs(),
        shipstream: {
            baseUrl: readEnv('SHIPSTREAM_API_BASE', DEFAULT_API_BASE),
            apiVersion: readEnv('SHIPSTREAM_API_VERSION', DEFAULT_API_VERSION),
            authToken: readEnv('SHIPSTREAM_AUTH_TOKEN', FALLBACK_AUTH_TOKEN),
        },
    };
}

/** Explicit override (the --token flag) wins over the configured secret. Empty when neither is set. */
export function resolveAuthToken(override: string | undefined, configured: string): string {
    const explicit = override?.trim() ?? '';
    if (explicit) return explicit;
    return configured.trim();
}
