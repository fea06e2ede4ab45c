import path from 'path';
import { logger } from '@retailops/service-template';

export interface GatewayConfig {
    port: number;
    serviceName: string;
    roleHeader: string;
    backend: {
        baseUrl: string;
        readTimeoutMs: number;
        writeTimeoutMs: number;
        maxRetries: number;
        retryBaseDelayMs: number;
        roleHeader: string;
    };
    previewTtlMs: number;
    ledgerRetentionMs: number;
    sweepIntervalMs: number;
    knowledge: {
        docsDir: string;
        baseUrl: string;
    };
}

const DEFAULT_DOCS_DIR = path.resolve(__dirname, '..', 'docs', 'knowledge');

const parseIntEnv = (env: NodeJS.ProcessEnv, name: string, fallback: number, minimum: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < minimum) {
        logger.warn(`Invalid ${name}='${raw}', using default ${fallback}`);
        return fallback;
    }
    return parsed;
};

const stringEnv = (env: NodeJS.ProcessEnv, name: string, fallback: string): string => {
    const raw = env[name];
    return raw && raw.trim() !== '' ? raw.trim() : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): GatewayConfig => ({
    port: parseIntEnv(env, 'PORT', 3007, 1),
    serviceName: stringEnv(env, 'SERVICE_NAME', 'tool-gateway'),
    roleHeader: stringEnv(env, 'ROLE_HEADER', 'x-retail-role').toLowerCase(),
    backend: {
        baseUrl: stringEnv(env, 'RETAIL_BACKEND_URL', 'http://retailcore:8080').replace(/\/+$/, ''),
        readTimeoutMs: parseIntEnv(env, 'BACKEND_READ_TIMEOUT_MS', 2000, 1),
        writeTimeoutMs: parseIntEnv(env, 'BACKEND_WRITE_TIMEOUT_MS', 8000, 1),
        maxRetries: parseIntEnv(env, 'BACKEND_MAX_RETRIES', 2, 0),
        retryBaseDelayMs: parseIntEnv(env, 'BACKEND_RETRY_BASE_DELAY_MS', 100, 1),
        roleHeader: stringEnv(env, 'BACKEND_ROLE_HEADER', 'X-DEMO-ROLE')
    },
    previewTtlMs: parseIntEnv(env, 'PREVIEW_TTL_SECONDS', 300, 1) * 1000,
    ledgerRetentionMs: parseIntEnv(env, 'LEDGER_RETENTION_SECONDS', 86400, 1) * 1000,
    sweepIntervalMs: parseIntEnv(env, 'SWEEP_INTERVAL_SECONDS', 60, 1) * 1000,
    knowledge: {
        docsDir: stringEnv(env, 'KNOWLEDGE_DOCS_DIR', DEFAULT_DOCS_DIR),
        baseUrl: stringEnv(env, 'KNOWLEDGE_BASE_URL', 'https://retail.internal/docs')
    }
});
