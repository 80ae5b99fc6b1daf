/**
 * @parley/daemon — Runtime Configuration
 *
 * Resolves provider credentials, agent loop bounds and the remote tool
 * server from the Vault (~/.parley/config.json), with environment
 * variables taking precedence.
 *
 * All functions read from the vault on each call so that config changes
 * (e.g. via `parley config`) take effect without a daemon restart.
 */

import {
    Vault,
    DEFAULT_PROVIDER_BASE_URL,
    DEFAULT_MODEL_ID,
    DEFAULT_TEMPERATURE,
    DEFAULT_MAX_ITERATIONS,
    DEFAULT_DEADLINE_MS,
    DEFAULT_HISTORY_WINDOW,
    DEFAULT_REMOTE_TIMEOUT_MS,
    DEFAULT_REMOTE_CONCURRENCY,
    DEFAULT_PORT,
    DEFAULT_HOST,
} from '@parley/shared';
import type { AgentLimits } from '../core/agent-orchestrator.js';

type Env = Readonly<Record<string, string | undefined>>;

function envValue(env: Env, ...names: string[]): string | undefined {
    for (const name of names) {
        const value = env[name]?.trim();
        if (value) return value;
    }
    return undefined;
}

function envInt(env: Env, name: string): number | undefined {
    const raw = envValue(env, name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        console.warn(`  ⚠️ [config] Ignoring ${name}="${raw}" (expected a positive integer)`);
        return undefined;
    }
    return value;
}

// ─── Provider ─────────────────────────────────────────────────────

export interface ProviderConfig {
    baseURL: string;
    apiKey?: string;
    defaultModel: string;
}

export function getProviderConfig(env: Env = process.env): ProviderConfig {
    const config = Vault.read();
    const apiKey = envValue(env, 'PARLEY_API_KEY', 'GROQ_API_KEY') ?? config?.provider?.api_key;
    return {
        baseURL: envValue(env, 'PARLEY_BASE_URL') ?? config?.provider?.base_url ?? DEFAULT_PROVIDER_BASE_URL,
        ...(apiKey ? { apiKey } : {}),
        defaultModel: envValue(env, 'PARLEY_MODEL') ?? config?.default_model ?? DEFAULT_MODEL_ID,
    };
}

// ─── Agent ────────────────────────────────────────────────────────

export function getAgentLimits(): AgentLimits {
    const agent = Vault.read()?.agent;
    return {
        maxIterations: agent?.max_iterations ?? DEFAULT_MAX_ITERATIONS,
        deadlineMs: agent?.deadline_ms ?? DEFAULT_DEADLINE_MS,
        historyWindow: agent?.history_window ?? DEFAULT_HISTORY_WINDOW,
        temperature: agent?.temperature ?? DEFAULT_TEMPERATURE,
        remoteTimeoutMs: getRemoteConfig().timeoutMs,
    };
}

// ─── Remote Tool Server ───────────────────────────────────────────

export interface RemoteConfig {
    /** Undefined when no remote server is configured */
    url?: string;
    timeoutMs: number;
    maxConcurrent: number;
}

export function getRemoteConfig(env: Env = process.env): RemoteConfig {
    const remote = Vault.read()?.remote;
    const url = envValue(env, 'MCP_SERVER_URL') ?? remote?.url?.trim();
    return {
        ...(url ? { url } : {}),
        timeoutMs: remote?.timeout_ms ?? DEFAULT_REMOTE_TIMEOUT_MS,
        maxConcurrent: remote?.max_concurrent ?? DEFAULT_REMOTE_CONCURRENCY,
    };
}

// ─── Daemon ───────────────────────────────────────────────────────

export function getListenConfig(env: Env = process.env): { host: string; port: number } {
    return {
        host: envValue(env, 'PARLEY_HOST') ?? DEFAULT_HOST,
        port: envInt(env, 'PARLEY_PORT') ?? DEFAULT_PORT,
    };
}

// ─── Validation ───────────────────────────────────────────────────

export interface ProviderValidation {
    valid: boolean;
    error?: string;
}

export function validateProviderConfig(env: Env = process.env): ProviderValidation {
    if (!getProviderConfig(env).apiKey) {
        return { valid: false, error: 'No model provider API key configured. Run: parley config (or set GROQ_API_KEY)' };
    }
    return { valid: true };
}
