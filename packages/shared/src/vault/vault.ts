/**
 * @parley/shared — The Vault
 *
 * Manages persistent configuration stored in ~/.parley/config.json.
 * This is the single source of truth for the model provider key,
 * default model, agent loop bounds, and the remote tool server URL.
 *
 * Security: directory is created with 0o700 (owner only),
 * config file with 0o600 (owner read/write only).
 *
 * Set PARLEY_HOME to relocate the directory (tests, multiple profiles).
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';

// ─── Schema ───────────────────────────────────────────────────────

const ProviderSchema = z.object({
    /** OpenAI-compatible base URL (Groq by default) */
    base_url: z.string().url().optional(),
    api_key: z.string().min(1).optional(),
});

const AgentSchema = z.object({
    max_iterations: z.number().int().positive().optional(),
    deadline_ms: z.number().int().positive().optional(),
    history_window: z.number().int().nonnegative().optional(),
    temperature: z.number().min(0).max(2).optional(),
});

const RemoteSchema = z.object({
    /** Base URL of the remote tool server; empty disables remote tools */
    url: z.string().optional(),
    timeout_ms: z.number().int().positive().optional(),
    max_concurrent: z.number().int().positive().optional(),
});

export const VaultConfigSchema = z.object({
    /** Schema version for future migrations */
    version: z.number().int(),
    provider: ProviderSchema.optional(),
    default_model: z.string().optional(),
    agent: AgentSchema.optional(),
    remote: RemoteSchema.optional(),
});

export type VaultConfig = z.infer<typeof VaultConfigSchema>;

// ─── Constants ────────────────────────────────────────────────────

const CURRENT_VERSION = 1;

function vaultDir(): string {
    return process.env['PARLEY_HOME'] || join(homedir(), '.parley');
}

// ─── Vault Class ──────────────────────────────────────────────────

export class Vault {
    /** In-memory cache to avoid repeated disk reads */
    private static cache: VaultConfig | null | undefined = undefined;

    /** Path to the vault directory */
    static get dir(): string {
        return vaultDir();
    }

    /** Path to the config file */
    static get configPath(): string {
        return join(vaultDir(), 'config.json');
    }

    /** Check if the config file exists on disk */
    static exists(): boolean {
        return existsSync(this.configPath);
    }

    /** Read config from disk (with in-memory cache). Invalid files read as null. */
    static read(): VaultConfig | null {
        if (this.cache !== undefined) return this.cache;

        if (!this.exists()) {
            this.cache = null;
            return null;
        }

        try {
            const raw: unknown = JSON.parse(readFileSync(this.configPath, 'utf-8'));
            const parsed = VaultConfigSchema.safeParse(raw);
            if (!parsed.success) {
                console.warn(`  ⚠️ [vault] Ignoring invalid config at ${this.configPath}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
                this.cache = null;
                return null;
            }
            this.cache = parsed.data;
            return parsed.data;
        } catch (err) {
            console.warn(`  ⚠️ [vault] Could not read ${this.configPath}:`, err instanceof Error ? err.message : err);
            this.cache = null;
            return null;
        }
    }

    /** Write config to disk and update cache */
    static write(config: VaultConfig): void {
        const valid = VaultConfigSchema.parse(config);
        if (!existsSync(this.dir)) {
            mkdirSync(this.dir, { recursive: true, mode: 0o700 });
        }

        writeFileSync(this.configPath, JSON.stringify(valid, null, 2), {
            encoding: 'utf-8',
            mode: 0o600,
        });

        this.cache = valid;
    }

    /** True when a provider API key is available from the vault or the environment */
    static isConfigured(): boolean {
        if (process.env['PARLEY_API_KEY'] || process.env['GROQ_API_KEY']) return true;
        return !!this.read()?.provider?.api_key;
    }

    /** Clear the in-memory cache (forces next read from disk) */
    static clearCache(): void {
        this.cache = undefined;
    }

    /** Get the current schema version */
    static get schemaVersion(): number {
        return CURRENT_VERSION;
    }

    /** Create a default config object */
    static createDefault(overrides?: Partial<VaultConfig>): VaultConfig {
        return {
            version: CURRENT_VERSION,
            ...overrides,
        };
    }
}
