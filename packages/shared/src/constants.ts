/**
 * @parley/shared — Constants
 *
 * Central source of truth for ports, timeouts, and agent defaults
 * shared across the daemon and CLI processes.
 */

export const DEFAULT_PORT = 6610;
export const DEFAULT_HOST = '127.0.0.1';

export const APP_NAME = 'parley';
export const APP_VERSION = '0.1.0';

// ─── Model Provider ───────────────────────────────────────────────

/** Groq's OpenAI-compatible endpoint */
export const DEFAULT_PROVIDER_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_TEMPERATURE = 0.7;

// ─── Agent Loop Bounds ────────────────────────────────────────────

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_DEADLINE_MS = 30_000; // whole reasoning loop
export const DEFAULT_HISTORY_WINDOW = 10; // last N conversation messages replayed

// ─── Remote Tool Server ───────────────────────────────────────────

export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000; // per remote call
export const DEFAULT_REMOTE_CONCURRENCY = 4;
