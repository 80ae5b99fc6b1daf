import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, statSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Vault } from './vault.js';

let tempDir = '';
const savedEnv = { ...process.env };

beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'parley-vault-'));
    process.env['PARLEY_HOME'] = join(tempDir, 'home');
    delete process.env['PARLEY_API_KEY'];
    delete process.env['GROQ_API_KEY'];
    Vault.clearCache();
});

afterEach(() => {
    process.env = { ...savedEnv };
    Vault.clearCache();
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
});

describe('Vault', () => {
    it('reads null when nothing is stored', () => {
        expect(Vault.exists()).toBe(false);
        expect(Vault.read()).toBeNull();
        expect(Vault.isConfigured()).toBe(false);
    });

    it('writes with owner-only permissions and reads back', () => {
        Vault.write(Vault.createDefault({ provider: { api_key: 'test-secret' }, default_model: 'llama-3.1-8b-instant' }));

        expect(statSync(Vault.configPath).mode & 0o777).toBe(0o600);
        expect(statSync(Vault.dir).mode & 0o777).toBe(0o700);

        Vault.clearCache();
        expect(Vault.read()).toEqual({
            version: 1,
            provider: { api_key: 'test-secret' },
            default_model: 'llama-3.1-8b-instant',
        });
        expect(Vault.isConfigured()).toBe(true);
    });

    it('serves reads from the cache until cleared', () => {
        Vault.write(Vault.createDefault({ default_model: 'a' }));
        writeFileSync(Vault.configPath, JSON.stringify({ version: 1, default_model: 'b' }));

        expect(Vault.read()?.default_model).toBe('a');
        Vault.clearCache();
        expect(Vault.read()?.default_model).toBe('b');
    });

    it('treats a file that fails the schema as absent', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        Vault.write(Vault.createDefault());
        writeFileSync(Vault.configPath, JSON.stringify({ version: 'one' }));
        Vault.clearCache();

        expect(Vault.read()).toBeNull();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('refuses to write an invalid config', () => {
        expect(() => Vault.write({ version: 1, agent: { max_iterations: -1 } })).toThrow();
    });

    it('counts an API key from the environment as configured', () => {
        process.env['GROQ_API_KEY'] = 'test-secret';
        expect(Vault.isConfigured()).toBe(true);
    });

    it('writes pretty JSON', () => {
        Vault.write(Vault.createDefault({ remote: { url: 'http://tools.test' } }));
        expect(readFileSync(Vault.configPath, 'utf-8')).toBe('{\n  "version": 1,\n  "remote": {\n    "url": "http://tools.test"\n  }\n}');
    });
});
