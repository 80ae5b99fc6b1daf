/**
 * @parley/cli — Config Command
 *
 * Usage:
 *   parley config         — run the configuration wizard
 *   parley config show    — print the stored configuration (key masked)
 *   parley config reset   — delete the stored configuration
 */

import { existsSync, rmSync } from 'node:fs';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { Vault, type VaultConfig } from '@parley/shared';
import { runOnboardingWizard } from '../wizard/onboarding.js';

export function maskSecret(secret: string): string {
    return secret.length > 8 ? `${secret.slice(0, 4)}…${secret.slice(-4)}` : '****';
}

/** The config as shown to the user: same shape, API key masked */
export function redactConfig(config: VaultConfig): VaultConfig {
    const apiKey = config.provider?.api_key;
    if (!config.provider || apiKey === undefined) return config;
    return { ...config, provider: { ...config.provider, api_key: maskSecret(apiKey) } };
}

/** Remove the config file; returns whether there was one */
export function resetConfiguration(): boolean {
    const existed = existsSync(Vault.configPath);
    if (existed) rmSync(Vault.configPath);
    Vault.clearCache();
    return existed;
}

export async function configCommand(args: readonly string[]): Promise<number> {
    const [sub] = args;

    switch (sub) {
        case undefined: {
            const saved = await runOnboardingWizard();
            return saved ? 0 : 1;
        }

        case 'show': {
            const config = Vault.read();
            if (!config) {
                console.log(pc.dim(`\n  No configuration at ${Vault.configPath}. Run "parley config".\n`));
                return 0;
            }
            console.log(`\n${pc.bold('Vault')} ${pc.dim(Vault.configPath)}\n`);
            console.log(JSON.stringify(redactConfig(config), null, 2));
            console.log('');
            return 0;
        }

        case 'reset': {
            const confirmed = await p.confirm({ message: `Delete ${Vault.configPath}?`, initialValue: false });
            if (p.isCancel(confirmed) || !confirmed) {
                p.cancel('Nothing deleted.');
                return 1;
            }
            const existed = resetConfiguration();
            console.log(existed ? pc.green('  ✅ Configuration deleted.\n') : pc.dim('  No configuration to delete.\n'));
            return 0;
        }

        default:
            console.log(pc.red(`\n❌ Unknown config subcommand: ${sub}`));
            console.log(pc.dim('   Use: parley config [show|reset]\n'));
            return 1;
    }
}
