/**
 * @parley/cli — Configuration Wizard
 *
 * Interactive step-by-step configuration assistant using @clack/prompts.
 * Persists everything to the Vault (~/.parley/config.json).
 *
 * Flow: API key → Endpoint → Default model → Remote tools → Loop bounds → Save
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import {
    Vault,
    KNOWN_MODELS,
    DEFAULT_MODEL_ID,
    DEFAULT_PROVIDER_BASE_URL,
    DEFAULT_MAX_ITERATIONS,
    DEFAULT_DEADLINE_MS,
    type VaultConfig,
} from '@parley/shared';

export interface WizardAnswers {
    /** Blank keeps the stored key */
    apiKey: string;
    baseUrl: string;
    defaultModel: string;
    /** Blank disables remote tools */
    remoteUrl: string;
    maxIterations: number;
    deadlineSeconds: number;
}

/** Merge wizard answers over an existing config; pure, so it can be tested without prompts */
export function applyWizardAnswers(existing: VaultConfig | null, answers: WizardAnswers): VaultConfig {
    const base = existing ?? Vault.createDefault();
    const apiKey = answers.apiKey.trim() || base.provider?.api_key;
    const baseUrl = answers.baseUrl.trim();
    const remoteUrl = answers.remoteUrl.trim();

    const { remote: previousRemote, ...rest } = base;
    const remote = remoteUrl ? { ...previousRemote, url: remoteUrl } : previousRemote ? { ...previousRemote, url: undefined } : undefined;

    return {
        ...rest,
        provider: {
            ...(baseUrl && baseUrl !== DEFAULT_PROVIDER_BASE_URL ? { base_url: baseUrl } : {}),
            ...(apiKey ? { api_key: apiKey } : {}),
        },
        default_model: answers.defaultModel,
        agent: {
            ...base.agent,
            max_iterations: answers.maxIterations,
            deadline_ms: answers.deadlineSeconds * 1000,
        },
        ...(remote ? { remote } : {}),
    };
}

function positiveInt(value: string): string | undefined {
    return /^\d+$/.test(value.trim()) && Number(value) > 0 ? undefined : 'Enter a positive whole number';
}

// ─── Wizard ───────────────────────────────────────────────────────

export async function runOnboardingWizard(): Promise<boolean> {
    p.intro(pc.bgCyan(pc.black(' 🗣️  parley — Configuration Wizard ')));

    const existing = Vault.read();
    if (existing) {
        p.note(
            `Default model: ${pc.bold(existing.default_model ?? DEFAULT_MODEL_ID)}\n` +
            `Remote tools: ${pc.bold(existing.remote?.url ?? 'none')}\n` +
            `Vault: ${pc.dim(Vault.configPath)}`,
            '⚙️  Existing configuration detected',
        );
    }

    const apiKey = await p.password({
        message: existing?.provider?.api_key
            ? 'Model provider API key (leave blank to keep the current one)'
            : 'Model provider API key (Groq or any OpenAI-compatible endpoint)',
        validate: (value) => (!value && !existing?.provider?.api_key ? 'An API key is required' : undefined),
    });
    if (p.isCancel(apiKey)) return cancelled();

    const baseUrl = await p.text({
        message: 'OpenAI-compatible base URL',
        initialValue: existing?.provider?.base_url ?? DEFAULT_PROVIDER_BASE_URL,
        validate: (value) => (/^https?:\/\//.test(value) ? undefined : 'Enter an http(s) URL'),
    });
    if (p.isCancel(baseUrl)) return cancelled();

    const defaultModel = await p.select({
        message: 'Default model',
        initialValue: existing?.default_model ?? DEFAULT_MODEL_ID,
        options: KNOWN_MODELS.map((model) => ({
            value: model.id,
            label: model.label,
            hint: model.fallbackChain.length > 0 ? `falls back to ${model.fallbackChain.join(' → ')}` : 'no fallback',
        })),
    });
    if (p.isCancel(defaultModel)) return cancelled();

    const remoteUrl = await p.text({
        message: 'Remote tool server URL (leave blank for none)',
        initialValue: existing?.remote?.url ?? '',
        validate: (value) => (value === '' || /^https?:\/\//.test(value) ? undefined : 'Enter an http(s) URL or leave blank'),
    });
    if (p.isCancel(remoteUrl)) return cancelled();

    const maxIterations = await p.text({
        message: 'Maximum reasoning steps per question',
        initialValue: String(existing?.agent?.max_iterations ?? DEFAULT_MAX_ITERATIONS),
        validate: positiveInt,
    });
    if (p.isCancel(maxIterations)) return cancelled();

    const deadlineSeconds = await p.text({
        message: 'Time limit per question (seconds)',
        initialValue: String(Math.round((existing?.agent?.deadline_ms ?? DEFAULT_DEADLINE_MS) / 1000)),
        validate: positiveInt,
    });
    if (p.isCancel(deadlineSeconds)) return cancelled();

    const config = applyWizardAnswers(existing, {
        apiKey,
        baseUrl,
        defaultModel,
        remoteUrl,
        maxIterations: Number(maxIterations),
        deadlineSeconds: Number(deadlineSeconds),
    });

    const spinner = p.spinner();
    spinner.start('Saving configuration...');
    Vault.write(config);
    spinner.stop(`Saved to ${Vault.configPath}`);

    p.outro(pc.green('✅ Configuration complete. Run "parley daemon" to start.'));
    return true;
}

function cancelled(): false {
    p.cancel('Configuration cancelled.');
    return false;
}
