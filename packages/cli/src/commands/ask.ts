/**
 * @parley/cli — Ask Command
 *
 * Sends one question to the running daemon and prints the answer.
 * With --verbose, every reasoning step is shown as it happens.
 *
 * Usage: parley ask [--model <id>] [--verbose] <question...>
 */

import { randomUUID } from 'node:crypto';
import pc from 'picocolors';
import type { DaemonMessage } from '@parley/shared';
import type { CliOptions } from '../args.js';
import { exchange } from '../infra/ws-client.js';
import { daemonUrl } from './daemon.js';

/** Generous upper bound; the daemon enforces its own deadline */
const ANSWER_TIMEOUT_MS = 5 * 60_000;

function indent(text: string): string {
    return text.split('\n').map((line) => `     ${line}`).join('\n');
}

export function renderProgress(message: DaemonMessage, verbose: boolean): string | null {
    switch (message.type) {
        case 'chat:tool:call':
            return pc.dim(`  🔧 ${message.payload.toolName} ${message.payload.input}`);
        case 'chat:tool:result':
            return message.payload.success
                ? (verbose ? pc.dim(`  ✅ ${message.payload.toolName}\n${indent(message.payload.result)}`) : null)
                : pc.yellow(`  ⚠️  ${message.payload.toolName}: ${message.payload.result}`);
        case 'chat:step':
            return verbose && message.payload.thought ? pc.dim(`  💭 ${message.payload.thought}`) : null;
        case 'log':
            return message.payload.level === 'debug' ? null : pc.dim(`  [${message.payload.source}] ${message.payload.message}`);
        default:
            return null;
    }
}

export async function askCommand(question: string, options: CliOptions): Promise<number> {
    if (question.trim() === '') {
        console.log(pc.red('\n❌ Nothing to ask. Usage: parley ask <question>\n'));
        return 1;
    }

    const final = await exchange({
        url: daemonUrl(options),
        request: {
            type: 'chat:request',
            timestamp: new Date().toISOString(),
            payload: {
                requestId: randomUUID(),
                message: question,
                ...(options.model ? { model: options.model } : {}),
            },
        },
        onMessage: (message) => {
            const line = renderProgress(message, options.verbose);
            if (line) console.log(line);
        },
        timeoutMs: ANSWER_TIMEOUT_MS,
    });

    if (final.type === 'chat:error') {
        console.log(pc.red(`\n❌ ${final.payload.error}\n`));
        return 1;
    }
    if (final.type !== 'chat:done') return 1;

    const { status, text, model, iterations } = final.payload;
    if (status === 'finished') {
        console.log(`\n${text}\n`);
        console.log(pc.dim(`  ${model} · ${iterations} step${iterations === 1 ? '' : 's'}\n`));
        return 0;
    }

    console.log(pc.yellow(`\n⚠️  ${text}\n`));
    console.log(pc.dim(`  ${final.payload.failureReason ?? 'failed'} · ${model || 'no model'} · ${iterations} steps\n`));
    return 1;
}
