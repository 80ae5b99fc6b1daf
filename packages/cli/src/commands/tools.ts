/**
 * @parley/cli — Tools Command
 *
 * Lists the tools an agent session would see: the local ones plus
 * whatever the configured remote server offers right now.
 *
 * Usage: parley tools
 */

import { randomUUID } from 'node:crypto';
import pc from 'picocolors';
import type { ToolCatalogEntry } from '@parley/shared';
import type { CliOptions } from '../args.js';
import { exchange } from '../infra/ws-client.js';
import { daemonUrl } from './daemon.js';

export function formatTool(tool: ToolCatalogEntry): string {
    const params = Object.entries(tool.parameters)
        .map(([name, spec]) => (spec.required ? name : `${name}?`))
        .join(', ');
    const badge = tool.kind === 'remote' ? pc.magenta('remote') : pc.cyan('local ');
    return `  ${badge}  ${pc.bold(tool.name)}(${params})\n          ${pc.dim(tool.description)}`;
}

export async function toolsCommand(options: CliOptions): Promise<number> {
    const reply = await exchange({
        url: daemonUrl(options),
        request: {
            type: 'tools:list',
            timestamp: new Date().toISOString(),
            payload: { requestId: randomUUID() },
        },
        timeoutMs: 60_000,
    });

    if (reply.type !== 'tools:catalog') {
        console.log(pc.red(`\n❌ ${reply.type === 'chat:error' ? reply.payload.error : 'Unexpected reply from the daemon'}\n`));
        return 1;
    }

    const { tools, remoteCatalogUnavailable, remoteError } = reply.payload;
    console.log(`\n${pc.bold('Tools')} ${pc.dim(`(${tools.length})`)}\n`);
    for (const tool of tools) console.log(formatTool(tool));

    if (remoteCatalogUnavailable) {
        console.log(pc.yellow(`\n  ⚠️  Remote tools unavailable${remoteError ? `: ${remoteError}` : ''}`));
    } else if (remoteError) {
        console.log(pc.dim(`\n  ${remoteError}`));
    }
    console.log('');
    return 0;
}
