/**
 * @parley/cli — Command Router
 *
 * Parses CLI arguments and routes to the appropriate command handler.
 * Entry point for the `parley` command.
 *
 * Usage:
 *   parley daemon            — Start the daemon
 *   parley ask <question>    — Ask the running daemon
 *   parley tools             — List available tools
 *   parley config            — Run the configuration wizard
 *   parley help              — Show available commands
 */

import pc from 'picocolors';
import { APP_NAME, APP_VERSION } from '@parley/shared';
import { parseArgs } from './args.js';
import { DaemonUnreachableError } from './infra/ws-client.js';

function showHelp(): void {
    console.log(`
${pc.bold(pc.cyan(`🗣️  ${APP_NAME}`))} ${pc.dim(`v${APP_VERSION}`)}
${pc.dim('Conversational agent that reasons step by step with local and remote tools')}

${pc.bold('Usage:')}
  ${pc.cyan('parley')} ${pc.yellow('<command>')} ${pc.dim('[options]')}

${pc.bold('Commands:')}
  ${pc.yellow('daemon')}   Starts the daemon (background; ${pc.dim('--foreground')} to stay attached)
  ${pc.yellow('stop')}     Stops the background daemon
  ${pc.yellow('ask')}      Asks a question ${pc.dim('(--model <id>, --verbose)')}
  ${pc.yellow('tools')}    Lists the tools the agent can use
  ${pc.yellow('config')}   Opens the configuration wizard ${pc.dim('(config show | config reset)')}
  ${pc.yellow('help')}     Shows this message

${pc.bold('Options:')}
  ${pc.yellow('--host')}, ${pc.yellow('--port')}   Daemon address ${pc.dim('(default 127.0.0.1:6610)')}

${pc.bold('Getting Started:')}
  ${pc.dim('1.')} ${pc.cyan('parley config')}                ${pc.dim('— Configure your API key')}
  ${pc.dim('2.')} ${pc.cyan('parley daemon')}                ${pc.dim('— Start the daemon service')}
  ${pc.dim('3.')} ${pc.cyan('parley ask "What is 25 + 17?"')} ${pc.dim('— Ask something')}
  `);
}

async function dispatch(argv: string[]): Promise<number> {
    const parsed = parseArgs(argv);
    if (!parsed.ok) {
        console.log(pc.red(`\n❌ ${parsed.error}`));
        showHelp();
        return 1;
    }

    const { command, positionals, options } = parsed.args;
    if (options.help) {
        showHelp();
        return 0;
    }

    switch (command) {
        case 'daemon': {
            const { daemonCommand } = await import('./commands/daemon.js');
            return daemonCommand(options);
        }

        case 'stop': {
            const { stopCommand } = await import('./commands/stop.js');
            return stopCommand();
        }

        case 'ask': {
            const { askCommand } = await import('./commands/ask.js');
            return askCommand(positionals.join(' '), options);
        }

        case 'tools': {
            const { toolsCommand } = await import('./commands/tools.js');
            return toolsCommand(options);
        }

        case 'config':
        case 'setup': {
            const { configCommand } = await import('./commands/config.js');
            return configCommand(positionals);
        }

        case 'help':
        case undefined: {
            showHelp();
            return 0;
        }

        default: {
            console.log(pc.red(`\n❌ Unknown command: ${command}`));
            showHelp();
            return 1;
        }
    }
}

export async function main(argv: string[]): Promise<void> {
    try {
        process.exitCode = await dispatch(argv);
    } catch (err) {
        if (err instanceof DaemonUnreachableError) {
            console.log(pc.red(`\n❌ ${err.message}`));
            console.log(pc.dim('   Is it running? Start it with "parley daemon".\n'));
        } else {
            console.log(pc.red(`\n❌ ${err instanceof Error ? err.message : String(err)}\n`));
        }
        process.exitCode = 1;
    }
}

// Auto-invoke when run directly
await main(process.argv.slice(2));
