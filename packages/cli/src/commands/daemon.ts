/**
 * @parley/cli — Daemon Command
 *
 * Starts the Daemon process in the background (detached).
 * Logs are redirected to ~/.parley/daemon.log.
 * Returns control to the shell immediately.
 *
 * Usage: parley daemon [--foreground] [--host <h>] [--port <n>]
 *
 * With --foreground the daemon runs in this process until Ctrl+C.
 * Use `parley stop` to shut down a background daemon.
 */

import { spawn } from 'node:child_process';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync, existsSync, openSync, mkdirSync } from 'node:fs';
import { createConnection } from 'node:net';
import pc from 'picocolors';
import { Vault, DEFAULT_PORT, DEFAULT_HOST } from '@parley/shared';
import type { CliOptions } from '../args.js';

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../../../');

export function daemonHost(options: Pick<CliOptions, 'host'>): string {
    return options.host ?? process.env['PARLEY_HOST'] ?? DEFAULT_HOST;
}

export function daemonPort(options: Pick<CliOptions, 'port'>): number {
    return options.port ?? (Number(process.env['PARLEY_PORT']) || DEFAULT_PORT);
}

export function daemonUrl(options: Pick<CliOptions, 'host' | 'port'>): string {
    return `ws://${daemonHost(options)}:${daemonPort(options)}`;
}

export function pidFile(): string {
    return join(Vault.dir, 'daemon.pid');
}

/** Read the PID written by the daemon on startup */
export function readDaemonPid(): number | null {
    if (!existsSync(pidFile())) return null;
    const pid = parseInt(readFileSync(pidFile(), 'utf-8').trim(), 10);
    return isNaN(pid) ? null : pid;
}

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0); // signal 0 = check existence
        return true;
    } catch {
        return false;
    }
}

/** TCP-poll until the daemon is accepting connections */
function waitForDaemonReady(host: string, port: number, maxWaitMs = 15_000): Promise<boolean> {
    const startTime = Date.now();

    return new Promise((resolve) => {
        function tryConnect() {
            if (Date.now() - startTime > maxWaitMs) {
                resolve(false);
                return;
            }
            const socket = createConnection({ host, port }, () => {
                socket.destroy();
                resolve(true);
            });
            socket.on('error', () => {
                socket.destroy();
                setTimeout(tryConnect, 500);
            });
        }
        tryConnect();
    });
}

async function runForeground(options: CliOptions): Promise<number> {
    process.env['PARLEY_HOST'] = daemonHost(options);
    process.env['PARLEY_PORT'] = String(daemonPort(options));

    const { startDaemon } = await import('@parley/daemon');
    const daemon = await startDaemon();

    await new Promise<void>((done) => {
        const stop = (signal: string) => {
            console.log(pc.dim(`\n  🛑 Received ${signal}. Shutting down gracefully...`));
            daemon.shutdown().then(done, (err: unknown) => {
                console.error(pc.red(`  ❌ Shutdown failed: ${err instanceof Error ? err.message : String(err)}`));
                done();
            });
        };
        process.once('SIGINT', () => stop('SIGINT'));
        process.once('SIGTERM', () => stop('SIGTERM'));
    });
    return 0;
}

export async function daemonCommand(options: CliOptions): Promise<number> {
    if (!Vault.isConfigured()) {
        console.log(pc.yellow('\n⚙️  No model provider API key found.'));
        console.log(pc.dim('   Run "parley config" or set GROQ_API_KEY. Starting anyway.\n'));
    }

    if (options.foreground) return runForeground(options);

    const pid = readDaemonPid();
    if (pid && isProcessAlive(pid)) {
        console.log(pc.green(`\n  ✅ Daemon is already running (PID: ${pid}).\n`));
        return 0;
    }

    const host = daemonHost(options);
    const port = daemonPort(options);
    if (!existsSync(Vault.dir)) mkdirSync(Vault.dir, { recursive: true, mode: 0o700 });
    const logPath = join(Vault.dir, 'daemon.log');
    const logFd = openSync(logPath, 'a');

    console.log(pc.dim('  🚀 Starting daemon in background...'));

    // Spawn fully detached: no pipes binding the two processes
    const daemonProcess = spawn(
        resolve(PROJECT_ROOT, 'node_modules/.bin/tsx'),
        [resolve(PROJECT_ROOT, 'packages/daemon/src/main.ts')],
        {
            stdio: ['ignore', logFd, logFd],
            cwd: PROJECT_ROOT,
            detached: true,
            env: { ...process.env, PARLEY_HOST: host, PARLEY_PORT: String(port) },
        },
    );
    daemonProcess.unref();

    console.log(pc.dim(`  📄 Logs: ${logPath}`));
    console.log(pc.dim('  ⏳ Waiting for daemon to be ready...'));

    if (!(await waitForDaemonReady(host, port))) {
        console.log(pc.red('  ❌ Daemon failed to start. Check logs:'));
        console.log(pc.dim(`     tail -50 ${logPath}\n`));
        return 1;
    }

    console.log(pc.green(`  ✅ Daemon started on ws://${host}:${port} (PID: ${readDaemonPid() ?? daemonProcess.pid ?? '?'})`));
    console.log(pc.dim('     Use "parley ask <question>" to talk to it.'));
    console.log(pc.dim('     Use "parley stop" to shut it down.\n'));
    return 0;
}
