/**
 * @parley/cli — Stop Command
 *
 * Stops the background daemon through the PID file it writes on
 * startup: SIGTERM first, SIGKILL if it is still around afterwards.
 *
 * Usage: parley stop
 */

import { existsSync, unlinkSync } from 'node:fs';
import pc from 'picocolors';
import { isProcessAlive, pidFile, readDaemonPid } from './daemon.js';

const GRACE_MS = 3_000;

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function stopCommand(): Promise<number> {
    const pid = readDaemonPid();

    if (pid === null || !isProcessAlive(pid)) {
        if (existsSync(pidFile())) unlinkSync(pidFile());
        console.log(pc.dim('\n  ℹ️  No daemon is running.\n'));
        return 0;
    }

    console.log(pc.dim(`\n  🛑 Stopping daemon (PID ${pid})...`));
    process.kill(pid, 'SIGTERM');

    const deadline = Date.now() + GRACE_MS;
    while (Date.now() < deadline && isProcessAlive(pid)) {
        await sleep(200);
    }

    if (isProcessAlive(pid)) {
        console.log(pc.yellow('  ⚠️  Daemon did not exit in time; forcing it.'));
        process.kill(pid, 'SIGKILL');
        if (existsSync(pidFile())) unlinkSync(pidFile());
    }

    console.log(pc.green('  ✅ Daemon stopped.\n'));
    return 0;
}
