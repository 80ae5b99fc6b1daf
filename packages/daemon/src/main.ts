/**
 * @parley/daemon — Entry Point
 *
 * Starts the daemon and handles graceful shutdown on SIGINT/SIGTERM.
 */

import { startDaemon } from './daemon.js';

const daemon = await startDaemon();

async function shutdown(signal: string): Promise<void> {
    console.log(`\n  🛑 Received ${signal}. Shutting down gracefully...`);
    await daemon.shutdown();
    process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
