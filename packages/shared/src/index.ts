/**
 * @parley/shared — Barrel Export
 *
 * Single entry point for all shared types, interfaces, and constants.
 */

export * from './constants.js';
export * from './types/protocol.js';
export * from './types/protocol-schema.js';
export * from './vault/vault.js';
export * from './models/catalog.js';
