/**
 * Proxmox Module
 *
 * Exports the host contract, command builders, parsers and the qm-backed host.
 */

export * from './types.js';
export * from './commands.js';
export * from './queries.js';
export * from './host.js';
