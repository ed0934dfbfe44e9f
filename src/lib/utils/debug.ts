/**
 * Debug logging utilities for acme-dns-hooks
 *
 * Backed by the `debug` package and enabled with the DEBUG environment variable:
 *
 * DEBUG=acme-dns-hooks:* - All debug output
 * DEBUG=acme-dns-hooks:poller - Only propagation polling
 * DEBUG=acme-dns-hooks:backend - Only record backend operations
 *
 * Output goes to stderr so the hook's stdout stays clean for the ACME client.
 */

import debug from 'debug';

const createDebugger = (namespace: string): debug.Debugger => debug(`acme-dns-hooks:${namespace}`);

export const debugPoller = createDebugger('poller');
export const debugHook = createDebugger('hook');
export const debugBackend = createDebugger('backend');
export const debugResolver = createDebugger('resolver');
export const debugCommand = createDebugger('command');

export const debugMain = createDebugger('main');
