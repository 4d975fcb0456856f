/**
 * ledgergate runtime host — Home Directory Resolution
 *
 * Resolves the ledgergate home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. LEDGERGATE_HOME environment variable
 *   3. OS application config file (`{ "home": "<path>" }`)
 *   4. Default: ~/.ledgergate
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     config.json
 *     audit/
 *       audit.jsonl
 *       audit_export_<session>_<stamp>.jsonl
 */

import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir, platform } from 'node:os';
import { isJsonObject } from '@ledgergate/core';
import { isNodeError } from './state/ledger-store.js';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Returns the platform-specific path to the application config file.
 *
 * Locations:
 *   macOS:   ~/Library/Preferences/ledgergate/config.json
 *   Windows: %APPDATA%\ledgergate\config.json (fallback: ~/AppData/Roaming/ledgergate/config.json)
 *   Linux:   ~/.config/ledgergate/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'ledgergate', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'ledgergate', 'config.json');
    }
    default:
      return join(home, '.config', 'ledgergate', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read
// ---------------------------------------------------------------------------

/**
 * Read the home path recorded in the OS application config file.
 *
 * Returns null if the file does not exist, is not valid JSON, or has no
 * non-empty `home` string. Other read errors propagate.
 */
export function readLedgerHomeFromConfig(): string | null {
  let raw: string;
  try {
    raw = readFileSync(getOsConfigPath(), 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }
  const parsed = parseJsonOrNull(raw);
  if (!isJsonObject(parsed)) return null;
  const home = parsed['home'];
  return typeof home === 'string' && home !== '' ? home : null;
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveLedgerHomeOptions {
  /** Explicit override — highest precedence. */
  readonly home?: string | undefined;
}

/**
 * Resolve the ledgergate home directory, creating it if needed.
 *
 * @returns Absolute or caller-relative path of the home directory
 */
export function resolveLedgerHome(opts?: ResolveLedgerHomeOptions): string {
  let home: string;

  const fromEnv = process.env['LEDGERGATE_HOME'];
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readLedgerHomeFromConfig() ?? join(homedir(), '.ledgergate');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  return home;
}

/** JSON.parse that answers null instead of throwing on a syntax error. */
export function parseJsonOrNull(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}
