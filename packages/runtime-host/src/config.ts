/**
 * ledgergate runtime host — Configuration
 *
 * Settings are read from `<home>/config.json`. Every setting has a
 * compliance-safe default, and a missing or unparseable file yields the
 * defaults:
 *
 *   {
 *     "auditLogPath": "audit/audit.jsonl",   // relative paths resolve against home
 *     "autoVerify": true,                    // verify the chain when a ledger opens
 *     "requireApproval": true                // every proposal waits for a human
 *   }
 *
 * Precedence for the audit log path: explicit option → LEDGERGATE_LOG_PATH →
 * config file → `<home>/audit/audit.jsonl`.
 */

import { readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { isJsonObject } from '@ledgergate/core';
import { parseJsonOrNull, resolveLedgerHome } from './home.js';
import { isNodeError } from './state/ledger-store.js';

export const CONFIG_FILENAME = 'config.json';
export const DEFAULT_AUDIT_LOG = join('audit', 'audit.jsonl');

export interface LedgerConfig {
  readonly home: string;
  readonly auditLogPath: string;
  readonly autoVerify: boolean;
  readonly requireApproval: boolean;
}

export interface LoadConfigOptions {
  /** Home directory override (--home). */
  readonly home?: string | undefined;
  /** Audit log path override (--log). */
  readonly logPath?: string | undefined;
}

/** Resolve the home directory and load its configuration. */
export function loadConfig(opts?: LoadConfigOptions): LedgerConfig {
  const home = resolveLedgerHome({ home: opts?.home });
  const file = readConfigFile(join(home, CONFIG_FILENAME));

  const envLog = process.env['LEDGERGATE_LOG_PATH'];
  const logPath =
    nonEmpty(opts?.logPath) ??
    nonEmpty(envLog) ??
    stringSetting(file, 'auditLogPath') ??
    DEFAULT_AUDIT_LOG;

  return {
    home,
    auditLogPath: isAbsolute(logPath) ? logPath : join(home, logPath),
    autoVerify: booleanSetting(file, 'autoVerify') ?? true,
    requireApproval: booleanSetting(file, 'requireApproval') ?? true,
  };
}

/**
 * Compliance warnings for a configuration. An empty list means every
 * safeguard is on.
 */
export function validateConfig(config: LedgerConfig): string[] {
  const issues: string[] = [];
  if (!config.requireApproval) {
    issues.push(
      'COMPLIANCE WARNING: requireApproval=false. Proposals are approved without a human decision.',
    );
  }
  if (!config.autoVerify) {
    issues.push(
      'COMPLIANCE WARNING: autoVerify=false. The audit chain is not verified when the ledger opens.',
    );
  }
  return issues;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

type ConfigFile = Readonly<Record<string, unknown>>;

function readConfigFile(path: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return {};
    throw err;
  }
  const parsed = parseJsonOrNull(raw);
  return isJsonObject(parsed) ? parsed : {};
}

function stringSetting(file: ConfigFile, key: string): string | undefined {
  return nonEmpty(file[key]);
}

function booleanSetting(file: ConfigFile, key: string): boolean | undefined {
  const value = file[key];
  return typeof value === 'boolean' ? value : undefined;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}
