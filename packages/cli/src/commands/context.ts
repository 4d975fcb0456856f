/**
 * Shared command plumbing: global options, ledger construction, and the
 * stderr error convention (`[ledgergate <command>] message`, exit 1).
 */

import type { Command } from 'commander';
import { LedgerIntegrityError, isAuditAction } from '@ledgergate/core';
import type { AuditAction } from '@ledgergate/core';
import { HashChainLedger, loadConfig } from '@ledgergate/runtime-host';
import type { LedgerConfig } from '@ledgergate/runtime-host';

/** Options registered on the root program and visible to every command. */
export interface GlobalOptions {
  home?: string;
  log?: string;
}

/** Load configuration, honouring the global --home and --log options. */
export function configFor(command: Command): LedgerConfig {
  const { home, log } = command.optsWithGlobals<GlobalOptions>();
  return loadConfig({ home, logPath: log });
}

/** Open the configured ledger. A failed integrity check throws LedgerIntegrityError. */
export function openLedger(config: LedgerConfig): HashChainLedger {
  return HashChainLedger.open(config.auditLogPath, { autoVerify: config.autoVerify });
}

/**
 * The session of the most recent entry in the log, or undefined when the
 * log is empty. Read commands default to it: the session a fresh ledger
 * instance opens has no entries yet.
 */
export function latestSessionId(ledger: HashChainLedger): string | undefined {
  let latest: string | undefined;
  for (const entry of ledger.query()) {
    latest = entry.session_id;
  }
  return latest;
}

/** Write the error to stderr and exit non-zero. */
export function fail(scope: string, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[ledgergate ${scope}] ${message}\n`);
  if (err instanceof LedgerIntegrityError) {
    for (const violation of err.violations) {
      process.stderr.write(`  ${violation.message}\n`);
    }
  }
  process.exit(1);
}

/** Parse an ISO 8601 option value. Exits on an unparseable date. */
export function parseDateOption(scope: string, flag: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const at = new Date(value);
  if (Number.isNaN(at.getTime())) {
    fail(scope, `Invalid ${flag} date: ${value}`);
  }
  return at;
}

/** Parse an --action option value. Exits on an unknown action. */
export function parseActionOption(scope: string, value: string | undefined): AuditAction | undefined {
  if (value === undefined) return undefined;
  if (!isAuditAction(value)) {
    fail(scope, `Unknown action: ${value}`);
  }
  return value;
}
