/**
 * ledgergate verify — Standalone chain verification
 *
 * Proves a log's integrity from the file alone: no configuration, no
 * ledger instance, nothing appended. A torn final line counts as a
 * violation. Exit status 1 when any violation is found.
 *
 *   ledgergate verify <log> [--json]
 */

import { Command } from 'commander';
import { verifyAuditFile } from '@ledgergate/runtime-host';
import { t } from '../tui/theme.js';
import { fail } from './context.js';

export const verifyCommand = new Command('verify')
  .description('Verify the hash chain of an audit log file')
  .argument('<log>', 'Path to the JSONL audit log')
  .option('--json', 'Output as JSON')
  .action((log: string, options: { json?: boolean }) => {
    try {
      const result = verifyAuditFile(log);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          valid: result.valid,
          records_checked: result.recordsChecked,
          violations: result.violations,
        }, null, 2));
      } else if (result.valid) {
        // eslint-disable-next-line no-console
        console.log(t.green(`✓ Audit chain valid: ${result.recordsChecked} record(s) verified`));
      } else {
        // eslint-disable-next-line no-console
        console.log(t.red(`✕ Audit chain INVALID: ${result.violations.length} violation(s) in ${result.recordsChecked} record(s)`));
        for (const violation of result.violations) {
          // eslint-disable-next-line no-console
          console.log(`  ${t.amber(violation.kind.padEnd(14))} ${violation.message}`);
        }
      }

      if (!result.valid) {
        process.exit(1);
      }
    } catch (err) {
      fail('verify', err);
    }
  });
