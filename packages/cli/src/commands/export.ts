/**
 * ledgergate export — Write one session's entries to a standalone JSONL file
 *
 * Exported lines are byte-identical to the ledger's, so the file carries
 * its original hashes. It is not itself a verifiable chain unless the
 * session is the whole log.
 */

import { Command } from 'commander';
import { t } from '../tui/theme.js';
import { configFor, fail, latestSessionId, openLedger } from './context.js';

export const exportCommand = new Command('export')
  .description('Export a session to a JSONL file')
  .option('--session <id>', 'Session to export (default: the most recent session in the log)')
  .option('--out <path>', 'Output path (default: audit_export_<session>_<stamp>.jsonl beside the log)')
  .action((options: { session?: string; out?: string }, command: Command) => {
    try {
      const ledger = openLedger(configFor(command));
      const sessionId = options.session ?? latestSessionId(ledger);
      if (sessionId === undefined) {
        fail('export', 'The audit log is empty; nothing to export.');
      }

      const written = ledger.export(sessionId, options.out);
      const count = Array.from(ledger.query({ sessionId })).length;
      // eslint-disable-next-line no-console
      console.log(t.green(`✓ Exported ${count} entr${count === 1 ? 'y' : 'ies'} from ${sessionId}`));
      // eslint-disable-next-line no-console
      console.log(`  ${t.muted('file')} ${written}`);
    } catch (err) {
      fail('export', err);
    }
  });
