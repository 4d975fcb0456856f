/**
 * ledgergate summary — Session statistics
 */

import { Command } from 'commander';
import { formatSummary } from '../tui/output/summary.js';
import { configFor, fail, latestSessionId, openLedger } from './context.js';

export const summaryCommand = new Command('summary')
  .description('Summarize a session')
  .option('--session <id>', 'Session to summarize (default: the most recent session in the log)')
  .option('--json', 'Output as JSON')
  .action((options: { session?: string; json?: boolean }, command: Command) => {
    try {
      const ledger = openLedger(configFor(command));
      const sessionId = options.session ?? latestSessionId(ledger);
      if (sessionId === undefined) {
        fail('summary', 'The audit log is empty; no session to summarize.');
      }

      const summary = ledger.summarize(sessionId);
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      process.stdout.write(formatSummary(summary));
    } catch (err) {
      fail('summary', err);
    }
  });
