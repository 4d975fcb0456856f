/**
 * ledgergate log — Query the audit ledger
 *
 * Every recorded action is listed regardless of outcome. Filters combine;
 * omitted filters match everything. --limit keeps the most recent N
 * matches.
 */

import { Command } from 'commander';
import { formatEntryTable } from '../tui/output/entries.js';
import { configFor, fail, openLedger, parseActionOption, parseDateOption } from './context.js';

interface LogOptions {
  session?: string;
  agent?: string;
  action?: string;
  since?: string;
  until?: string;
  json?: boolean;
  limit: string;
}

export const logCommand = new Command('log')
  .description('Query the audit ledger')
  .option('--session <id>', 'Filter by session ID')
  .option('--agent <id>', 'Filter by agent ID')
  .option('--action <action>', 'Filter by action (e.g. approval_granted)')
  .option('--since <iso-date>', 'Only entries at or after this ISO 8601 timestamp')
  .option('--until <iso-date>', 'Only entries at or before this ISO 8601 timestamp')
  .option('--json', 'Output as JSON')
  .option('--limit <n>', 'Maximum number of entries to return', '100')
  .action((options: LogOptions, command: Command) => {
    const action = parseActionOption('log', options.action);
    const since = parseDateOption('log', '--since', options.since);
    const until = parseDateOption('log', '--until', options.until);
    const limit = Number.parseInt(options.limit, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      fail('log', `--limit must be a positive integer, got: ${options.limit}`);
    }

    try {
      const ledger = openLedger(configFor(command));
      const matches = Array.from(ledger.query({
        sessionId: options.session,
        agentId: options.agent,
        action,
        since,
        until,
      }));
      const shown = matches.slice(-limit);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(shown, null, 2));
        return;
      }

      if (shown.length === 0) {
        // eslint-disable-next-line no-console
        console.log('No matching entries.');
        return;
      }

      process.stdout.write(formatEntryTable(shown, matches.length));
    } catch (err) {
      fail('log', err);
    }
  });
