/**
 * ledgergate dashboard — Full-screen view of the configured ledger
 *
 * Read-only: the log is verified and summarized on every refresh, and
 * nothing is appended. A compromised chain is shown, not refused.
 */

import React from 'react';
import { Command } from 'commander';
import { render } from 'ink';
import { FileLedgerStore } from '@ledgergate/runtime-host';
import { LedgerService } from '../tui/services/index.js';
import { configFor, fail } from './context.js';

export const dashboardCommand = new Command('dashboard')
  .description('Open the interactive ledger dashboard')
  .option('--session <id>', 'Session to show (default: the most recent session in the log)')
  .action(async (options: { session?: string }, command: Command) => {
    try {
      const config = configFor(command);
      const service = new LedgerService(new FileLedgerStore(config.auditLogPath));
      const { DashboardView } = await import('../tui/dashboard/DashboardView.js');

      const { waitUntilExit } = render(
        React.createElement(DashboardView, {
          service,
          sessionId: options.session,
          onExit: () => { /* Ink tears itself down via useApp().exit() */ },
        }),
      );
      await waitUntilExit();
    } catch (err) {
      fail('dashboard', err);
    }
  });
