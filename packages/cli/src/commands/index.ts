/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/ledgergate.ts.
 */

import { program } from 'commander'
import { verifyCommand } from './verify.js'
import { logCommand } from './log.js'
import { exportCommand } from './export.js'
import { summaryCommand } from './summary.js'
import { proposeCommand } from './propose.js'
import { dashboardCommand } from './dashboard.js'

program
  .name('ledgergate')
  .description(
    'ledgergate — tamper-evident audit ledger and approval gate for AI agents.\n' +
    'Every proposed side effect waits for an explicit, recorded human decision.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'Home directory (default: $LEDGERGATE_HOME or ~/.ledgergate)')
  .option('--log <path>', 'Audit log path (default: $LEDGERGATE_LOG_PATH or <home>/audit/audit.jsonl)')

program.addCommand(verifyCommand)
program.addCommand(logCommand)
program.addCommand(exportCommand)
program.addCommand(summaryCommand)
program.addCommand(proposeCommand)
program.addCommand(dashboardCommand)

export { program }
