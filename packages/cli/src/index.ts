/**
 * @ledgergate/cli
 *
 * The `ledgergate` command and the interactive terminal reviewer.
 *
 * Usage:
 *   ledgergate verify <log> [--json]
 *   ledgergate log [--session <id>] [--agent <id>] [--action <action>] [--since <iso>] [--until <iso>]
 *   ledgergate export [--session <id>] [--out <path>]
 *   ledgergate summary [--session <id>] [--json]
 *   ledgergate propose shell|edit|generic ...
 *   ledgergate dashboard [--session <id>]
 */

export { program } from './commands/index.js';
export { runProposal } from './commands/propose.js';
export type { RunProposalOptions } from './commands/propose.js';
export { linePrompt } from './review/line-prompt.js';
export { TerminalReviewer } from './review/terminal-reviewer.js';
export type { TerminalReviewerOptions } from './review/terminal-reviewer.js';
