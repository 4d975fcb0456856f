/**
 * ledgergate propose — Submit a proposal through the approval gate
 *
 * Subcommands:
 *   ledgergate propose shell <command>     --description <text> [--risk <level>]
 *   ledgergate propose edit <file>         --content-from <path> --description <text>
 *   ledgergate propose generic <action>    --proposal <json> --description <text>
 *
 * Common options: --agent <id>, --context <text>, --auto-approve, --json.
 *
 * The request and its decision are both written to the ledger. The
 * decision comes from the interactive terminal reviewer unless
 * --auto-approve is given or requireApproval is disabled in config.
 * Closing the input or pressing Ctrl-C during review records a rejection.
 * A rejected proposal exits with status 2.
 */

import { readFileSync } from 'node:fs';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { Command } from 'commander';
import { isJsonValue, isRiskLevel, RISK_LEVELS } from '@ledgergate/core';
import type { ApprovalRequest, ApprovalResponse } from '@ledgergate/core';
import { ApprovalGate } from '@ledgergate/approval-gate';
import { isNodeError, validateConfig } from '@ledgergate/runtime-host';
import type { LedgerConfig } from '@ledgergate/runtime-host';
import { linePrompt } from '../review/line-prompt.js';
import { TerminalReviewer } from '../review/terminal-reviewer.js';
import { styleReviewLine, t } from '../tui/theme.js';
import { configFor, fail, openLedger } from './context.js';

interface ProposeOptions {
  agent: string;
  description: string;
  context?: string;
  autoApprove?: boolean;
  json?: boolean;
}

// ---------------------------------------------------------------------------
// Shared flow: open ledger → submit → decide → report
// ---------------------------------------------------------------------------

export interface RunProposalOptions {
  readonly autoApprove?: boolean | undefined;
  /** Review input. Default: stdin. */
  readonly input?: NodeJS.ReadableStream | undefined;
  /** Review output. Default: stdout. */
  readonly output?: NodeJS.WritableStream | undefined;
}

/** Open the ledger, submit one request and record its decision. */
export async function runProposal(
  config: LedgerConfig,
  submit: (gate: ApprovalGate) => ApprovalRequest,
  opts?: RunProposalOptions,
): Promise<ApprovalResponse> {
  const ledger = openLedger(config);
  const autoApprove = opts?.autoApprove === true || !config.requireApproval;
  const out = opts?.output ?? output;
  const rl = autoApprove ? undefined : readline.createInterface({ input: opts?.input ?? input, output: out });

  try {
    const reviewer = rl === undefined
      ? undefined
      : new TerminalReviewer({
          ask: linePrompt(rl),
          print: (line) => {
            out.write(line + '\n');
          },
          style: styleReviewLine,
        });

    const gate = new ApprovalGate({ recorder: ledger, reviewer, autoApprove });
    const request = submit(gate);
    return await gate.decide(request.request_id);
  } finally {
    rl?.close();
  }
}

async function propose(
  command: Command,
  options: ProposeOptions,
  submit: (gate: ApprovalGate) => ApprovalRequest,
): Promise<void> {
  const config = configFor(command);
  for (const warning of validateConfig(config)) {
    process.stderr.write(t.amber(warning) + '\n');
  }

  const response = await runProposal(config, submit, { autoApprove: options.autoApprove });
  printResponse(response, options.json === true);

  if (response.status === 'rejected') {
    process.exitCode = 2;
  }
}

function printResponse(response: ApprovalResponse, json: boolean): void {
  if (json) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  const label = {
    approved: t.green('✓ APPROVED'),
    rejected: t.red('✕ REJECTED'),
    modified: t.blueBright('✎ MODIFIED'),
  }[response.status];

  // eslint-disable-next-line no-console
  console.log(`\n${label}  ${t.muted(response.request_id)}`);
  if (response.notes !== undefined) {
    // eslint-disable-next-line no-console
    console.log(`  ${t.muted('notes')}    ${response.notes}`);
  }
  if (response.status === 'modified' && response.modified_proposal !== undefined) {
    // eslint-disable-next-line no-console
    console.log(`  ${t.muted('proposal')} ${JSON.stringify(response.modified_proposal)}`);
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .requiredOption('--description <text>', 'Human-readable summary of the proposed action')
    .option('--agent <id>', 'Agent submitting the proposal', 'cli')
    .option('--context <text>', 'Additional context shown to the reviewer')
    .option('--auto-approve', 'Approve without asking (non-interactive)')
    .option('--json', 'Output the decision as JSON');
}

function readOptionalFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) return '';
    throw err;
  }
}

// ---------------------------------------------------------------------------
// ledgergate propose shell <command>
// ---------------------------------------------------------------------------

const proposeShellCommand = withCommonOptions(
  new Command('shell')
    .description('Propose running a shell command')
    .argument('<command>', 'The command line to run')
    .option('--risk <level>', `Risk level: ${RISK_LEVELS.join(', ')}`, 'medium'),
).action(async (commandLine: string, options: ProposeOptions & { risk: string }, command: Command) => {
  const riskLevel = options.risk;
  if (!isRiskLevel(riskLevel)) {
    fail('propose', `Unknown risk level: ${riskLevel}. Valid: ${RISK_LEVELS.join(', ')}`);
  }
  const shellOptions = { context: options.context, riskLevel };
  try {
    await propose(command, options, (gate) =>
      gate.requestShellCommand(options.agent, commandLine, options.description, shellOptions),
    );
  } catch (err) {
    fail('propose', err);
  }
});

// ---------------------------------------------------------------------------
// ledgergate propose edit <file>
// ---------------------------------------------------------------------------

const proposeEditCommand = withCommonOptions(
  new Command('edit')
    .description('Propose replacing the content of a file')
    .argument('<file>', 'File to edit (may not exist yet)')
    .requiredOption('--content-from <path>', 'File holding the proposed new content'),
).action(async (file: string, options: ProposeOptions & { contentFrom: string }, command: Command) => {
  try {
    const original = readOptionalFile(file);
    const proposed = readFileSync(options.contentFrom, 'utf-8');
    await propose(command, options, (gate) =>
      gate.requestFileEdit(options.agent, file, original, proposed, options.description, options.context),
    );
  } catch (err) {
    fail('propose', err);
  }
});

// ---------------------------------------------------------------------------
// ledgergate propose generic <action-type>
// ---------------------------------------------------------------------------

const proposeGenericCommand = withCommonOptions(
  new Command('generic')
    .description('Propose any other action with a JSON payload')
    .argument('<action-type>', 'Action type, e.g. generate_doc')
    .requiredOption('--proposal <json>', 'The proposed action as JSON'),
).action(async (actionType: string, options: ProposeOptions & { proposal: string }, command: Command) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(options.proposal);
  } catch (err) {
    fail('propose', `--proposal is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isJsonValue(parsed)) {
    fail('propose', '--proposal must be a plain JSON value');
  }
  const proposal = parsed;
  try {
    await propose(command, options, (gate) =>
      gate.request(options.agent, actionType, proposal, options.description, { context: options.context }),
    );
  } catch (err) {
    fail('propose', err);
  }
});

export const proposeCommand = new Command('propose')
  .description('Submit a proposal for human approval')
  .addCommand(proposeShellCommand)
  .addCommand(proposeEditCommand)
  .addCommand(proposeGenericCommand);
