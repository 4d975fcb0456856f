/**
 * ledgergate approval gate — Request Presentation
 *
 * Plain-text rendering of an ApprovalRequest for a reviewer. Lines carry no
 * colour; a terminal front end styles them (diff lines start with the
 * usual `+`, `-` and `@@` markers).
 */

import { EDIT_FILE_ACTION, RUN_SHELL_ACTION, isJsonObject } from '@ledgergate/core';
import type { ApprovalRequest } from '@ledgergate/core';
import { unifiedDiff } from './diff.js';

const RULE_WIDTH = 70;

/** The summary shown before the reviewer decides. */
export function describeRequest(request: ApprovalRequest): string[] {
  const heavy = '='.repeat(RULE_WIDTH);
  const light = '-'.repeat(RULE_WIDTH);
  const lines = [
    heavy,
    'APPROVAL REQUIRED',
    heavy,
    `Request ID: ${request.request_id}`,
    `Agent: ${request.agent_id}`,
    `Action: ${request.action_type}`,
    `Risk Level: ${request.risk_level.toUpperCase()}`,
    `Reversible: ${request.reversible ? 'Yes' : 'NO - IRREVERSIBLE'}`,
    light,
    `Description: ${request.description}`,
  ];

  if (request.context !== undefined && request.context !== '') {
    lines.push('', `Context: ${request.context}`);
  }

  if (request.original_content !== undefined && request.proposed_content !== undefined) {
    lines.push('', '--- Proposed Changes ---');
    lines.push(...unifiedDiff(request.original_content, request.proposed_content));
  }

  if (request.action_type === RUN_SHELL_ACTION) {
    lines.push('', `Command: ${proposedCommand(request) ?? 'N/A'}`);
  } else if (request.action_type !== EDIT_FILE_ACTION) {
    lines.push('', `Proposal: ${JSON.stringify(request.proposal, null, 2)}`);
  }

  return lines;
}

/** Every field of the request, for the reviewer's "view" option. */
export function describeRequestDetails(request: ApprovalRequest): string[] {
  const lines = [
    '--- Full Request Details ---',
    `Request ID: ${request.request_id}`,
    `Timestamp: ${request.timestamp}`,
    `Agent ID: ${request.agent_id}`,
    `Action Type: ${request.action_type}`,
    `Risk Level: ${request.risk_level}`,
    `Reversible: ${String(request.reversible)}`,
    `Description: ${request.description}`,
    `Context: ${request.context ?? '(none)'}`,
    `Proposal: ${JSON.stringify(request.proposal, null, 2)}`,
  ];
  if (request.original_content !== undefined) {
    lines.push(`Original Content Length: ${request.original_content.length} chars`);
  }
  if (request.proposed_content !== undefined) {
    lines.push(`Proposed Content Length: ${request.proposed_content.length} chars`);
  }
  return lines;
}

/** The command of a shell request, when its proposal carries one. */
export function proposedCommand(request: ApprovalRequest): string | undefined {
  const { proposal } = request;
  if (!isJsonObject(proposal)) return undefined;
  const command = proposal['command'];
  return typeof command === 'string' ? command : undefined;
}

/** The target path of a file edit request, when its proposal carries one. */
export function proposedFilePath(request: ApprovalRequest): string | undefined {
  const { proposal } = request;
  if (!isJsonObject(proposal)) return undefined;
  const filePath = proposal['file_path'];
  return typeof filePath === 'string' ? filePath : undefined;
}
