/**
 * linePrompt — readline-backed `ask` for the TerminalReviewer.
 *
 * A question that is waiting when the input closes (EOF, Ctrl-D) or the
 * user presses Ctrl-C rejects with the reason, and so does every later
 * question. The gate records that rejection as a denied request.
 */

import type { Interface } from 'node:readline/promises';

export const INPUT_CLOSED = 'input closed';
export const INTERRUPTED = 'interrupted';

export function linePrompt(rl: Interface): (prompt: string) => Promise<string> {
  const controller = new AbortController();
  rl.once('close', () => controller.abort(new Error(INPUT_CLOSED)));
  rl.once('SIGINT', () => {
    controller.abort(new Error(INTERRUPTED));
    rl.close();
  });

  return async (prompt) => {
    const { signal } = controller;
    if (signal.aborted) throw abortReason(signal);
    try {
      return await rl.question(prompt, { signal });
    } catch (err: unknown) {
      if (signal.aborted) throw abortReason(signal);
      throw err;
    }
  };
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error(String(reason));
}
