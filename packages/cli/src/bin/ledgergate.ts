#!/usr/bin/env node
/**
 * bin/ledgergate.ts — entry point for the `ledgergate` CLI command.
 *
 * Commands may prompt (propose) or render (dashboard), so the program is
 * parsed asynchronously.
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
