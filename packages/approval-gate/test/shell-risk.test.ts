/**
 * ledgergate approval gate — Shell Reversibility Tests
 */

import { describe, it, expect } from 'vitest';
import { isReversibleCommand } from '../src/shell-risk.js';

describe('isReversibleCommand', () => {
  it.each([
    'rm -rf build',
    'git branch --delete old',
    'psql -c "DROP TABLE users"',
    'psql -c "truncate logs"',
    'diskutil FORMAT disk2',
  ])('treats %s as irreversible', (command) => {
    expect(isReversibleCommand(command)).toBe(false);
  });

  it.each(['ls -la', 'git status', 'npm test', 'echo rm'])('treats %s as reversible', (command) => {
    expect(isReversibleCommand(command)).toBe(true);
  });
});
