/**
 * ledgergate runtime host — Home and Configuration Tests
 *
 * Verifies the resolution precedence:
 *   home:     explicit option → LEDGERGATE_HOME → OS config file → ~/.ledgergate
 *   log path: explicit option → LEDGERGATE_LOG_PATH → config.json → <home>/audit/audit.jsonl
 *
 * Isolation: each test saves and restores LEDGERGATE_HOME and
 * LEDGERGATE_LOG_PATH to avoid cross-test contamination.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { isAbsolute, join } from 'node:path';
import { resolveLedgerHome } from '../src/home.js';
import { loadConfig, validateConfig } from '../src/config.js';

// ---------------------------------------------------------------------------
// Env var save/restore helper
// ---------------------------------------------------------------------------

const ENV_KEYS = ['LEDGERGATE_HOME', 'LEDGERGATE_LOG_PATH'] as const;
const saved = new Map<string, string | undefined>();

beforeEach(() => {
  for (const key of ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = saved.get(key);
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'ledgergate-home-'));
}

// ---------------------------------------------------------------------------
// resolveLedgerHome
// ---------------------------------------------------------------------------

describe('resolveLedgerHome', () => {
  it('prefers the explicit option over the environment', () => {
    const explicit = tempHome();
    process.env['LEDGERGATE_HOME'] = tempHome();
    expect(resolveLedgerHome({ home: explicit })).toBe(explicit);
  });

  it('honors LEDGERGATE_HOME when no option is given', () => {
    const fromEnv = tempHome();
    process.env['LEDGERGATE_HOME'] = fromEnv;
    expect(resolveLedgerHome()).toBe(fromEnv);
  });

  it('creates the resolved directory', () => {
    const home = join(tempHome(), 'fresh');
    resolveLedgerHome({ home });
    expect(existsSync(home)).toBe(true);
  });

  it('falls back to an absolute path when nothing is set', () => {
    const result = resolveLedgerHome();
    expect(isAbsolute(result)).toBe(true);
    expect(result.toLowerCase()).toContain('ledgergate');
  });
});

// ---------------------------------------------------------------------------
// loadConfig / validateConfig
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  it('returns compliance-safe defaults without a config file', () => {
    const home = tempHome();
    expect(loadConfig({ home })).toEqual({
      home,
      auditLogPath: join(home, 'audit', 'audit.jsonl'),
      autoVerify: true,
      requireApproval: true,
    });
  });

  it('reads settings from config.json and resolves relative paths against home', () => {
    const home = tempHome();
    writeFileSync(
      join(home, 'config.json'),
      JSON.stringify({ auditLogPath: 'logs/trail.jsonl', autoVerify: false, requireApproval: false }),
      'utf-8',
    );
    expect(loadConfig({ home })).toEqual({
      home,
      auditLogPath: join(home, 'logs', 'trail.jsonl'),
      autoVerify: false,
      requireApproval: false,
    });
  });

  it('ignores settings of the wrong type', () => {
    const home = tempHome();
    writeFileSync(join(home, 'config.json'), JSON.stringify({ autoVerify: 'no', auditLogPath: 7 }), 'utf-8');
    const config = loadConfig({ home });
    expect(config.autoVerify).toBe(true);
    expect(config.auditLogPath).toBe(join(home, 'audit', 'audit.jsonl'));
  });

  it('falls back to defaults when config.json is not valid JSON', () => {
    const home = tempHome();
    writeFileSync(join(home, 'config.json'), '{ not json', 'utf-8');
    expect(loadConfig({ home }).requireApproval).toBe(true);
  });

  it('lets LEDGERGATE_LOG_PATH override the file and the option override both', () => {
    const home = tempHome();
    writeFileSync(join(home, 'config.json'), JSON.stringify({ auditLogPath: 'from-file.jsonl' }), 'utf-8');
    process.env['LEDGERGATE_LOG_PATH'] = '/var/audit/from-env.jsonl';

    expect(loadConfig({ home }).auditLogPath).toBe('/var/audit/from-env.jsonl');
    expect(loadConfig({ home, logPath: 'cli.jsonl' }).auditLogPath).toBe(join(home, 'cli.jsonl'));
  });
});

describe('validateConfig', () => {
  it('has no warnings when every safeguard is on', () => {
    expect(validateConfig(loadConfig({ home: tempHome() }))).toEqual([]);
  });

  it('warns for each disabled safeguard', () => {
    const warnings = validateConfig({
      home: '/h',
      auditLogPath: '/h/audit.jsonl',
      autoVerify: false,
      requireApproval: false,
    });
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toMatch(/^COMPLIANCE WARNING: requireApproval=false\./);
    expect(warnings[1]).toMatch(/^COMPLIANCE WARNING: autoVerify=false\./);
  });
});
