/**
 * ledgergate core — JSON Value Guards
 */

import { describe, it, expect } from 'vitest';
import { isJsonObject, isJsonValue } from '../src/types/json.js';

describe('isJsonValue', () => {
  it('accepts parsed JSON of every shape', () => {
    expect(isJsonValue(JSON.parse('{"a":[1,"x",true,null,{"b":2.5}]}'))).toBe(true);
    expect(isJsonValue('text')).toBe(true);
    expect(isJsonValue(null)).toBe(true);
  });

  it('rejects values JSON cannot carry', () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue({ when: () => 1 })).toBe(false);
    expect(isJsonValue([1, Symbol('s')])).toBe(false);
  });
});

describe('isJsonObject', () => {
  it('distinguishes objects from arrays and primitives', () => {
    expect(isJsonObject({ command: 'ls' })).toBe(true);
    expect(isJsonObject(['ls'])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('ls')).toBe(false);
  });
});
