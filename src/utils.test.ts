/**
 * Utility Function Tests
 *
 * Tests for core utility functions used across the codebase.
 * Run with: npm test
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  sanitizeText,
  sanitizeForLogging,
  isValidTenantId,
  escapeQueryForSearch,
  uniqueStrings,
  withRequestContext,
  getRequestContext,
} from './utils';

describe('sanitizeText', () => {
  it('removes null bytes', () => {
    const result = sanitizeText('hello\x00world');
    assert.strictEqual(result, 'helloworld');
  });

  it('trims whitespace', () => {
    const result = sanitizeText('  hello world  ');
    assert.strictEqual(result, 'hello world');
  });

  it('handles empty input', () => {
    const result = sanitizeText('');
    assert.strictEqual(result, '');
  });

  it('preserves newlines', () => {
    const result = sanitizeText('line1\nline2');
    assert.strictEqual(result, 'line1\nline2');
  });

  it('truncates to max length', () => {
    assert.strictEqual(sanitizeText('abcdef', 3), 'abc');
  });
});

describe('sanitizeForLogging', () => {
  it('collapses newlines and runs of whitespace', () => {
    assert.strictEqual(sanitizeForLogging('what is\n\nthe   refund policy'), 'what is the refund policy');
  });
});

describe('isValidTenantId', () => {
  it('accepts slug-like ids', () => {
    assert.strictEqual(isValidTenantId('tenant_01-a'), true);
  });

  it('rejects empty and punctuated ids', () => {
    assert.strictEqual(isValidTenantId(''), false);
    assert.strictEqual(isValidTenantId('tenant/01'), false);
  });
});

describe('escapeQueryForSearch', () => {
  it('escapes double quotes', () => {
    assert.strictEqual(escapeQueryForSearch('say "hello"'), 'say \\"hello\\"');
  });

  it('leaves plain text untouched', () => {
    assert.strictEqual(escapeQueryForSearch('plain query'), 'plain query');
  });
});

describe('uniqueStrings', () => {
  it('keeps first-seen order', () => {
    assert.deepStrictEqual(uniqueStrings(['b', 'a', 'b', 'c', 'a']), ['b', 'a', 'c']);
  });
});

describe('request context', () => {
  it('is visible inside the callback only', () => {
    const seen = withRequestContext({ requestId: 'req_test', startTime: 0 }, () => getRequestContext()?.requestId);
    assert.strictEqual(seen, 'req_test');
    assert.strictEqual(getRequestContext(), undefined);
  });
});
