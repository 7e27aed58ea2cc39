/**
 * Access token helper tests
 *
 * @module tests/unit/utils/token.test
 */

import { describe, it, expect } from 'vitest';

import { constantTimeEqual, maskToken, randomToken } from '../../../src/utils/token.js';

describe('randomToken', () => {
  it('should produce URL-safe tokens of the requested strength', () => {
    expect(randomToken(16)).toMatch(/^[A-Za-z0-9_-]{22}$/);
    expect(randomToken()).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });
});

describe('constantTimeEqual', () => {
  it('should compare tokens of any length', () => {
    expect(constantTimeEqual('test-token', 'test-token')).toBe(true);
    expect(constantTimeEqual('test-token', 'test-tokem')).toBe(false);
    expect(constantTimeEqual('test-token', 'test-token-2')).toBe(false);
  });
});

describe('maskToken', () => {
  it('should keep only the ends of long tokens', () => {
    expect(maskToken('abcdefghijkl')).toBe('abcd...kl');
    expect(maskToken('short')).toBe('***');
  });
});
