import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { generateToken } from '../crypto/tokens.js';

describe('generateToken', () => {
  it('generates 64 lowercase letters and digits', () => {
    assert.match(generateToken(), /^[a-z0-9]{64}$/);
  });

  it('takes a length', () => {
    assert.equal(generateToken(16).length, 16);
  });

  it('generates a different token each time', () => {
    assert.notEqual(generateToken(), generateToken());
  });
});
