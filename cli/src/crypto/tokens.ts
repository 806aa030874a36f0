/**
 * Random tokens for the appservice registration and the provisioning API.
 */

import crypto from 'node:crypto';

const TOKEN_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const TOKEN_LENGTH = 64;

/**
 * Generate a token of lowercase letters and digits.
 */
export function generateToken(length = TOKEN_LENGTH): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += TOKEN_ALPHABET[crypto.randomInt(TOKEN_ALPHABET.length)];
  }
  return token;
}
