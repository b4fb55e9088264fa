/**
 * Payment Processor - Credential Shape
 *
 * The ONLY place an API key's shape is inspected. No network validation.
 */

export type CredentialShape = 'live' | 'test' | 'unrecognized';

const LIVE_PREFIXES = ['sk_live_', 'rk_live_'] as const;
const TEST_PREFIXES = ['sk_test_', 'rk_test_'] as const;

export function classifyCredential(apiKey: string): CredentialShape {
  const key = apiKey.trim();

  if (LIVE_PREFIXES.some((prefix) => key.startsWith(prefix))) {
    return 'live';
  }
  if (TEST_PREFIXES.some((prefix) => key.startsWith(prefix))) {
    return 'test';
  }
  return 'unrecognized';
}

/**
 * Safe for logs: keeps the prefix up to the mode segment, drops the secret
 */
export function maskCredential(apiKey: string): string {
  const key = apiKey.trim();
  const match = /^([a-z]{2}_(?:live|test)_)/.exec(key);
  if (match) {
    return `${match[1]}****`;
  }
  return key.length > 4 ? `${key.slice(0, 3)}****` : '****';
}
