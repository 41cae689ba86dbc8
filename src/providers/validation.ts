/**
 * API Key Checks
 *
 * Format checks for the Gemini API key, and masking for display.
 *
 * SECURITY: These functions NEVER log the key, and error messages never
 * contain it.
 */

import { z } from 'zod';

/**
 * Result of checking a key.
 */
export type KeyCheckResult = { valid: true } | { valid: false; error: string };

/**
 * Google API keys: "AIza" followed by 35 URL-safe characters.
 *
 * A key that fails this check is still saved (formats change); the
 * Settings screen shows the warning.
 */
export const GeminiKeySchema = z
  .string()
  .trim()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => /^AIza[0-9A-Za-z_-]{35}$/.test(key),
    'Unusual Gemini API key format (keys usually start with "AIza" and are 39 characters long)'
  );

export function checkGeminiKeyFormat(key: string): KeyCheckResult {
  const result = GeminiKeySchema.safeParse(key);
  if (result.success) {
    return { valid: true };
  }
  return { valid: false, error: result.error.issues[0]?.message ?? 'Invalid API key format' };
}

/**
 * `AIza…WXYZ` style preview; short values are fully hidden.
 */
export function maskApiKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed.length <= 8) {
    return '•'.repeat(trimmed.length);
  }
  return `${trimmed.slice(0, 4)}…${trimmed.slice(-4)}`;
}
