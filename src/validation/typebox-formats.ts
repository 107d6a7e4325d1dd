import { FormatRegistry } from '@sinclair/typebox';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Registers the string formats our schemas use. TypeBox rejects any value whose format
 * it does not know, so this has to run before the first check. Safe to call repeatedly.
 */
export function initializeTypeBox(): void {
  if (!FormatRegistry.Has('email')) {
    FormatRegistry.Set('email', (value) => EMAIL_PATTERN.test(value));
  }
}
