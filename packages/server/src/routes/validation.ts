import type { ZodError } from 'zod';

/**
 * zValidator hook that hands failures to the global error handler
 */
export function throwOnInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}
