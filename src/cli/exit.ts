import { ZodError } from 'zod';

/** Exit code when a run finishes without its evaluations passing. */
export const EXIT_NOT_CONVERGED = 1;

const EXIT_CONFIG = 2;
const EXIT_UNEXPECTED = 5;

/**
 * Map a thrown value to a process exit code. Library errors carry their
 * own `exitCode`; invalid config files surface as zod errors.
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ZodError) return EXIT_CONFIG;
  if (
    err instanceof Error &&
    'exitCode' in err &&
    typeof err.exitCode === 'number'
  ) {
    return err.exitCode;
  }
  return EXIT_UNEXPECTED;
}
