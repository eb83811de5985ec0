import { MailError, RepositoryUnavailableError, describeError } from "../../shared/errors.js";

/**
 * Run a storage operation, reporting driver failures as RepositoryUnavailableError.
 */
export async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof MailError) {
      throw error;
    }
    throw new RepositoryUnavailableError(`${operation} failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
