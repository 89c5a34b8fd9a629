import { BuildFailedError, toError, type ErrorContext } from '../errors/base.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * Invoke a builder step, converting anything it throws into BuildFailed.
 * This is the one place the SDK catches foreign exceptions.
 */
export async function runBuilder<T>(
  step: string,
  build: () => Promise<T>,
  context: ErrorContext = {}
): Promise<Result<T, BuildFailedError>> {
  try {
    return ok(await build());
  } catch (error) {
    const cause = toError(error);
    return err(
      new BuildFailedError(`Failed to build ${step} transaction: ${cause.message}`, {
        cause,
        context,
      })
    );
  }
}
