/**
 * Effect platform layer selection and effect execution for file I/O
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";
import { AnnotationError, FileError } from "../errors";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided file effect behind a Promise API
 *
 * Library errors raised inside the effect propagate unchanged; platform
 * failures are converted into a {@link FileError} for `filePath`.
 */
export async function runFileEffect<A, E>(
  program: Effect.Effect<A, E>,
  filePath: string,
  operation: FileError["operation"]
): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }

  const error = Cause.squash(exit.cause);
  if (error instanceof AnnotationError) {
    throw error;
  }
  throw FileError.fromSystemError(operation, filePath, error);
}
