/**
 * Effect platform layer for file I/O
 *
 * All file system access goes through `@effect/platform`'s FileSystem
 * service; this module supplies the Node.js implementation and runs programs
 * against it behind a Promise API.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Services available to programs run by {@link runWithPlatform}
 */
export type PlatformServices = NodeContext.NodeContext;

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run an Effect program with the platform layer provided
 *
 * The program's typed failure is rethrown as-is, so callers see the same
 * error classes they mapped to inside the program.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, PlatformServices>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
