import { Data } from "effect";

/**
 * Raised as a defect when the store's own bookkeeping is inconsistent. It
 * signals a bug in the store rather than a usage mistake.
 *
 * @since 1.0.0
 * @category errors
 */
export class StoreInvariantError extends Data.TaggedError(
  "StoreInvariantError"
)<{
  readonly message: string;
}> {}
