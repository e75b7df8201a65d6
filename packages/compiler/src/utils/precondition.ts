/**
 * An internal invariant was broken: a bug in the caller or an upstream
 * stage, never a problem with the compiled source.
 */
export class PreconditionViolation extends Error {
  override name = "PreconditionViolation";
}

export function assertPrecondition(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionViolation(message);
  }
}
