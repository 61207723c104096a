import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

/** Transform a Done value, keeping its metadata. A Fail passes through. */
export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  if (isDone(o)) {
    return { ...o, value: fn(o.value) };
  }
  return o;
}

/**
 * Feed a Done value to the next validation or request step. The first Fail
 * short-circuits, so nothing after a rejected step runs.
 */
export function andThen<A, B>(o: Outcome<A>, fn: (a: A) => Outcome<B>): Outcome<B> {
  return isDone(o) ? fn(o.value) : o;
}
