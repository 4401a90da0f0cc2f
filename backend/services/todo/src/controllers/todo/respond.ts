// backend/services/todo/src/controllers/todo/respond.ts
import type { Response } from "express";
import type { Outcome } from "../../contracts/outcome";

export const MSG_NOT_FOUND = "To-do item not found";
export const MSG_NOT_FOUND_OR_UNCHANGED = "To-do item not found or no changes made";

/** The one place outcome kinds become HTTP status codes. */
export function statusFor(outcome: Outcome<unknown>, successStatus = 200): number {
  switch (outcome.kind) {
    case "success":
      return successStatus;
    case "validationFailed":
      return 400;
    // No-op updates are reported like a miss; clients depend on the 404.
    case "notFound":
    case "noChange":
      return 404;
    case "storeUnavailable":
      return 500;
  }
}

export type RespondOptions<T> = {
  successStatus?: number;
  body: (value: T) => unknown;
  notFoundMessage?: string;
};

export function respond<T>(
  res: Response,
  outcome: Outcome<T>,
  opts: RespondOptions<T>
): void {
  const status = statusFor(outcome, opts.successStatus);
  switch (outcome.kind) {
    case "success":
      res.status(status).json(opts.body(outcome.value));
      return;
    case "notFound":
    case "noChange":
      res.status(status).json({ error: opts.notFoundMessage ?? MSG_NOT_FOUND });
      return;
    case "validationFailed":
    case "storeUnavailable":
      res.status(status).json({ error: outcome.message });
      return;
  }
}
