// backend/services/todo/src/contracts/outcome.ts

/**
 * Tagged result of every validator and repository call. Handlers never catch
 * driver exceptions; they switch on `kind` (see controllers/todo/respond.ts).
 */
export type Outcome<T> =
  | { kind: "success"; value: T }
  | { kind: "notFound" }
  /** Document matched but the update changed nothing. */
  | { kind: "noChange" }
  | { kind: "validationFailed"; message: string }
  | { kind: "storeUnavailable"; message: string };

export type Failure = Exclude<Outcome<never>, { kind: "success" }>;

export const success = <T>(value: T): Outcome<T> => ({ kind: "success", value });

export const validationFailed = (message: string): Failure => ({
  kind: "validationFailed",
  message,
});

export function storeUnavailable(err: unknown): Failure {
  const message =
    err instanceof Error ? err.message : String(err ?? "store error");
  return { kind: "storeUnavailable", message };
}
