/**
 * Orchestration error taxonomy reported to callers of the engine
 */

export type OrchestrationErrorKind =
  | "Transient"
  | "Fatal"
  | "AllProvidersExhausted"
  | "ContextOverflow"
  | "SummarizationFailed"
  | "BudgetExceeded"
  | "NotFound"
  | "TurnInProgress"
  | "Cancelled";

export class OrchestrationError extends Error {
  readonly kind: OrchestrationErrorKind;
  readonly details: Record<string, unknown>;

  constructor(
    kind: OrchestrationErrorKind,
    message: string,
    params: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: params.cause });
    this.name = "OrchestrationError";
    this.kind = kind;
    this.details = params.details ?? {};
  }
}

export function isOrchestrationError(err: unknown): err is OrchestrationError {
  return err instanceof OrchestrationError;
}

export function cancelledError(cause?: unknown): OrchestrationError {
  return new OrchestrationError("Cancelled", "Turn was cancelled", { cause });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
