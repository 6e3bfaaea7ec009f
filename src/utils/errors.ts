/**
 * Failure taxonomy for assistant turns.
 *
 * Every failure of `ConversationSession.ask` is one of these. The router
 * decides what, if anything, the chat sees.
 */

import { status } from "@grpc/grpc-js";

export type AssistantErrorKind = "transport" | "deadline_exceeded" | "remote_service";

export class AssistantError extends Error {
  public readonly kind: AssistantErrorKind;
  /** gRPC status code, when the failure came with one */
  public readonly code: number | undefined;

  public constructor(
    message: string,
    kind: AssistantErrorKind,
    code?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AssistantError";
    this.kind = kind;
    this.code = code;
  }
}

export class TransportError extends AssistantError {
  public constructor(message: string, code?: number, options?: { cause?: unknown }) {
    super(message, "transport", code, options);
    this.name = "TransportError";
  }
}

export class DeadlineExceededError extends AssistantError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, "deadline_exceeded", status.DEADLINE_EXCEEDED, options);
    this.name = "DeadlineExceededError";
  }
}

export class RemoteServiceError extends AssistantError {
  public constructor(message: string, code: number, options?: { cause?: unknown }) {
    super(message, "remote_service", code, options);
    this.name = "RemoteServiceError";
  }
}

const TRANSPORT_CODES: ReadonlySet<number> = new Set([status.UNAVAILABLE, status.CANCELLED]);

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "number" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Map anything a call threw or emitted onto the taxonomy.
 */
export function classifyCallError(error: unknown): AssistantError {
  if (error instanceof AssistantError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = statusCodeOf(error);

  if (code === status.DEADLINE_EXCEEDED) {
    return new DeadlineExceededError(message, { cause: error });
  }
  if (code === undefined || TRANSPORT_CODES.has(code)) {
    return new TransportError(message, code, { cause: error });
  }
  return new RemoteServiceError(message, code, { cause: error });
}
