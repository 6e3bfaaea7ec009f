/**
 * ConversationSession - one assistant identity, one continuity token
 *
 * Turns a bidirectional Assist stream into `ask(text) -> reply`. Each turn
 * sends a single request, drains every response, and only then commits the
 * newest conversation state token. Turns run one at a time.
 */

import type { Logger } from "pino";
import type {
  AssistCall,
  AssistResponse,
  Assistant,
  AssistantStub,
  SessionOptions,
} from "../types";
import { MAX_DEADLINE_MS } from "../config/schema";
import { DeadlineExceededError, classifyCallError } from "../utils/errors";
import { SerialQueue } from "../utils/queue";
import { buildAssistRequest, describeAssistRequest, describeAssistResponse } from "./protocol";

const EMPTY_STATE = new Uint8Array(0);

export class ConversationSession implements Assistant {
  private stub: AssistantStub;
  private options: Readonly<SessionOptions>;
  private log: Logger;
  private queue = new SerialQueue();
  private state: Uint8Array = EMPTY_STATE;

  constructor(stub: AssistantStub, options: SessionOptions, logger: Logger) {
    const { deadlineMs } = options;
    if (!Number.isInteger(deadlineMs) || deadlineMs <= 0 || deadlineMs > MAX_DEADLINE_MS) {
      throw new RangeError(`deadlineMs must be an integer between 1 and ${MAX_DEADLINE_MS}`);
    }
    this.stub = stub;
    this.options = { ...options };
    this.log = logger;
  }

  /** Copy of the token the next turn will send; empty until the service issues one. */
  get conversationState(): Uint8Array {
    return this.state.slice();
  }

  /**
   * Ask the assistant one question.
   * Resolves with the last display text of the turn, or null if there was none.
   * Rejects with an `AssistantError`; the stored token is then left as it was.
   */
  async ask(queryText: string): Promise<string | null> {
    if (!queryText.trim()) {
      throw new RangeError("Query text must not be empty");
    }

    return this.queue.run(() => this.runTurn(queryText));
  }

  private runTurn(queryText: string): Promise<string | null> {
    const { deadlineMs } = this.options;
    const request = buildAssistRequest(queryText, this.state, this.options);
    const startTime = Date.now();

    this.log.debug({ request: describeAssistRequest(request), deadlineMs }, "Assist request");

    return new Promise<string | null>((resolve, reject) => {
      let call: AssistCall;
      try {
        call = this.stub.assist({ deadline: new Date(startTime + deadlineMs) });
      } catch (error: unknown) {
        reject(classifyCallError(error));
        return;
      }

      let pendingState: Uint8Array | null = null;
      let displayText: string | null = null;
      let settled = false;

      const timer = setTimeout(() => {
        finish(new DeadlineExceededError(`Assist call exceeded its ${deadlineMs}ms deadline`));
        call.cancel();
      }, deadlineMs);

      const finish = (error: Error | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        const duration = Date.now() - startTime;

        if (error) {
          const failure = classifyCallError(error);
          this.log.debug({ kind: failure.kind, code: failure.code, duration }, "Assist turn failed");
          reject(failure);
          return;
        }

        if (pendingState) {
          this.state = pendingState;
        }
        this.log.debug(
          { duration, hasReply: displayText !== null, stateBytes: this.state.length },
          "Assist turn completed"
        );
        resolve(displayText);
      };

      call.on("data", (response: AssistResponse) => {
        if (settled) return;
        this.log.debug({ response: describeAssistResponse(response) }, "Assist response");

        const dialog = response.dialogStateOut;
        if (dialog?.conversationState && dialog.conversationState.length > 0) {
          pendingState = dialog.conversationState;
        }
        if (dialog?.supplementalDisplayText) {
          displayText = dialog.supplementalDisplayText;
        }
      });
      call.on("error", (error: Error) => finish(error));
      call.on("end", () => finish(null));

      try {
        call.write(request);
        call.end();
      } catch (error: unknown) {
        finish(error instanceof Error ? error : new Error(String(error)));
        call.cancel();
      }
    });
  }
}
