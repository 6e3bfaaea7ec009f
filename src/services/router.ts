/**
 * MessageRouter - decides whether a chat message reaches the assistant
 *
 * Private chats: authorized users only, full text is the query.
 * Groups: only messages that open with @<bot>, the rest of the text is the
 * query. Strangers in chats that are not allowed get "Unauthorized", and the
 * bot leaves once no authorized user is left in that chat.
 */

import type { Logger } from "pino";
import type {
  Assistant,
  AuthorizationPolicy,
  ChatActions,
  ChatEvent,
  RouteOutcome,
} from "../types";
import { AssistantError } from "../utils/errors";

export const UNAUTHORIZED_REPLY = "Unauthorized";

export interface RouterOptions {
  /** Sent when a turn fails; empty keeps the bot silent */
  errorReply: string;
}

/**
 * Return the query of a message addressed to the bot, "" if the mention has
 * nothing after it, or null if the message does not open with the mention.
 */
export function extractMentionQuery(text: string, botHandle: string): string | null {
  const trimmed = text.trimStart();
  const boundary = trimmed.search(/\s/);
  const head = boundary === -1 ? trimmed : trimmed.slice(0, boundary);

  if (head.toLowerCase() !== `@${botHandle}`.toLowerCase()) {
    return null;
  }
  return boundary === -1 ? "" : trimmed.slice(boundary).trim();
}

export class MessageRouter {
  private assistant: Assistant;
  private policy: AuthorizationPolicy;
  private options: RouterOptions;
  private log: Logger;

  constructor(
    assistant: Assistant,
    policy: AuthorizationPolicy,
    options: RouterOptions,
    logger: Logger
  ) {
    this.assistant = assistant;
    this.policy = policy;
    this.options = options;
    this.log = logger;
  }

  async handle(event: ChatEvent, chat: ChatActions): Promise<RouteOutcome> {
    if (event.chatKind === "private") {
      return this.handlePrivate(event, chat);
    }
    return this.handleGroup(event, chat);
  }

  private async handlePrivate(event: ChatEvent, chat: ChatActions): Promise<RouteOutcome> {
    if (!this.policy.isAuthorizedUser(event.senderId)) {
      this.log.warn({ senderId: event.senderId }, "Unauthorized private message");
      await chat.reply(UNAUTHORIZED_REPLY);
      return "unauthorized";
    }

    if (!event.text.trim()) {
      return "ignored";
    }
    return this.relay(event.text, event, chat);
  }

  private async handleGroup(event: ChatEvent, chat: ChatActions): Promise<RouteOutcome> {
    const query = extractMentionQuery(event.text, event.botHandle);
    if (!query) {
      return "ignored";
    }

    if (!this.policy.isAllowedChat(event.chatId) && !this.policy.isAuthorizedUser(event.senderId)) {
      this.log.warn({ chatId: event.chatId, senderId: event.senderId }, "Unauthorized group mention");
      await chat.reply(UNAUTHORIZED_REPLY);

      if (await this.hasAuthorizedMember(chat)) {
        return "unauthorized";
      }

      this.log.info({ chatId: event.chatId }, "No authorized member left, leaving chat");
      await chat.leave();
      return "left";
    }

    return this.relay(query, event, chat);
  }

  private async hasAuthorizedMember(chat: ChatActions): Promise<boolean> {
    for (const userId of this.policy.authorizedUsers()) {
      try {
        if (await chat.isMember(userId)) {
          return true;
        }
      } catch (error) {
        this.log.debug({ userId, error }, "Membership probe failed");
      }
    }
    return false;
  }

  private async relay(query: string, event: ChatEvent, chat: ChatActions): Promise<RouteOutcome> {
    await chat.typing();

    let reply: string | null;
    try {
      reply = await this.assistant.ask(query);
    } catch (error) {
      if (!(error instanceof AssistantError)) {
        throw error;
      }

      this.log.warn(
        { chatId: event.chatId, kind: error.kind, code: error.code, error: error.message },
        "Assistant turn failed"
      );
      if (this.options.errorReply) {
        await chat.reply(this.options.errorReply);
      }
      return "failed";
    }

    if (reply === null) {
      this.log.debug({ chatId: event.chatId }, "Assistant returned no display text");
      return "silent";
    }

    await chat.reply(reply);
    return "replied";
  }
}
