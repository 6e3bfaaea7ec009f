/**
 * Telegram utility functions
 *
 * Everything that knows about grammY and the Bot API lives here; the router
 * only sees `ChatEvent` and `ChatActions`.
 */

import type { ChatActions, ChatEvent } from "../types";

/** Telegram message character limit, with headroom */
const MAX_MESSAGE_LENGTH = 4000;

const MEMBER_STATUSES: ReadonlySet<string> = new Set(["creator", "administrator", "member"]);

/**
 * The slice of a grammY `Context` the chat actions need.
 */
export interface TelegramChatContext {
  chat: { id: number } | undefined;
  reply(text: string): Promise<unknown>;
  replyWithChatAction(action: "typing"): Promise<unknown>;
  leaveChat(): Promise<unknown>;
  api: {
    getChatMember(chatId: number, userId: number): Promise<{ status: string; is_member?: boolean }>;
  };
}

export interface TelegramTextMessage {
  text: string;
  chat: { id: number; type: string };
  from?: { id: number } | undefined;
}

/**
 * Send a response, chunking if necessary to stay within Telegram limits
 * Attempts to split at natural boundaries (paragraphs, lines, words)
 */
export async function sendResponse(
  ctx: Pick<TelegramChatContext, "reply">,
  response: string
): Promise<void> {
  if (response.length <= MAX_MESSAGE_LENGTH) {
    await ctx.reply(response);
    return;
  }

  for (const chunk of splitMessage(response, MAX_MESSAGE_LENGTH)) {
    await ctx.reply(chunk);
  }
}

/**
 * Split a message into chunks at natural boundaries
 */
export function splitMessage(text: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    let splitIndex = remaining.lastIndexOf("\n\n", maxLength);
    if (splitIndex <= 0) {
      splitIndex = remaining.lastIndexOf("\n", maxLength);
    }
    if (splitIndex <= 0) {
      splitIndex = remaining.lastIndexOf(" ", maxLength);
    }
    if (splitIndex <= 0) {
      splitIndex = maxLength;
    }

    chunks.push(remaining.substring(0, splitIndex));
    remaining = remaining.substring(splitIndex).trim();
  }

  return chunks;
}

/**
 * Map a Telegram text message onto the router's event shape.
 * Anything that is not a one-to-one chat counts as a group.
 */
export function toChatEvent(message: TelegramTextMessage, botHandle: string): ChatEvent {
  return {
    chatId: message.chat.id,
    senderId: message.from?.id,
    chatKind: message.chat.type === "private" ? "private" : "group",
    text: message.text,
    botHandle,
  };
}

/**
 * Bind the router's chat actions to one update's context.
 */
export function createChatActions(ctx: TelegramChatContext): ChatActions {
  const chat = ctx.chat;
  if (!chat) {
    throw new Error("Update has no chat to act on");
  }

  return {
    async reply(text: string): Promise<void> {
      await sendResponse(ctx, text);
    },

    async typing(): Promise<void> {
      await ctx.replyWithChatAction("typing");
    },

    async isMember(userId: number): Promise<boolean> {
      try {
        const member = await ctx.api.getChatMember(chat.id, userId);
        if (member.status === "restricted") {
          return member.is_member === true;
        }
        return MEMBER_STATUSES.has(member.status);
      } catch {
        // The Bot API answers unknown users with an error
        return false;
      }
    },

    async leave(): Promise<void> {
      await ctx.leaveChat();
    },
  };
}
