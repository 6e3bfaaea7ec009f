/**
 * Integration tests for the relay message flow.
 *
 * Tests the full pipeline: ChatEvent → MessageRouter → ConversationSession →
 * scripted Assist stream → chat reply.
 */

import { status } from "@grpc/grpc-js";
import { describe, expect, test } from "vitest";
import { ConversationSession } from "../../src/services/assistant";
import { createAuthorizationPolicy } from "../../src/services/authorization";
import { MessageRouter } from "../../src/services/router";
import type { ChatEvent } from "../../src/types";
import type { TurnScript } from "../setup";
import {
  bytes,
  createFakeChat,
  createScriptedStub,
  createSilentLogger,
  grpcError,
  text,
} from "../setup";

const OWNER = 42;
const STRANGER = 7;
const FAMILY_CHAT = -1001;

function createRelay(scripts: TurnScript[], errorReply = "") {
  const { stub, calls } = createScriptedStub(scripts);
  const session = new ConversationSession(
    stub,
    { languageCode: "en-US", deviceModelId: "test-model", deviceId: "test-device", deadlineMs: 500 },
    createSilentLogger()
  );
  const policy = createAuthorizationPolicy({
    allowedChatIds: [FAMILY_CHAT],
    authorizedUserIds: [OWNER],
  });
  const router = new MessageRouter(session, policy, { errorReply }, createSilentLogger());
  return { router, session, stub, calls };
}

function message(
  chatKind: ChatEvent["chatKind"],
  chatId: number,
  senderId: number,
  body: string
): ChatEvent {
  return { chatId, senderId, chatKind, text: body, botHandle: "helper_bot" };
}

describe("Relay Integration", () => {
  test("private turn replies and the next turn carries the issued token", async () => {
    const { router, calls } = createRelay([
      {
        responses: [
          { dialogStateOut: { supplementalDisplayText: "It's 3pm", conversationState: bytes("X") } },
        ],
      },
      { responses: [{ dialogStateOut: { supplementalDisplayText: "Sunny" } }] },
    ]);
    const chat = createFakeChat();

    await router.handle(message("private", OWNER, OWNER, "what time is it"), chat);
    await router.handle(message("private", OWNER, OWNER, "and the weather?"), chat);

    expect(chat.replies).toEqual(["It's 3pm", "Sunny"]);
    const firstState = calls[0]?.requests[0]?.config.dialogStateIn.conversationState;
    const secondState = calls[1]?.requests[0]?.config.dialogStateIn.conversationState;
    expect(firstState).toHaveLength(0);
    expect(secondState && text(secondState)).toBe("X");
  });

  test("group mention in an allowed chat relays the last display text", async () => {
    const { router, session, calls } = createRelay([
      {
        responses: [
          { dialogStateOut: { conversationState: bytes("A") } },
          { dialogStateOut: { supplementalDisplayText: "done", conversationState: bytes("B") } },
        ],
      },
    ]);
    const chat = createFakeChat();

    const outcome = await router.handle(
      message("group", FAMILY_CHAT, STRANGER, "@helper_bot turn on the lights"),
      chat
    );

    expect(outcome).toBe("replied");
    expect(calls[0]?.requests[0]?.config.textQuery).toBe("turn on the lights");
    expect(chat.replies).toEqual(["done"]);
    expect(text(session.conversationState)).toBe("B");
  });

  test("unauthorized private sender never reaches the assistant", async () => {
    const { router, stub } = createRelay([]);
    const chat = createFakeChat();

    const outcome = await router.handle(message("private", STRANGER, STRANGER, "hello"), chat);

    expect(outcome).toBe("unauthorized");
    expect(chat.replies).toEqual(["Unauthorized"]);
    expect(stub.assist).not.toHaveBeenCalled();
  });

  test("stranger's mention in a foreign chat without the owner: Unauthorized and leave", async () => {
    const { router, stub } = createRelay([]);
    const chat = createFakeChat([STRANGER]);

    const outcome = await router.handle(message("group", -5005, STRANGER, "@helper_bot hello"), chat);

    expect(outcome).toBe("left");
    expect(chat.replies).toEqual(["Unauthorized"]);
    expect(chat.left).toBe(true);
    expect(stub.assist).not.toHaveBeenCalled();
  });

  test("stream error mid-turn keeps the token and the chat hears the error reply", async () => {
    const { router, session } = createRelay(
      [
        { responses: [{ dialogStateOut: { conversationState: bytes("before") } }] },
        {
          responses: [{ dialogStateOut: { conversationState: bytes("after") } }],
          error: grpcError(status.INTERNAL, "backend failure"),
        },
      ],
      "The assistant is unavailable right now."
    );
    const chat = createFakeChat();

    await expect(router.handle(message("private", OWNER, OWNER, "one"), chat)).resolves.toBe(
      "silent"
    );
    await expect(router.handle(message("private", OWNER, OWNER, "two"), chat)).resolves.toBe(
      "failed"
    );

    expect(chat.replies).toEqual(["The assistant is unavailable right now."]);
    expect(text(session.conversationState)).toBe("before");
  });

  test("messages from different chats share one session without tearing the token", async () => {
    const { router, session, calls } = createRelay([
      {
        responses: [{ dialogStateOut: { supplementalDisplayText: "one", conversationState: bytes("T1") } }],
        delayMs: 20,
      },
      {
        responses: [{ dialogStateOut: { supplementalDisplayText: "two", conversationState: bytes("T2") } }],
      },
    ]);
    const privateChat = createFakeChat();
    const groupChat = createFakeChat();

    await Promise.all([
      router.handle(message("private", OWNER, OWNER, "first"), privateChat),
      router.handle(message("group", FAMILY_CHAT, STRANGER, "@helper_bot second"), groupChat),
    ]);

    expect(privateChat.replies).toEqual(["one"]);
    expect(groupChat.replies).toEqual(["two"]);
    const secondState = calls[1]?.requests[0]?.config.dialogStateIn.conversationState;
    expect(secondState && text(secondState)).toBe("T1");
    expect(text(session.conversationState)).toBe("T2");
  });
});
