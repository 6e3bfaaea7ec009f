/**
 * Assistant Telegram Bridge - Entry Point
 *
 * Validates configuration, opens the assistant channel, and starts
 * long polling.
 *
 * Run: npm run start
 */

import type { OAuth2Client } from "google-auth-library";
import { Bot } from "grammy";

import { validateConfig } from "./config";
import {
  ConversationSession,
  MessageRouter,
  createAssistantChannel,
  createAuthorizationPolicy,
  createChannelCredentials,
  loadCredentials,
} from "./services";
import type { AssistantChannel } from "./services";
import type { AppConfig } from "./types";
import { createChatActions, createLogger, toChatEvent } from "./utils";

export * from "./types";
export * from "./config";
export * from "./utils";

const log = createLogger("main");

async function main(): Promise<void> {
  const validation = validateConfig();
  if (!validation.success) {
    console.error("Configuration error:");
    for (const error of validation.errors) {
      console.error(error);
    }
    console.log("\nSetup instructions:");
    console.log("1. Copy .env.example to .env");
    console.log("2. Set TELEGRAM_BOT_TOKEN from @BotFather");
    console.log("3. Set DEVICE_MODEL_ID and DEVICE_ID of your registered Assistant device");
    console.log("4. Set AUTHORIZED_USER_IDS (and ALLOWED_CHAT_IDS for groups)");
    process.exit(1);
  }

  const config = validation.config;
  log.info({ nodeEnv: config.nodeEnv }, "Configuration loaded");

  let oauth: OAuth2Client;
  try {
    oauth = await loadCredentials(config.credentialsPath, createLogger("credentials"));
  } catch (error) {
    log.error({ error, path: config.credentialsPath }, "Error loading credentials");
    log.error("Run google-oauthlib-tool to initialize new OAuth 2.0 credentials.");
    process.exit(1);
  }

  const channel = createAssistantChannel(config.apiEndpoint, createChannelCredentials(oauth));
  log.info({ endpoint: config.apiEndpoint }, "Connecting to assistant endpoint");

  await startBot(config, channel);
}

async function startBot(config: AppConfig, channel: AssistantChannel): Promise<void> {
  const bot = new Bot(config.botToken);
  const session = new ConversationSession(
    channel.stub,
    {
      languageCode: config.languageCode,
      deviceModelId: config.deviceModelId,
      deviceId: config.deviceId,
      deadlineMs: config.deadlineMs,
    },
    createLogger("assistant")
  );
  const policy = createAuthorizationPolicy(config);
  const router = new MessageRouter(
    session,
    policy,
    { errorReply: config.errorReply },
    createLogger("router")
  );

  bot.on("message:text", async (ctx) => {
    const event = toChatEvent(ctx.message, ctx.me.username);
    log.info(
      { chatId: event.chatId, chatKind: event.chatKind, text: event.text.substring(0, 50) },
      "Message received"
    );

    const outcome = await router.handle(event, createChatActions(ctx));
    log.debug({ chatId: event.chatId, outcome }, "Message handled");
  });

  bot.catch((error) => {
    log.error({ error: error.error, updateId: error.ctx.update.update_id }, "Update failed");
  });

  const shutdown = () => {
    log.info("Shutting down");
    channel.close();
    bot.stop().catch((error: unknown) => {
      log.error({ error }, "Bot did not stop cleanly");
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  log.info(
    {
      allowedChats: config.allowedChatIds.length,
      authorizedUsers: config.authorizedUserIds.length,
    },
    "Starting Assistant Telegram Bridge"
  );

  await bot.start({
    onStart: (me) => {
      log.info({ username: me.username }, "Bot is running");
    },
  });
}

// Run if this is the main module
if (require.main === module) {
  main().catch((error) => {
    log.error({ error }, "Fatal error");
    process.exit(1);
  });
}
