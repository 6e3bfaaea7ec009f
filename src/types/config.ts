/**
 * Configuration types for the Assistant Telegram Bridge
 */

export interface AppConfig {
  /** Telegram bot token from @BotFather */
  botToken: string;

  /** Group chats the bot answers in regardless of sender */
  allowedChatIds: number[];

  /** Users the bot answers anywhere, including private chats */
  authorizedUserIds: number[];

  /** Registered device model presented to the assistant */
  deviceModelId: string;

  /** Registered device instance presented to the assistant */
  deviceId: string;

  /** Address of the Google Assistant API service */
  apiEndpoint: string;

  /** OAuth2 credentials file written by google-oauthlib-tool */
  credentialsPath: string;

  /** Language code of the assistant conversation */
  languageCode: string;

  /** Deadline for one assistant turn in milliseconds */
  deadlineMs: number;

  /** Reply sent to the chat when a turn fails (empty = stay silent) */
  errorReply: string;

  /** Environment mode */
  nodeEnv: "development" | "production" | "test";

  /** Log level */
  logLevel: "debug" | "info" | "warn" | "error" | "silent";
}
