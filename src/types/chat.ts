/**
 * Chat-side contracts between the Telegram adapter and the router
 */

export type ChatKind = "private" | "group";

export interface ChatEvent {
  chatId: number;
  senderId: number | undefined;
  chatKind: ChatKind;
  text: string;
  /** Bot username without the leading @ */
  botHandle: string;
}

export interface ChatActions {
  reply(text: string): Promise<void>;
  typing(): Promise<void>;
  isMember(userId: number): Promise<boolean>;
  leave(): Promise<void>;
}

export interface AuthorizationPolicy {
  isAllowedChat(chatId: number): boolean;
  isAuthorizedUser(userId: number | undefined): boolean;
  authorizedUsers(): readonly number[];
}

export type RouteOutcome = "replied" | "silent" | "unauthorized" | "left" | "ignored" | "failed";
