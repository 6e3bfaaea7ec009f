/**
 * Static authorization policy built from configured id lists.
 */

import type { AuthorizationPolicy } from "../types";

export interface AuthorizationLists {
  allowedChatIds: readonly number[];
  authorizedUserIds: readonly number[];
}

export function createAuthorizationPolicy(lists: AuthorizationLists): AuthorizationPolicy {
  const allowedChats = new Set(lists.allowedChatIds);
  const authorizedUsers = Object.freeze([...new Set(lists.authorizedUserIds)]);
  const authorizedSet = new Set(authorizedUsers);

  return {
    isAllowedChat(chatId: number): boolean {
      return allowedChats.has(chatId);
    },

    isAuthorizedUser(userId: number | undefined): boolean {
      return userId !== undefined && authorizedSet.has(userId);
    },

    authorizedUsers(): readonly number[] {
      return authorizedUsers;
    },
  };
}
