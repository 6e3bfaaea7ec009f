/**
 * Transport channel to the Assistant Service
 *
 * Loads the OAuth2 credentials written by google-oauthlib-tool and opens one
 * TLS gRPC channel that every turn reuses. Each call carries a fresh bearer
 * token from the OAuth2 client.
 */

import { readFile } from "fs/promises";
import { Client, Metadata, credentials as grpcCredentials } from "@grpc/grpc-js";
import type { ChannelCredentials } from "@grpc/grpc-js";
import { OAuth2Client } from "google-auth-library";
import type { Logger } from "pino";
import { z } from "zod";
import type { AssistCallOptions, AssistRequest, AssistResponse, AssistantStub } from "../types";
import { loadAssistMethod, parseAssistResponse } from "./protocol";

const storedCredentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token_uri: z.string().url().optional(),
  scopes: z.array(z.string()).optional(),
});

export type StoredCredentials = z.infer<typeof storedCredentialsSchema>;

type MetadataGenerator = Parameters<typeof grpcCredentials.createFromMetadataGenerator>[0];

export interface AssistantChannel {
  stub: AssistantStub;
  close(): void;
}

/**
 * Read the credentials file and refresh an access token once, so that
 * revoked or malformed credentials fail at startup.
 * @throws Error if the file is missing, malformed, or the refresh fails
 */
export async function loadCredentials(path: string, logger: Logger): Promise<OAuth2Client> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
  const stored = storedCredentialsSchema.parse(raw);

  const client = new OAuth2Client({
    clientId: stored.client_id,
    clientSecret: stored.client_secret,
    ...(stored.token_uri ? { endpoints: { oauth2TokenUrl: stored.token_uri } } : {}),
  });
  client.setCredentials({
    refresh_token: stored.refresh_token,
    scope: stored.scopes?.join(" "),
  });

  const { token } = await client.getAccessToken();
  if (!token) {
    throw new Error("OAuth2 refresh returned no access token");
  }

  logger.debug({ path, scopes: stored.scopes }, "OAuth2 credentials refreshed");
  return client;
}

/**
 * Per-call metadata carrying a fresh bearer token. A call fails if no token
 * can be had.
 */
export function createBearerMetadataGenerator(
  oauth: Pick<OAuth2Client, "getAccessToken">
): MetadataGenerator {
  return (_params, callback) => {
    oauth.getAccessToken().then(
      ({ token }) => {
        if (!token) {
          callback(new Error("OAuth2 client has no access token"));
          return;
        }
        const metadata = new Metadata();
        metadata.add("authorization", `Bearer ${token}`);
        callback(null, metadata);
      },
      (error: unknown) => {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    );
  };
}

/**
 * Channel credentials: TLS plus a per-call bearer token.
 */
export function createChannelCredentials(
  oauth: Pick<OAuth2Client, "getAccessToken">
): ChannelCredentials {
  return grpcCredentials.combineChannelCredentials(
    grpcCredentials.createSsl(),
    grpcCredentials.createFromMetadataGenerator(createBearerMetadataGenerator(oauth))
  );
}

/**
 * Open the long-lived channel and expose the `Assist` call on it.
 */
export function createAssistantChannel(
  endpoint: string,
  channelCredentials: ChannelCredentials
): AssistantChannel {
  const method = loadAssistMethod();
  const client = new Client(endpoint, channelCredentials);

  return {
    stub: {
      assist(options: AssistCallOptions) {
        return client.makeBidiStreamRequest<AssistRequest, AssistResponse>(
          method.path,
          (request) => method.requestSerialize(request),
          (buffer) => parseAssistResponse(method.responseDeserialize(buffer)),
          new Metadata(),
          { deadline: options.deadline }
        );
      },
    },
    close() {
      client.close();
    },
  };
}
