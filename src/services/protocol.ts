/**
 * Assistant Service wire protocol
 *
 * Loads the EmbeddedAssistant definition from the bundled .proto at run time,
 * validates what comes off the wire, and builds the single request a turn
 * sends.
 */

import { join } from "path";
import type { MethodDefinition, ServiceDefinition } from "@grpc/proto-loader";
import { loadSync } from "@grpc/proto-loader";
import { z } from "zod";
import type { AssistRequest, AssistResponse, SessionOptions } from "../types";

export const PROTO_ROOT = join(__dirname, "..", "..", "protos");
export const PROTO_FILE = "google/assistant/embedded/v1alpha2/embedded_assistant.proto";
export const SERVICE_NAME = "google.assistant.embedded.v1alpha2.EmbeddedAssistant";

/** Audio is requested but never played back */
const AUDIO_OUT = {
  encoding: "LINEAR16",
  sampleRateHertz: 16000,
  volumePercentage: 0,
} as const;

const bytes = z.instanceof(Uint8Array);

export const assistResponseSchema = z.object({
  eventType: z.string().nullish(),
  speechResults: z
    .array(
      z.object({
        transcript: z.string().nullish(),
        stability: z.number().nullish(),
      })
    )
    .nullish(),
  audioOut: z.object({ audioData: bytes.nullish() }).nullish(),
  dialogStateOut: z
    .object({
      supplementalDisplayText: z.string().nullish(),
      conversationState: bytes.nullish(),
      microphoneMode: z.string().nullish(),
      volumePercentage: z.number().nullish(),
    })
    .nullish(),
});

/**
 * Validate a deserialized response, dropping fields this client never reads.
 * @throws ZodError when the message does not have the expected shape
 */
export function parseAssistResponse(value: unknown): AssistResponse {
  return assistResponseSchema.parse(value);
}

/**
 * Load the EmbeddedAssistant service definition from the bundled proto.
 */
export function loadAssistService(): ServiceDefinition {
  const definition = loadSync(PROTO_FILE, {
    includeDirs: [PROTO_ROOT],
    keepCase: false,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true,
  });

  const service = definition[SERVICE_NAME];
  if (!service || "format" in service) {
    throw new Error(`${SERVICE_NAME} not found in ${PROTO_FILE}`);
  }
  return service;
}

/**
 * The bidirectional `Assist` method: path, serializers, and stream flags.
 */
export function loadAssistMethod(): MethodDefinition<object, object> {
  const method = loadAssistService()["Assist"];
  if (!method || !method.requestStream || !method.responseStream) {
    throw new Error(`${SERVICE_NAME}.Assist is not a bidirectional stream`);
  }
  return method;
}

/**
 * Build the one request a turn sends: dialog state, fixed audio output,
 * device identity, and the text query.
 */
export function buildAssistRequest(
  queryText: string,
  conversationState: Uint8Array,
  options: Pick<SessionOptions, "languageCode" | "deviceId" | "deviceModelId">
): AssistRequest {
  return {
    config: {
      textQuery: queryText,
      audioOutConfig: { ...AUDIO_OUT },
      dialogStateIn: {
        languageCode: options.languageCode,
        conversationState,
      },
      deviceConfig: {
        deviceId: options.deviceId,
        deviceModelId: options.deviceModelId,
      },
    },
  };
}

/**
 * Log-safe view of a request.
 */
export function describeAssistRequest(request: AssistRequest): Record<string, unknown> {
  const { config } = request;
  return {
    textQuery: config.textQuery,
    languageCode: config.dialogStateIn.languageCode,
    conversationStateBytes: config.dialogStateIn.conversationState.length,
    deviceId: config.deviceConfig.deviceId,
    deviceModelId: config.deviceConfig.deviceModelId,
  };
}

/**
 * Log-safe view of a response: audio is reduced to its size.
 */
export function describeAssistResponse(response: AssistResponse): Record<string, unknown> {
  const view: Record<string, unknown> = {};

  if (response.eventType) {
    view["eventType"] = response.eventType;
  }
  const transcripts = (response.speechResults ?? [])
    .map((result) => result.transcript)
    .filter((transcript): transcript is string => Boolean(transcript));
  if (transcripts.length > 0) {
    view["transcripts"] = transcripts;
  }
  if (response.audioOut?.audioData) {
    view["audioBytes"] = response.audioOut.audioData.length;
  }

  const dialog = response.dialogStateOut;
  if (dialog?.supplementalDisplayText) {
    view["displayText"] = dialog.supplementalDisplayText;
  }
  if (dialog?.conversationState && dialog.conversationState.length > 0) {
    view["conversationStateBytes"] = dialog.conversationState.length;
  }

  return view;
}
