/**
 * Centralized type exports
 */

export type { AppConfig } from "./config";
export type {
  AssistCall,
  AssistCallOptions,
  AssistConfig,
  AssistRequest,
  AssistResponse,
  Assistant,
  AssistantStub,
  AudioOutConfig,
  DeviceConfig,
  DialogStateIn,
  DialogStateOut,
  SessionOptions,
  SpeechRecognitionResult,
} from "./assistant";
export type {
  AuthorizationPolicy,
  ChatActions,
  ChatEvent,
  ChatKind,
  RouteOutcome,
} from "./chat";
