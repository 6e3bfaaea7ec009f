/**
 * Assistant Service wire shapes and session contracts
 */

export interface AudioOutConfig {
  encoding: "LINEAR16" | "MP3" | "OPUS_IN_OGG";
  sampleRateHertz: number;
  volumePercentage: number;
}

export interface DialogStateIn {
  languageCode: string;
  conversationState: Uint8Array;
}

export interface DeviceConfig {
  deviceId: string;
  deviceModelId: string;
}

export interface AssistConfig {
  textQuery: string;
  audioOutConfig: AudioOutConfig;
  dialogStateIn: DialogStateIn;
  deviceConfig: DeviceConfig;
}

export interface AssistRequest {
  config: AssistConfig;
}

export interface SpeechRecognitionResult {
  transcript?: string | null;
  stability?: number | null;
}

export interface DialogStateOut {
  supplementalDisplayText?: string | null;
  conversationState?: Uint8Array | null;
  microphoneMode?: string | null;
  volumePercentage?: number | null;
}

export interface AssistResponse {
  eventType?: string | null;
  speechResults?: SpeechRecognitionResult[] | null;
  audioOut?: { audioData?: Uint8Array | null } | null;
  dialogStateOut?: DialogStateOut | null;
}

/**
 * One open Assist call. grpc-js duplex streams satisfy this shape.
 */
export interface AssistCall {
  write(request: AssistRequest): boolean;
  end(): void;
  cancel(): void;
  on(event: "data", listener: (response: AssistResponse) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "end", listener: () => void): unknown;
}

export interface AssistCallOptions {
  deadline: Date;
}

export interface AssistantStub {
  assist(options: AssistCallOptions): AssistCall;
}

export interface SessionOptions {
  languageCode: string;
  deviceModelId: string;
  deviceId: string;
  /** Deadline applied to each turn in milliseconds */
  deadlineMs: number;
}

/**
 * Text in, text out. Resolves null when the assistant had nothing to display.
 */
export interface Assistant {
  ask(queryText: string): Promise<string | null>;
}
