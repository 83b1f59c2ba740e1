export { createTranscriptGateway, shapeTranscript } from "./service.js";
export type {
  LanguageTranscriptRequest,
  TranscriptGateway,
  TranscriptRequest,
} from "./service.js";
export { parseYouTubeVideoId, resolveVideoId } from "./parse-url.js";
export { createYouTubeTranscriptProvider, findTranscript } from "./transcript.js";
export type { YouTubeProviderOptions } from "./transcript.js";
export { createProxyFetch } from "./proxy.js";
export type { ProxyFetch } from "./proxy.js";
export { GatewayError, TranscriptError, classifyProviderError } from "./errors.js";
export type { GatewayErrorKind, TranscriptErrorKind } from "./errors.js";
export type {
  AvailableTranscript,
  CaptionEntry,
  FetchFn,
  LanguageDescriptor,
  LanguagesResponse,
  ProxyConfig,
  TranscriptProvider,
  TranscriptResponse,
} from "./types.js";
