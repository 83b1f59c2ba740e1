/** A single timed caption entry, times in seconds. */
export type CaptionEntry = {
  text: string;
  start: number;
  duration: number;
};

/** One caption language available for a video. */
export type LanguageDescriptor = {
  language: string;
  language_code: string;
  is_generated: boolean;
  is_translatable: boolean;
};

/** Response envelope for the transcript routes. */
export type TranscriptResponse = {
  video_id: string;
  /** Only set when a specific language was requested. */
  language?: string;
  transcript: CaptionEntry[];
  /** Entry texts joined with single spaces, trimmed. */
  full_text: string;
  total_entries: number;
  proxy_used: boolean;
};

export type LanguagesResponse = {
  video_id: string;
  available_languages: LanguageDescriptor[];
  total_languages: number;
  proxy_used: boolean;
};

/** Proxy endpoints keyed by scheme, e.g. `{ http: url, https: url }`. */
export type ProxyConfig = {
  http?: string;
  https?: string;
};

/** A caption track that exists for a video, fetched lazily. */
export type AvailableTranscript = {
  language: string;
  languageCode: string;
  isGenerated: boolean;
  isTranslatable: boolean;
  fetch: () => Promise<CaptionEntry[]>;
};

export type GetTranscriptOptions = {
  /** Language codes in preference order. Provider default: `["en"]`. */
  languages?: string[];
  proxies?: ProxyConfig;
};

export type ListTranscriptsOptions = {
  proxies?: ProxyConfig;
};

/**
 * Source of caption data. Implementations raise `TranscriptError` with a
 * structured kind where they can.
 */
export interface TranscriptProvider {
  getTranscript(videoId: string, opts?: GetTranscriptOptions): Promise<CaptionEntry[]>;
  listTranscripts(videoId: string, opts?: ListTranscriptsOptions): Promise<AvailableTranscript[]>;
}

/** Minimal response surface the provider reads; global and undici `fetch` both satisfy it. */
export type HttpResponse = {
  ok: boolean;
  status: number;
  text: () => Promise<string>;
};

export type FetchFn = (
  url: string,
  init?: { headers?: Record<string, string> },
) => Promise<HttpResponse>;
