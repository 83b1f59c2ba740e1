export type TranscriptErrorKind =
  | "video_unavailable"
  | "no_transcript"
  | "transcripts_disabled"
  | "too_many_requests"
  | "request_failed";

/** Raised by transcript providers. `kind` is the contract; `message` is for humans. */
export class TranscriptError extends Error {
  readonly kind: TranscriptErrorKind;
  readonly videoId: string;

  constructor(kind: TranscriptErrorKind, videoId: string, message: string) {
    super(message);
    this.name = "TranscriptError";
    this.kind = kind;
    this.videoId = videoId;
  }
}

export type GatewayErrorKind = "bad_request" | "not_found" | "upstream_blocked" | "internal";

export type GatewayStatus = 400 | 404 | 500 | 503;

const STATUS_BY_KIND: Record<GatewayErrorKind, GatewayStatus> = {
  bad_request: 400,
  not_found: 404,
  upstream_blocked: 503,
  internal: 500,
};

/** An error the HTTP layer renders as `{ detail }` with `status`. */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly status: GatewayStatus;

  constructor(kind: GatewayErrorKind, detail: string) {
    super(detail);
    this.name = "GatewayError";
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }

  get detail(): string {
    return this.message;
  }
}

export type ErrorClass = "no_transcript" | "video_unavailable" | "unknown";

/**
 * Classify a provider failure. Structured kinds win; opaque errors fall back
 * to matching the provider's wording.
 */
export function classifyProviderError(err: unknown): ErrorClass {
  if (err instanceof TranscriptError) {
    switch (err.kind) {
      case "no_transcript":
      case "transcripts_disabled":
        return "no_transcript";
      case "video_unavailable":
        return "video_unavailable";
      default:
        return "unknown";
    }
  }

  const message = errorMessage(err);
  if (message.includes("No transcripts were found")) return "no_transcript";
  if (message.includes("Video unavailable")) return "video_unavailable";
  return "unknown";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
