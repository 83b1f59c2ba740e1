import { Hono } from "hono";
import { logger } from "hono/logger";
import { GatewayError } from "../youtube/errors.js";
import { createTranscriptGateway } from "../youtube/service.js";
import type { TranscriptProvider } from "../youtube/types.js";

export type AppOptions = {
  provider: TranscriptProvider;
  /** Log one line per request. Default: true. */
  requestLogging?: boolean;
};

export const SERVICE_NAME = "YouTube Transcript API";

const ROOT_INFO = {
  message: SERVICE_NAME,
  endpoints: {
    get_transcript: "/api/transcript/{video_id}",
    get_transcript_with_lang: "/api/transcript-{language_code}/{video_id}",
    get_available_languages: "/api/transcript_languages/{video_id}",
  },
  examples: {
    basic_transcript: "/api/transcript/dQw4w9WgXcQ",
    spanish_transcript: "/api/transcript-es/dQw4w9WgXcQ",
    english_transcript: "/api/transcript-en/dQw4w9WgXcQ",
    available_languages: "/api/transcript_languages/dQw4w9WgXcQ",
  },
};

const LANGUAGE_ROUTE_PREFIX = "transcript-";

/**
 * Build the HTTP app. Handlers hold no state of their own; everything they
 * need comes from the request and the gateway built here.
 */
export function createApp(opts: AppOptions): Hono {
  const gateway = createTranscriptGateway(opts.provider);
  // "/api/transcript/" must reach the handler and fail as an empty ID
  const app = new Hono({ strict: false });

  if (opts.requestLogging ?? true) {
    // query strings may carry proxy credentials
    app.use("*", logger((line) => console.info(`[server] ${line.replace(/\?\S*/, "")}`)));
  }

  app.get("/", (c) => c.json(ROOT_INFO));

  app.get("/health", (c) => c.json({ status: "healthy", service: SERVICE_NAME }));

  app.get("/api/transcript/:video_id?", async (c) => {
    const result = await gateway.getDefaultTranscript({
      videoId: c.req.param("video_id"),
      proxy: c.req.query("proxy"),
    });
    return c.json(result);
  });

  app.get("/api/transcript_languages/:video_id?", async (c) => {
    const result = await gateway.listAvailableLanguages({
      videoId: c.req.param("video_id"),
      proxy: c.req.query("proxy"),
    });
    return c.json(result);
  });

  app.get("/api/:resource{transcript-[A-Za-z0-9_-]+}/:video_id?", async (c) => {
    const languageCode = c.req.param("resource").slice(LANGUAGE_ROUTE_PREFIX.length);
    const result = await gateway.getTranscriptInLanguage({
      videoId: c.req.param("video_id"),
      languageCode,
      proxy: c.req.query("proxy"),
    });
    return c.json(result);
  });

  app.notFound((c) => c.json({ detail: "Not Found" }, 404));

  app.onError((err, c) => {
    if (err instanceof GatewayError) {
      if (err.status >= 500) {
        console.error(`[server] ${c.req.method} ${c.req.path} -> ${err.status}: ${err.detail}`);
      }
      return c.json({ detail: err.detail }, err.status);
    }
    console.error(`[server] unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ detail: "Internal Server Error" }, 500);
  });

  return app;
}
