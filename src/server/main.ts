import { serve } from "@hono/node-server";
import { createYouTubeTranscriptProvider } from "../youtube/index.js";
import { createApp } from "./app.js";
import { getServerEnv } from "./env.js";

const env = getServerEnv();

const app = createApp({
  provider: createYouTubeTranscriptProvider(),
  requestLogging: env.requestLogging,
});

serve({ fetch: app.fetch, port: env.port, hostname: env.host }, (info) => {
  console.info(`[server] listening on http://${env.host}:${info.port}`);
});
