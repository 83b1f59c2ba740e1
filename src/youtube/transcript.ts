import { TranscriptError } from "./errors.js";
import { createProxyFetch, proxyUrlFor } from "./proxy.js";
import type { ProxyFetch } from "./proxy.js";
import type {
  AvailableTranscript,
  CaptionEntry,
  FetchFn,
  GetTranscriptOptions,
  ListTranscriptsOptions,
  ProxyConfig,
  TranscriptProvider,
} from "./types.js";

export type YouTubeProviderOptions = {
  /** Used for unproxied calls. Defaults to the global `fetch`. */
  fetchFn?: FetchFn;
  /** Opens the fetch used when a call carries proxies. Defaults to an undici `ProxyAgent`. */
  proxyFetch?: (proxyUrl: string) => ProxyFetch;
};

export const DEFAULT_LANGUAGES = ["en"];

const BROWSER_UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const REQUEST_HEADERS = {
  "User-Agent": BROWSER_UA,
  "Accept-Language": "en-US",
};

/**
 * Transcript provider backed by the YouTube watch page.
 *
 * Reads the caption track list out of `ytInitialPlayerResponse` and fetches
 * the chosen track's timed-text XML. A proxied fetch lives for one operation
 * and is closed when that operation settles.
 */
export function createYouTubeTranscriptProvider(
  opts?: YouTubeProviderOptions,
): TranscriptProvider {
  const baseFetch: FetchFn = opts?.fetchFn ?? globalThis.fetch;
  const proxyFetch = opts?.proxyFetch ?? createProxyFetch;

  async function withFetch<T>(
    proxies: ProxyConfig | undefined,
    run: (fetcher: FetchFn) => Promise<T>,
  ): Promise<T> {
    const proxyUrl = proxyUrlFor(proxies);
    if (!proxyUrl) return run(baseFetch);

    const proxied = proxyFetch(proxyUrl);
    try {
      return await run(proxied.fetch);
    } finally {
      await proxied.close();
    }
  }

  return {
    async getTranscript(videoId: string, options?: GetTranscriptOptions) {
      return withFetch(options?.proxies, async (fetcher) => {
        const tracks = await listCaptionTracks(videoId, fetcher, (baseUrl) =>
          fetchTimedText(videoId, baseUrl, fetcher),
        );
        const track = findTranscript(videoId, tracks, options?.languages ?? DEFAULT_LANGUAGES);
        return track.fetch();
      });
    },

    async listTranscripts(videoId: string, options?: ListTranscriptsOptions) {
      const proxies = options?.proxies;
      // tracks are fetched later, each in a proxy scope of its own
      return withFetch(proxies, (fetcher) =>
        listCaptionTracks(videoId, fetcher, (baseUrl) =>
          withFetch(proxies, (trackFetcher) => fetchTimedText(videoId, baseUrl, trackFetcher)),
        ),
      );
    },
  };
}

/**
 * Pick the best track for `languageCodes`, tried in order. For each code a
 * manually created track wins over an auto-generated one.
 */
export function findTranscript(
  videoId: string,
  tracks: AvailableTranscript[],
  languageCodes: string[],
): AvailableTranscript {
  for (const code of languageCodes) {
    const manual = tracks.find((t) => t.languageCode === code && !t.isGenerated);
    if (manual) return manual;
    const generated = tracks.find((t) => t.languageCode === code && t.isGenerated);
    if (generated) return generated;
  }

  throw new TranscriptError(
    "no_transcript",
    videoId,
    `No transcripts were found for any of the requested language codes: ${languageCodes.join(", ")}`,
  );
}

// --- watch page ---

type CaptionTrack = {
  baseUrl?: string;
  languageCode?: string;
  name?: { simpleText?: string; runs?: { text?: string }[] };
  kind?: string;
  isTranslatable?: boolean;
};

type PlayerResponse = {
  playabilityStatus?: { status?: string; reason?: string };
  captions?: {
    playerCaptionsTracklistRenderer?: { captionTracks?: CaptionTrack[] };
  };
};

async function listCaptionTracks(
  videoId: string,
  fetcher: FetchFn,
  fetchTrack: (baseUrl: string) => Promise<CaptionEntry[]>,
): Promise<AvailableTranscript[]> {
  const pageUrl = `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
  const pageRes = await fetcher(pageUrl, { headers: REQUEST_HEADERS });
  if (!pageRes.ok) {
    throw new TranscriptError(
      pageRes.status === 429 ? "too_many_requests" : "request_failed",
      videoId,
      `YouTube page fetch failed: ${pageRes.status}`,
    );
  }
  const html = await pageRes.text();

  if (html.includes('class="g-recaptcha"')) {
    throw new TranscriptError(
      "too_many_requests",
      videoId,
      "YouTube is asking for a captcha; too many requests from this IP",
    );
  }

  const player = extractPlayerResponse(html);
  if (!player) {
    throw new TranscriptError(
      "video_unavailable",
      videoId,
      `Video unavailable: no player data for ${videoId}`,
    );
  }

  assertPlayable(videoId, player);

  const tracks = player.captions?.playerCaptionsTracklistRenderer?.captionTracks ?? [];
  const usable = tracks.filter(
    (t): t is CaptionTrack & { baseUrl: string; languageCode: string } =>
      typeof t.baseUrl === "string" && typeof t.languageCode === "string",
  );
  if (usable.length === 0) {
    throw new TranscriptError(
      "transcripts_disabled",
      videoId,
      `Subtitles are disabled for this video (${videoId})`,
    );
  }

  return usable.map((track) => ({
    language: trackName(track),
    languageCode: track.languageCode,
    isGenerated: track.kind === "asr",
    isTranslatable: track.isTranslatable ?? false,
    fetch: () => fetchTrack(track.baseUrl),
  }));
}

function assertPlayable(videoId: string, player: PlayerResponse): void {
  const status = player.playabilityStatus?.status;
  const reason = player.playabilityStatus?.reason;

  if (status === "ERROR" || status === "UNPLAYABLE") {
    throw new TranscriptError(
      "video_unavailable",
      videoId,
      `Video unavailable: ${reason ?? "the video is no longer available"}`,
    );
  }
  if (status === "LOGIN_REQUIRED" && reason?.includes("not a bot")) {
    throw new TranscriptError(
      "too_many_requests",
      videoId,
      `YouTube requires sign-in to confirm this is not a bot (${videoId})`,
    );
  }
}

function trackName(track: CaptionTrack): string {
  if (track.name?.simpleText) return track.name.simpleText;
  const runs = track.name?.runs?.map((r) => r.text ?? "").join("");
  return runs || (track.languageCode ?? "");
}

/** Find the `ytInitialPlayerResponse = {...}` object literal and parse it. */
export function extractPlayerResponse(html: string): PlayerResponse | null {
  const marker = /ytInitialPlayerResponse\s*=\s*\{/.exec(html);
  if (!marker) return null;

  const jsonStart = marker.index + marker[0].length - 1;
  let depth = 0;
  let inString = false;
  let end = -1;
  for (let i = jsonStart; i < html.length; i++) {
    const ch = html[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) {
        end = i + 1;
        break;
      }
    }
  }

  if (end === -1) return null;
  try {
    return JSON.parse(html.slice(jsonStart, end)) as PlayerResponse;
  } catch {
    return null;
  }
}

// --- timed text ---

async function fetchTimedText(
  videoId: string,
  baseUrl: string,
  fetcher: FetchFn,
): Promise<CaptionEntry[]> {
  const xmlRes = await fetcher(baseUrl, { headers: REQUEST_HEADERS });
  if (!xmlRes.ok) {
    throw new TranscriptError(
      xmlRes.status === 429 ? "too_many_requests" : "request_failed",
      videoId,
      `Timedtext fetch failed: ${xmlRes.status}`,
    );
  }
  return parseTimedText(await xmlRes.text());
}

function fromCodePoint(entity: string, code: number): string {
  return Number.isInteger(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
}

function htmlDecode(s: string): string {
  return s
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#[xX]([0-9a-fA-F]+);/g, (entity, hex: string) =>
      fromCodePoint(entity, parseInt(hex, 16)),
    )
    .replace(/&#(\d+);/g, (entity, dec: string) => fromCodePoint(entity, Number(dec)))
    .replace(/\n/g, " ");
}

// caption formatting YouTube sends, usually entity-escaped inside <text>
const FORMATTING_TAG =
  /<\/?(?:font|b|i|u|s|em|strong|mark|small|del|ins|sub|sup|span)\b[^>]*>/gi;

function readSeconds(attrs: string, name: string): number {
  const m = new RegExp(`\\b${name}="([\\d.]+)"`).exec(attrs);
  const value = m ? Number(m[1]) : 0;
  return Number.isFinite(value) ? value : 0;
}

/** Parse timed-text XML into entries, keeping document order. */
export function parseTimedText(xml: string): CaptionEntry[] {
  const entries: CaptionEntry[] = [];
  const re = /<text\b([^>]*)>([\s\S]*?)<\/text>/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(xml)) !== null) {
    const text = htmlDecode(m[2]).replace(FORMATTING_TAG, "").trim();
    if (!text) continue;
    entries.push({
      text,
      start: readSeconds(m[1], "start"),
      duration: readSeconds(m[1], "dur"),
    });
  }
  return entries;
}
