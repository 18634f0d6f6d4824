import { z } from "zod";
import type { VideoReference } from "@shared/schema";
import { ServiceNotConfiguredError } from "../errors";
import { fetchJson, type FetchFn } from "../utils/http";
import { TtlCache, type Clock } from "../utils/ttl-cache";

const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3";
const SERVICE_NAME = "YouTube Data API";
const DEFAULT_MAX_RESULTS = 5;

const thumbnailSchema = z.object({ url: z.string() }).optional();

const searchResponseSchema = z.object({
  items: z.array(z.object({
    id: z.object({ videoId: z.string().optional() }),
    snippet: z.object({
      title: z.string(),
      channelTitle: z.string().default(""),
      publishedAt: z.string().default(""),
      thumbnails: z.object({
        default: thumbnailSchema,
        medium: thumbnailSchema,
        high: thumbnailSchema,
      }).default({}),
    }),
  })).default([]),
});

const videosResponseSchema = z.object({
  items: z.array(z.object({
    id: z.string(),
    snippet: z.object({ description: z.string().default("") }).optional(),
    statistics: z.object({
      viewCount: z.string().optional(),
      likeCount: z.string().optional(),
    }).optional(),
  })).default([]),
});

// Capitalised word run on one line: "Baga Beach", "Fort Aguada"
const PLACE_PHRASE = "([A-Z][a-zA-Z]*(?:[ \\t]+[A-Z][a-zA-Z]*)*)";
const LOCATION_PATTERN = new RegExp(
  `\\b(?:[Vv]isit(?:ing)?|[Aa]t|[Ii]n)\\s+${PLACE_PHRASE}` +
  `|\\b(?:[Ll]ocation|[Pp]laces?(?:\\s+to\\s+visit)?):\\s*${PLACE_PHRASE}`,
  "g",
);

/**
 * Pulls place names mentioned in a video description, in order of appearance.
 */
export function extractLocations(description: string): string[] {
  const found: string[] = [];
  for (const match of description.matchAll(LOCATION_PATTERN)) {
    const location = (match[1] ?? match[2] ?? "").trim();
    if (location.length > 3 && !found.includes(location)) {
      found.push(location);
    }
  }
  return found;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}

export interface YouTubeServiceOptions {
  apiKey?: string;
  cacheTtlMs: number;
  cacheMaxEntries?: number;
  maxResults?: number;
  fetch?: FetchFn;
  now?: Clock;
}

export class YouTubeService {
  private readonly apiKey: string;
  private readonly maxResults: number;
  private readonly fetchFn: FetchFn;
  private readonly cache: TtlCache<string, VideoReference[]>;

  constructor(options: YouTubeServiceOptions) {
    this.apiKey = options.apiKey ?? "";
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.fetchFn = options.fetch ?? fetch;
    this.cache = new TtlCache(options.cacheTtlMs, options.cacheMaxEntries ?? 100, options.now ?? Date.now);
  }

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  private async makeRequest<T>(
    endpoint: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    if (!this.apiKey) {
      throw new ServiceNotConfiguredError(SERVICE_NAME);
    }

    const url = new URL(`${YOUTUBE_API_BASE}/${endpoint}`);
    url.searchParams.set("key", this.apiKey);
    Object.entries(params).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });

    return fetchJson(this.fetchFn, SERVICE_NAME, url.toString(), schema);
  }

  /**
   * Travel vlogs for a destination or topic. Results are cached per
   * normalised topic; a cached topic is answered without any request.
   */
  async searchTravelVideos(topic: string): Promise<VideoReference[]> {
    const key = topic.trim().toLowerCase();
    const cached = this.cache.get(key);
    if (cached) {
      console.log(`[YouTube] ♻️ Cache hit for "${key}" (${cached.length} videos)`);
      return cached;
    }

    const search = await this.makeRequest("search", {
      part: "snippet",
      q: `travel vlog ${topic.trim()} places to visit`,
      type: "video",
      maxResults: String(this.maxResults),
      videoDuration: "medium",
      videoDefinition: "high",
      relevanceLanguage: "en",
    }, searchResponseSchema);

    const hits = search.items
      .filter((item) => item.id.videoId)
      .slice(0, this.maxResults);

    let details = new Map<string, z.infer<typeof videosResponseSchema>["items"][number]>();
    const ids = hits.map((item) => item.id.videoId ?? "");
    if (ids.length > 0) {
      const videos = await this.makeRequest("videos", {
        part: "snippet,statistics",
        id: ids.join(","),
      }, videosResponseSchema);
      details = new Map(videos.items.map((item) => [item.id, item] as const));
    }

    const results: VideoReference[] = hits.map((item) => {
      const videoId = item.id.videoId ?? "";
      const detail = details.get(videoId);
      const thumbnails = item.snippet.thumbnails;
      return {
        videoId,
        title: item.snippet.title,
        channel: item.snippet.channelTitle,
        url: videoUrl(videoId),
        thumbnailUrl: thumbnails.high?.url || thumbnails.medium?.url || thumbnails.default?.url || "",
        publishedAt: item.snippet.publishedAt,
        locations: extractLocations(detail?.snippet?.description ?? ""),
        viewCount: parseInt(detail?.statistics?.viewCount ?? "0", 10) || 0,
        likeCount: parseInt(detail?.statistics?.likeCount ?? "0", 10) || 0,
      };
    });

    this.cache.set(key, results);
    console.log(`[YouTube] 📺 ${results.length} videos for "${key}"`);
    return results;
  }
}
