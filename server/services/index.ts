import type { AppConfig } from "../config";
import { createDatabase, type DatabaseHandle } from "../db";
import { DatabaseStorage, MemStorage, type IStorage } from "../storage";
import { GeminiTextModel, type TextModel } from "./gemini-client";
import { ItineraryGenerator } from "./itinerary-generator";
import { MapsService } from "./maps-service";
import { TripPlanner } from "./trip-planner";
import { YouTubeService } from "./youtube-service";

export interface Services {
  config: AppConfig;
  storage: IStorage;
  maps: MapsService;
  youtube: YouTubeService;
  model: TextModel;
  generator: ItineraryGenerator;
  planner: TripPlanner;
  database: DatabaseHandle | null;
}

// Tests replace the outbound pieces; everything else is built from config
export interface ServiceOverrides {
  storage?: IStorage;
  maps?: MapsService;
  youtube?: YouTubeService;
  model?: TextModel;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const database = overrides.storage ? null : createDatabase(config.databaseUrl);
  const storage = overrides.storage ?? (database ? new DatabaseStorage(database.db) : new MemStorage());

  const maps = overrides.maps ?? new MapsService({ apiKey: config.mapsApiKey });
  const youtube = overrides.youtube ?? new YouTubeService({
    apiKey: config.youtube.apiKey,
    cacheTtlMs: config.youtube.cacheTtlMs,
    cacheMaxEntries: config.youtube.cacheMaxEntries,
  });
  const model = overrides.model ?? new GeminiTextModel(config.gemini);
  const generator = new ItineraryGenerator(model);
  const planner = new TripPlanner({
    generator,
    maps,
    youtube,
    storage,
    allowTemplateFallback: config.allowTemplateFallback,
  });

  return { config, storage, maps, youtube, model, generator, planner, database };
}
