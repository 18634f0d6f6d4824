/**
 * Trip Planner
 *
 * One pass per request:
 *   influencer lookup → video search → AI generation → geocoding → merge
 *
 * Enrichment steps degrade into warnings. Only the generation step can fail
 * the request, and even then a template itinerary is returned when
 * template fallback is allowed.
 */

import type { Coordinates, Itinerary, TripRequest } from "@shared/schema";
import { AppError, errorMessage } from "../errors";
import type { IStorage } from "../storage";
import { buildTemplateItinerary } from "./budget-calculator";
import type { ItineraryGenerator } from "./itinerary-generator";
import type { EnrichmentContext } from "./itinerary-prompt";
import type { GeocodeResult, MapsService } from "./maps-service";
import type { YouTubeService } from "./youtube-service";

export interface PlannedTrip {
  itinerary: Itinerary;
  destinationCoordinates: GeocodeResult | null;
  warnings: string[];
}

export interface PlannedOptions {
  options: Itinerary[];
  selected: Itinerary;
  destinationCoordinates: GeocodeResult | null;
  warnings: string[];
}

export interface TripPlannerDeps {
  generator: ItineraryGenerator;
  maps: MapsService;
  youtube: YouTubeService;
  storage: IStorage;
  allowTemplateFallback: boolean;
}

export class TripPlanner {
  constructor(private readonly deps: TripPlannerDeps) {}

  private async gatherContext(destination: string, warnings: string[]): Promise<EnrichmentContext> {
    const context: EnrichmentContext = { influencerTips: [], videos: [] };

    try {
      context.influencerTips = await this.deps.storage.getInfluencerRecommendations(destination);
      console.log(`[Planner] 💡 ${context.influencerTips.length} influencer tips for ${destination}`);
    } catch (error) {
      warnings.push(`Influencer recommendations unavailable: ${errorMessage(error)}`);
    }

    if (!this.deps.youtube.isConfigured()) {
      console.log("[Planner] ⏭️ YouTube not configured, skipping video search");
      return context;
    }
    try {
      context.videos = await this.deps.youtube.searchTravelVideos(destination);
    } catch (error) {
      warnings.push(`Travel videos unavailable: ${errorMessage(error)}`);
    }

    return context;
  }

  // The generator's typed failures turn into a template plan; anything else is a bug and propagates
  private templateOrThrow(request: TripRequest, error: unknown, warnings: string[]): Itinerary {
    if (!this.deps.allowTemplateFallback || !(error instanceof AppError)) {
      throw error;
    }
    console.warn(`[Planner] ⚠️ AI generation failed, using template: ${error.message}`);
    warnings.push(`AI generation failed, showing a template itinerary: ${error.message}`);
    return buildTemplateItinerary(request);
  }

  /**
   * Geocodes the destination and every distinct activity location, then
   * attaches the coordinates to the activities.
   */
  private async locate(
    itinerary: Itinerary,
    warnings: string[],
  ): Promise<{ itinerary: Itinerary; destinationCoordinates: GeocodeResult | null }> {
    const { maps } = this.deps;
    if (!maps.isConfigured()) {
      warnings.push("Google Maps is not configured; coordinates were not added");
      return { itinerary, destinationCoordinates: null };
    }

    let destinationCoordinates: GeocodeResult | null = null;
    try {
      destinationCoordinates = await maps.geocode(itinerary.destination);
    } catch (error) {
      warnings.push(`Could not geocode "${itinerary.destination}": ${errorMessage(error)}`);
    }

    const locations = new Set<string>();
    for (const day of itinerary.dailyPlans) {
      for (const activity of day.activities) {
        const location = activity.location?.trim();
        if (location) locations.add(location);
      }
    }

    const found = new Map<string, Coordinates>();
    for (const location of locations) {
      try {
        const result = await maps.geocode(`${location}, ${itinerary.destination}`);
        found.set(location, { lat: result.lat, lng: result.lng });
      } catch (error) {
        warnings.push(`Could not geocode "${location}": ${errorMessage(error)}`);
      }
    }
    console.log(`[Planner] 📍 Geocoded ${found.size}/${locations.size} locations`);

    const dailyPlans = itinerary.dailyPlans.map((day) => ({
      ...day,
      activities: day.activities.map((activity) => {
        const coordinates = activity.location ? found.get(activity.location.trim()) : undefined;
        return coordinates ? { ...activity, coordinates } : activity;
      }),
    }));

    return { itinerary: { ...itinerary, dailyPlans }, destinationCoordinates };
  }

  async plan(request: TripRequest): Promise<PlannedTrip> {
    const warnings: string[] = [];
    const context = await this.gatherContext(request.destination, warnings);

    let itinerary: Itinerary;
    try {
      itinerary = await this.deps.generator.generate(request, context);
    } catch (error) {
      itinerary = this.templateOrThrow(request, error, warnings);
    }

    const located = await this.locate(itinerary, warnings);
    console.log(`[Planner] ✅ ${request.destination} plan ready (${located.itinerary.source}, ${warnings.length} warnings)`);
    return { ...located, warnings };
  }

  /**
   * Budget-Friendly, Standard and Premium plans. Only the selected plan is geocoded.
   */
  async planOptions(request: TripRequest): Promise<PlannedOptions> {
    const warnings: string[] = [];
    const context = await this.gatherContext(request.destination, warnings);

    let options: Itinerary[];
    let selected: Itinerary;
    try {
      ({ options, selected } = await this.deps.generator.generateOptions(request, context));
      if (options.length < 3) {
        warnings.push(`Only ${options.length} of 3 plan options could be generated`);
      }
    } catch (error) {
      selected = this.templateOrThrow(request, error, warnings);
      options = [selected];
    }

    const located = await this.locate(selected, warnings);
    const previous = selected;
    return {
      options: options.map((option) => (option === previous ? located.itinerary : option)),
      selected: located.itinerary,
      destinationCoordinates: located.destinationCoordinates,
      warnings,
    };
  }

  // No template fallback: a template would discard the traveller's plan
  async modify(itinerary: Itinerary, instruction: string): Promise<PlannedTrip> {
    const warnings: string[] = [];
    const context = await this.gatherContext(itinerary.destination, warnings);
    const modified = await this.deps.generator.modify(itinerary, instruction, context);
    const located = await this.locate(modified, warnings);
    return { ...located, warnings };
  }
}
