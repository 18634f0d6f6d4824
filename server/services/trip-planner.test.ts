import { describe, it, expect, vi } from "vitest";
import type { InfluencerRecommendation, TripRequest } from "@shared/schema";
import { UpstreamServiceError } from "../errors";
import { MemStorage } from "../storage";
import type { FetchFn } from "../utils/http";
import type { TextModel } from "./gemini-client";
import { ItineraryGenerator } from "./itinerary-generator";
import { MapsService } from "./maps-service";
import { TripPlanner } from "./trip-planner";
import { YouTubeService } from "./youtube-service";

// ============================================================================
// TEST DATA
// ============================================================================

class ScriptedModel implements TextModel {
  constructor(private readonly replies: Array<string | Error>) {}

  async generateText(): Promise<string> {
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("no reply queued");
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

class BrokenStorage extends MemStorage {
  async getInfluencerRecommendations(): Promise<InfluencerRecommendation[]> {
    throw new Error("connection refused");
  }
}

const goaRequest: TripRequest = {
  destination: "Goa",
  startDate: "2025-11-20",
  days: 3,
  budget: 15000,
  themes: ["Adventure"],
  language: "English",
};

const goaDay = {
  activities: [
    { time: "9:00 AM", title: "Scuba dive", location: "Grande Island", estimatedCost: 3000, duration: "3 hours", kind: "activity" },
    { time: "7:00 PM", title: "Seafood dinner", location: "Baga Beach", estimatedCost: 1500, duration: "2 hours", kind: "meal" },
  ],
};

const flatDay = (cost: number) => ({
  activities: [{ time: "10:00 AM", title: "Old Goa churches", estimatedCost: cost, duration: "2 hours", kind: "activity" }],
});

const reply = (days: object[]) => JSON.stringify({ days });

const KNOWN_PLACES: Record<string, { lat: number; lng: number }> = {
  "Goa": { lat: 15.2993, lng: 74.124 },
  "Grande Island, Goa": { lat: 15.35, lng: 73.76 },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function geocodeFetch() {
  return vi.fn<FetchFn>(async (input) => {
    const address = new URL(String(input)).searchParams.get("address") ?? "";
    const hit = KNOWN_PLACES[address];
    if (!hit) return jsonResponse({ status: "ZERO_RESULTS", results: [] });
    return jsonResponse({
      status: "OK",
      results: [{ formatted_address: `${address}, India`, place_id: `id-${address}`, geometry: { location: hit } }],
    });
  });
}

interface PlannerSetup {
  replies: Array<string | Error>;
  storage?: MemStorage;
  mapsKey?: string;
  youtubeKey?: string;
  youtubeFetch?: FetchFn;
  allowTemplateFallback?: boolean;
}

function createPlanner(setup: PlannerSetup) {
  const mapsFetch = geocodeFetch();
  const storage = setup.storage ?? new MemStorage([
    {
      destination: "goa",
      platform: "Instagram",
      influencerName: "Coastal Wanderer",
      placeName: "Grande Island",
      recommendation: "Book the early boat for clear water",
    },
  ]);
  const planner = new TripPlanner({
    generator: new ItineraryGenerator(new ScriptedModel(setup.replies)),
    maps: new MapsService({ apiKey: setup.mapsKey ?? "test-key", fetch: mapsFetch }),
    youtube: new YouTubeService({ apiKey: setup.youtubeKey, cacheTtlMs: 60_000, fetch: setup.youtubeFetch }),
    storage,
    allowTemplateFallback: setup.allowTemplateFallback ?? true,
  });
  return { planner, mapsFetch };
}

// ============================================================================
// TESTS
// ============================================================================

describe("TripPlanner.plan", () => {
  it("plans Goa for 3 days on 15000 with coordinates and a budget verdict", async () => {
    const { planner, mapsFetch } = createPlanner({ replies: [reply([goaDay, goaDay, goaDay])] });

    const result = await planner.plan(goaRequest);
    const { itinerary } = result;

    expect(itinerary.dailyPlans).toHaveLength(3);
    for (const day of itinerary.dailyPlans) {
      expect(day.activities.length).toBeGreaterThanOrEqual(1);
    }
    expect(itinerary.budgetStatus.withinBudget).toBe(true);
    expect(itinerary.budgetStatus.totalCost).toBe(13500);
    expect(itinerary.dataSources).toEqual({ influencerRecommendations: 1, videos: 0 });

    expect(result.destinationCoordinates).toEqual({
      lat: 15.2993,
      lng: 74.124,
      formattedAddress: "Goa, India",
      placeId: "id-Goa",
    });
    const [dive, dinner] = itinerary.dailyPlans[0].activities;
    expect(dive.coordinates).toEqual({ lat: 15.35, lng: 73.76 });
    expect(dive.influencerTip?.influencer).toBe("Coastal Wanderer");
    expect(dinner.coordinates).toBeUndefined();

    // destination plus two distinct activity locations
    expect(mapsFetch).toHaveBeenCalledTimes(3);
    expect(result.warnings).toEqual([
      'Could not geocode "Baga Beach": No coordinates found for "Baga Beach, Goa"',
    ]);
  });

  it("returns a flagged template itinerary when generation fails", async () => {
    const { planner } = createPlanner({
      replies: [new UpstreamServiceError("Gemini", "HTTP 503")],
      mapsKey: "",
    });

    const result = await planner.plan(goaRequest);

    expect(result.itinerary.source).toBe("template");
    expect(result.itinerary.dailyPlans).toHaveLength(3);
    expect(result.itinerary.totalCost).toBe(15000);
    expect(result.destinationCoordinates).toBeNull();
    expect(result.warnings).toEqual([
      "AI generation failed, showing a template itinerary: Gemini: HTTP 503",
      "Google Maps is not configured; coordinates were not added",
    ]);
  });

  it("propagates the failure when template fallback is disabled", async () => {
    const failure = new UpstreamServiceError("Gemini", "HTTP 503");
    const { planner } = createPlanner({ replies: [failure], allowTemplateFallback: false });

    await expect(planner.plan(goaRequest)).rejects.toBe(failure);
  });

  it("does not hide programming errors behind a template", async () => {
    const bug = new TypeError("cannot read properties of undefined");
    const { planner } = createPlanner({ replies: [bug] });

    await expect(planner.plan(goaRequest)).rejects.toBe(bug);
  });

  it("turns enrichment failures into warnings", async () => {
    const youtubeFetch = vi.fn<FetchFn>(async () => jsonResponse({ error: { message: "quota" } }, 403));
    const { planner } = createPlanner({
      replies: [reply([flatDay(4000), flatDay(4000), flatDay(4000)])],
      storage: new BrokenStorage(),
      youtubeKey: "test-key",
      youtubeFetch,
    });

    const result = await planner.plan(goaRequest);

    expect(result.itinerary.source).toBe("ai");
    expect(result.itinerary.dataSources).toEqual({ influencerRecommendations: 0, videos: 0 });
    expect(result.warnings).toEqual([
      "Influencer recommendations unavailable: connection refused",
      "Travel videos unavailable: YouTube Data API: HTTP 403",
    ]);
  });
});

describe("TripPlanner.planOptions", () => {
  it("geocodes only the selected option", async () => {
    const { planner, mapsFetch } = createPlanner({
      replies: [
        reply([flatDay(3000), flatDay(3000), flatDay(3000)]),
        reply([goaDay, goaDay, goaDay]),
        reply([flatDay(7000), flatDay(7000), flatDay(7000)]),
      ],
    });

    const result = await planner.planOptions(goaRequest);

    expect(result.options.map((o) => o.planType)).toEqual(["Budget-Friendly", "Standard", "Premium"]);
    expect(result.selected.planType).toBe("Standard");
    expect(result.options[1]).toBe(result.selected);
    expect(result.selected.dailyPlans[0].activities[0].coordinates).toEqual({ lat: 15.35, lng: 73.76 });
    expect(mapsFetch).toHaveBeenCalledTimes(3);
  });

  it("falls back to a single template option", async () => {
    const { planner } = createPlanner({
      replies: [
        new UpstreamServiceError("Gemini", "timeout"),
        new UpstreamServiceError("Gemini", "timeout"),
        new UpstreamServiceError("Gemini", "HTTP 503"),
      ],
    });

    const result = await planner.planOptions(goaRequest);

    expect(result.options).toHaveLength(1);
    expect(result.selected.source).toBe("template");
    expect(result.warnings[0]).toBe("AI generation failed, showing a template itinerary: Gemini: HTTP 503");
  });
});

describe("TripPlanner.modify", () => {
  it("applies the change and re-geocodes", async () => {
    const { planner } = createPlanner({
      replies: [
        reply([goaDay, goaDay, goaDay]),
        "BUDGET_ADJUSTMENT: none\nACCOMMODATION_PREFERENCE: none\nNEW_THEMES: Heritage",
        reply([flatDay(2000), goaDay, goaDay]),
      ],
    });
    const { itinerary } = await planner.plan(goaRequest);

    const result = await planner.modify(itinerary, "Swap the first day for a heritage walk");

    expect(result.itinerary.modification).toBe("Swap the first day for a heritage walk");
    expect(result.itinerary.dailyPlans[0].activities[0].title).toBe("Old Goa churches");
    expect(result.itinerary.themes).toContain("Heritage");
    expect(result.itinerary.dailyPlans[1].activities[0].coordinates).toEqual({ lat: 15.35, lng: 73.76 });
  });
});
