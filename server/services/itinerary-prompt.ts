import {
  TRAVEL_THEMES,
  type InfluencerRecommendation,
  type Itinerary,
  type PlanType,
  type TravelTheme,
  type TripRequest,
  type VideoReference,
} from "@shared/schema";
import { dailyBudget } from "./budget-calculator";

export interface EnrichmentContext {
  influencerTips: InfluencerRecommendation[];
  videos: VideoReference[];
}

export const EMPTY_CONTEXT: EnrichmentContext = { influencerTips: [], videos: [] };

const JSON_SHAPE = `{"days":[{"day":1,"activities":[{"time":"9:00 AM","title":"Activity name","location":"Place name on Google Maps","details":"Description, transport and local tips","estimatedCost":500,"duration":"2 hours","kind":"activity"}]}]}`;

function formatInfluencerTips(tips: InfluencerRecommendation[]): string {
  if (tips.length === 0) return "No local recommendations available.";
  const lines = tips.map((rec) => {
    const extras = [
      rec.bestTime ? `Best time: ${rec.bestTime}` : null,
      rec.budgetRange ? `Budget: ${rec.budgetRange}` : null,
    ].filter(Boolean).join(", ");
    return `- ${rec.placeName}: ${rec.recommendation}${extras ? ` (${extras})` : ""}`;
  });
  return `Local Expert Recommendations:\n${lines.join("\n")}`;
}

function formatVideoHighlights(videos: VideoReference[]): string {
  const lines = videos.flatMap((video) =>
    video.locations.map((location) => `- ${location} (Featured in popular travel vlog: ${video.title})`),
  );
  if (lines.length === 0) return "";
  return `Travel Vlog Highlights:\n${lines.join("\n")}`;
}

export interface PromptVariant {
  budget: number;
  style: string;
}

export function buildItineraryPrompt(
  request: TripRequest,
  context: EnrichmentContext,
  variant: PromptVariant = { budget: request.budget, style: "balanced" },
): string {
  const themes = request.themes.length > 0 ? request.themes.join(", ") : "general sightseeing";
  const perDay = dailyBudget(variant.budget, request.days);
  const origin = request.origin ? `Travelling from: ${request.origin}\n` : "";
  const transport = request.transportMode ? `Preferred transport to the destination: ${request.transportMode}\n` : "";

  return `Create a detailed ${request.days}-day travel itinerary for ${request.destination} starting on ${request.startDate}.

${origin}${transport}Budget: ₹${variant.budget} total (₹${perDay} per day)
Travel style: ${variant.style}
Travel Themes: ${themes}

${formatInfluencerTips(context.influencerTips)}
${formatVideoHighlights(context.videos)}

Requirements:
1. Exactly ${request.days} days, each with morning, afternoon and evening activities
2. For each activity: time slot, title, location name, estimated duration, approximate cost in rupees, transport and local tips
3. Use the local expert recommendations where they fit the themes, using the same place names
4. Keep each day within ₹${perDay}
5. Include meals with local food recommendations
6. Write all titles and details in ${request.language}; keep location names as they appear on Google Maps

Respond ONLY with this JSON (no markdown). "kind" is one of activity, meal, transport, lodging; "estimatedCost" is a whole number of rupees:
${JSON_SHAPE}`;
}

/**
 * Plain-text rendering of an itinerary, used as context for modifications.
 */
export function itineraryToText(itinerary: Itinerary): string {
  const lines = [
    `Destination: ${itinerary.destination}`,
    `Duration: ${itinerary.days} days from ${itinerary.startDate}`,
    `Budget: ₹${itinerary.budget}`,
    "",
  ];
  for (const day of itinerary.dailyPlans) {
    lines.push(`Day ${day.day}:`);
    for (const activity of day.activities) {
      const where = activity.location ? ` @ ${activity.location}` : "";
      lines.push(`  ${activity.time}: ${activity.title}${where} - ${activity.duration} - ₹${activity.estimatedCost}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}

/**
 * Asks the model what a change request means for the budget, the
 * accommodation level and the themes. The reply is read by
 * parseModificationIntent.
 */
export function buildIntentPrompt(itinerary: Itinerary, instruction: string): string {
  const dayLines = itinerary.dailyPlans
    .map((day) => `Day ${day.day}: ${day.activities.filter((a) => a.kind !== "lodging").length} activities`)
    .join("\n");
  return `Analyse this change request for a travel itinerary.

Current itinerary:
Destination: ${itinerary.destination}
Duration: ${itinerary.days} days
Budget: ₹${itinerary.budget}
Plan type: ${itinerary.planType}
${dayLines}

Change request: "${instruction}"

Reply with exactly these three lines and nothing else:
BUDGET_ADJUSTMENT: increase, decrease or none
ACCOMMODATION_PREFERENCE: budget, luxury or none
NEW_THEMES: themes to add, comma-separated, from ${TRAVEL_THEMES.join(", ")}; or none`;
}

export interface ModificationTarget extends PromptVariant {
  planType: PlanType;
  themes: TravelTheme[];
}

export function buildModificationPrompt(itinerary: Itinerary, instruction: string, target: ModificationTarget): string {
  const themes = target.themes.length > 0 ? target.themes.join(", ") : "general sightseeing";
  const perDay = dailyBudget(target.budget, itinerary.days);
  return `Here is a ${itinerary.days}-day travel itinerary for ${itinerary.destination}:

${itineraryToText(itinerary)}
The traveller asks for this change: "${instruction}"

New budget: ₹${target.budget} total (₹${perDay} per day)
Travel style: ${target.style}
Travel Themes: ${themes}

Rewrite the itinerary applying the change. Keep everything the traveller did not ask to change, keep exactly ${itinerary.days} days and stay within ₹${target.budget} in total. Write titles and details in ${itinerary.language}.

Respond ONLY with this JSON (no markdown). "kind" is one of activity, meal, transport, lodging; "estimatedCost" is a whole number of rupees:
${JSON_SHAPE}`;
}
