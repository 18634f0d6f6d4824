import type { Activity, Itinerary, ItineraryDay, PlanType, TripRequest } from "@shared/schema";
import { AppError, UnparseableResponseError, errorMessage } from "../errors";
import {
  PLAN_VARIANTS,
  dayCost,
  scaledBudget,
  selectBestOption,
  summarizeBudget,
  totalCost,
  tripDate,
} from "./budget-calculator";
import type { TextModel } from "./gemini-client";
import {
  NO_CHANGE,
  parseItineraryResponse,
  parseModificationIntent,
  type ModificationIntent,
  type ParsedActivity,
  type ParsedDay,
} from "./itinerary-parser";
import {
  EMPTY_CONTEXT,
  buildIntentPrompt,
  buildItineraryPrompt,
  buildModificationPrompt,
  type EnrichmentContext,
  type ModificationTarget,
} from "./itinerary-prompt";

export interface ItineraryOptions {
  options: Itinerary[];
  selected: Itinerary;
}

function mentions(haystack: string, needle: string): boolean {
  const target = needle.trim().toLowerCase();
  return target.length > 0 && haystack.includes(target);
}

/**
 * Attaches the first matching influencer tip and video to an activity.
 */
export function enrichActivity(activity: ParsedActivity, context: EnrichmentContext): Activity {
  const haystack = `${activity.title} ${activity.location ?? ""}`.toLowerCase();
  const enriched: Activity = { ...activity };

  const tip = context.influencerTips.find((rec) => mentions(haystack, rec.placeName));
  if (tip) {
    enriched.influencerTip = {
      influencer: tip.influencerName,
      platform: tip.platform,
      tip: tip.recommendation,
    };
  }

  const video = context.videos.find((v) => v.locations.some((location) => mentions(haystack, location)));
  if (video) {
    enriched.video = { videoId: video.videoId, title: video.title, url: video.url };
  }

  return enriched;
}

// Budget change for an "increase" or "decrease" intent
export const BUDGET_ADJUSTMENT_STEP = 0.2;

/**
 * Budget, plan type and themes a modified itinerary is planned with.
 */
export function applyModificationIntent(itinerary: Itinerary, intent: ModificationIntent): ModificationTarget {
  let budget = itinerary.budget;
  if (intent.budgetAdjustment === "increase") budget = scaledBudget(budget, 1 + BUDGET_ADJUSTMENT_STEP);
  if (intent.budgetAdjustment === "decrease") budget = scaledBudget(budget, 1 - BUDGET_ADJUSTMENT_STEP);

  let planType = itinerary.planType;
  if (intent.accommodation === "luxury") planType = "Premium";
  if (intent.accommodation === "budget") planType = "Budget-Friendly";

  const variant = PLAN_VARIANTS.find((v) => v.planType === planType) ?? PLAN_VARIANTS[1];
  return {
    budget,
    planType,
    style: variant.style,
    themes: [...new Set([...itinerary.themes, ...intent.newThemes])],
  };
}

export class ItineraryGenerator {
  constructor(private readonly model: TextModel) {}

  private toDailyPlans(days: ParsedDay[], request: TripRequest, context: EnrichmentContext): ItineraryDay[] {
    if (days.length === 0) {
      throw new UnparseableResponseError("No day plans could be read from the model response");
    }
    if (days.length < request.days) {
      throw new UnparseableResponseError(
        `Model returned ${days.length} of ${request.days} requested days`,
        { expected: request.days, received: days.length },
      );
    }
    if (days.length > request.days) {
      console.warn(`[Generator] ⚠️ Dropping ${days.length - request.days} extra day(s) from the response`);
    }

    return days.slice(0, request.days).map((parsed, index) => {
      const activities = parsed.activities.map((activity) => enrichActivity(activity, context));
      return {
        day: index + 1,
        date: tripDate(request.startDate, index + 1),
        activities,
        dayCost: dayCost(activities),
      };
    });
  }

  private assemble(
    request: TripRequest,
    planType: PlanType,
    dailyPlans: ItineraryDay[],
    context: EnrichmentContext,
  ): Itinerary {
    return {
      destination: request.destination,
      origin: request.origin,
      startDate: request.startDate,
      days: request.days,
      budget: request.budget,
      themes: request.themes,
      language: request.language,
      planType,
      dailyPlans,
      totalCost: totalCost(dailyPlans),
      budgetStatus: summarizeBudget(request.budget, dailyPlans),
      source: "ai",
      dataSources: {
        influencerRecommendations: context.influencerTips.length,
        videos: context.videos.length,
      },
    };
  }

  async generate(
    request: TripRequest,
    context: EnrichmentContext = EMPTY_CONTEXT,
    planType: PlanType = "Standard",
  ): Promise<Itinerary> {
    const variant = PLAN_VARIANTS.find((v) => v.planType === planType) ?? PLAN_VARIANTS[1];
    const budget = scaledBudget(request.budget, variant.factor);

    console.log(`[Generator] 🗺️ ${planType} plan for ${request.destination}, ${request.days} days, ₹${budget}`);
    const prompt = buildItineraryPrompt(request, context, { budget, style: variant.style });
    const text = await this.model.generateText(prompt, { json: true });

    const dailyPlans = this.toDailyPlans(parseItineraryResponse(text), request, context);
    return this.assemble(request, planType, dailyPlans, context);
  }

  /**
   * One plan per variant, generated one after another. A variant that fails is
   * skipped; when every variant fails the last failure is rethrown.
   */
  async generateOptions(request: TripRequest, context: EnrichmentContext = EMPTY_CONTEXT): Promise<ItineraryOptions> {
    const options: Itinerary[] = [];
    let lastError: unknown = null;

    for (const variant of PLAN_VARIANTS) {
      try {
        options.push(await this.generate(request, context, variant.planType));
      } catch (error) {
        console.warn(`[Generator] ⚠️ ${variant.planType} plan failed: ${errorMessage(error)}`);
        lastError = error;
      }
    }

    const selected = selectBestOption(options, request.budget);
    if (!selected) {
      throw lastError ?? new UnparseableResponseError("No plan options were generated");
    }
    return { options, selected };
  }

  private async analyzeIntent(itinerary: Itinerary, instruction: string): Promise<ModificationIntent> {
    try {
      const text = await this.model.generateText(buildIntentPrompt(itinerary, instruction), {
        temperature: 0.2,
        maxOutputTokens: 256,
      });
      return parseModificationIntent(text);
    } catch (error) {
      if (!(error instanceof AppError)) throw error;
      console.warn(`[Generator] ⚠️ Intent analysis failed, keeping budget and plan type: ${error.message}`);
      return NO_CHANGE;
    }
  }

  /**
   * Re-plans an itinerary around a change request. The request is first
   * analysed for budget, accommodation and theme changes; the rewrite is then
   * planned with the adjusted values.
   */
  async modify(
    itinerary: Itinerary,
    instruction: string,
    context: EnrichmentContext = EMPTY_CONTEXT,
  ): Promise<Itinerary> {
    console.log(`[Generator] ✏️ Modifying ${itinerary.destination} plan: "${instruction}"`);
    const intent = await this.analyzeIntent(itinerary, instruction);
    const target = applyModificationIntent(itinerary, intent);
    if (target.budget !== itinerary.budget || target.planType !== itinerary.planType) {
      console.log(`[Generator] 🎯 Re-planning as ${target.planType} with ₹${target.budget}`);
    }

    const text = await this.model.generateText(buildModificationPrompt(itinerary, instruction, target), { json: true });

    const request: TripRequest = {
      origin: itinerary.origin,
      destination: itinerary.destination,
      startDate: itinerary.startDate,
      days: itinerary.days,
      budget: target.budget,
      themes: target.themes,
      language: itinerary.language,
    };
    const dailyPlans = this.toDailyPlans(parseItineraryResponse(text), request, context);
    return {
      ...this.assemble(request, target.planType, dailyPlans, context),
      modification: instruction,
    };
  }
}
