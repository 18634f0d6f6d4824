/**
 * Budget Calculator
 *
 * Costs are whole rupees. A plan stays "within budget" up to a 10% margin
 * over the requested amount; beyond that the overrun is reported in overBy.
 */

import type { Activity, BudgetStatus, Itinerary, ItineraryDay, PlanType, TripRequest } from "@shared/schema";

export const BUDGET_MARGIN = 0.1;

// Option variants offered for the same trip
export const PLAN_VARIANTS: ReadonlyArray<{ planType: PlanType; factor: number; style: string }> = [
  { planType: "Budget-Friendly", factor: 0.8, style: "economical" },
  { planType: "Standard", factor: 1.0, style: "balanced" },
  { planType: "Premium", factor: 1.3, style: "luxury" },
];

// Template day: share of the daily budget per slot
const TEMPLATE_SLOTS = [
  { time: "9:00 AM", share: 0.3, duration: "3 hours", title: (d: string) => `Morning exploration in ${d}`, details: (d: string) => `Discover the morning charm of ${d} with local sightseeing` },
  { time: "2:00 PM", share: 0.4, duration: "4 hours", title: (d: string) => `Afternoon activities in ${d}`, details: (d: string) => `Enjoy afternoon attractions and local experiences in ${d}` },
  { time: "7:00 PM", share: 0.3, duration: "3 hours", title: (d: string) => `Evening entertainment in ${d}`, details: (d: string) => `Experience the nightlife and evening culture of ${d}` },
] as const;

export function dailyBudget(budget: number, days: number): number {
  if (days <= 0) return 0;
  return Math.floor(budget / days);
}

export function scaledBudget(budget: number, factor: number): number {
  return Math.floor(budget * factor);
}

export function dayCost(activities: Activity[]): number {
  return activities.reduce((sum, activity) => sum + activity.estimatedCost, 0);
}

export function totalCost(dailyPlans: ItineraryDay[]): number {
  return dailyPlans.reduce((sum, day) => sum + dayCost(day.activities), 0);
}

export function summarizeBudget(budget: number, dailyPlans: ItineraryDay[]): BudgetStatus {
  const total = totalCost(dailyPlans);
  const ceiling = budget * (1 + BUDGET_MARGIN);
  const withinBudget = total <= ceiling;
  return {
    budget,
    totalCost: total,
    margin: BUDGET_MARGIN,
    withinBudget,
    overBy: withinBudget ? 0 : total - budget,
  };
}

/**
 * Date of the n-th day (1-based) of a trip starting on startDate, as YYYY-MM-DD.
 */
export function tripDate(startDate: string, dayNumber: number): string {
  const date = new Date(`${startDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + dayNumber - 1);
  return date.toISOString().slice(0, 10);
}

/**
 * Three fixed slots per day splitting the daily budget 30/40/30.
 * Used only as a clearly flagged degraded result when generation fails.
 */
export function buildTemplateItinerary(request: TripRequest, planType: PlanType = "Standard"): Itinerary {
  const perDay = dailyBudget(request.budget, request.days);

  const dailyPlans: ItineraryDay[] = Array.from({ length: request.days }, (_, index) => {
    const activities = TEMPLATE_SLOTS.map((slot): Activity => ({
      time: slot.time,
      title: slot.title(request.destination),
      details: slot.details(request.destination),
      estimatedCost: Math.floor(perDay * slot.share),
      duration: slot.duration,
      kind: "activity",
    }));
    return {
      day: index + 1,
      date: tripDate(request.startDate, index + 1),
      activities,
      dayCost: dayCost(activities),
    };
  });

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
    source: "template",
    dataSources: { influencerRecommendations: 0, videos: 0 },
  };
}

/**
 * Prefers the option closest to the target among those within the margin,
 * otherwise the cheapest one.
 */
export function selectBestOption(options: Itinerary[], targetBudget: number): Itinerary | null {
  if (options.length === 0) return null;

  const ceiling = targetBudget * (1 + BUDGET_MARGIN);
  const withinBudget = options.filter((option) => option.totalCost <= ceiling);

  if (withinBudget.length > 0) {
    return withinBudget.reduce((best, option) =>
      Math.abs(option.totalCost - targetBudget) < Math.abs(best.totalCost - targetBudget) ? option : best,
    );
  }
  return options.reduce((cheapest, option) => (option.totalCost < cheapest.totalCost ? option : cheapest));
}
