/**
 * Best-effort parsing of model output into day plans.
 *
 * 1. JSON ({"days":[...]}), with markdown fences stripped
 * 2. JSON cut off by the token limit: complete day objects are kept
 * 3. Plain text: "Day N:" headers followed by "[Time]: [Activity] - [Duration] - ₹[Cost]" lines
 */

import { z } from "zod";
import { ACTIVITY_KINDS, TRAVEL_THEMES, type ActivityKind, type TravelTheme } from "@shared/schema";

export interface ParsedActivity {
  time: string;
  title: string;
  location?: string;
  details?: string;
  estimatedCost: number;
  duration: string;
  kind: ActivityKind;
}

export interface ParsedDay {
  activities: ParsedActivity[];
}

export function extractCost(text: string): number {
  const match = text.match(/(?:₹|\bRs\.?|\bINR)\s*([\d,]+)/i);
  if (!match) return 0;
  const amount = parseInt(match[1].replace(/,/g, ""), 10);
  return Number.isFinite(amount) ? amount : 0;
}

export function extractDuration(text: string): string {
  const match = text.match(/(\d+(?:\.\d+)?)\s*(hours?|hrs?|minutes?|mins?)\b/i);
  if (!match) return "1 hour";
  const amount = match[1];
  const isHours = match[2].toLowerCase().startsWith("h");
  if (isHours) return amount === "1" ? "1 hour" : `${amount} hours`;
  return amount === "1" ? "1 minute" : `${amount} minutes`;
}

const PLACE_PATTERNS = [
  /Location:\s*([^,.;\n]+)/i,
  /\b(?:[Aa]t|[Vv]isit(?:ing)?|[Ee]xplore)\s+([A-Z][\w']*(?:\s+[A-Z][\w']*)*)/,
  /\b((?:[A-Z][\w']*\s+)+(?:Beach|Fort|Temple|Church|Market|Palace|Lake|Falls|Museum|Garden))\b/,
];

/**
 * Place name mentioned in a line of text, e.g. "Location: Baga Beach",
 * "lunch at Britto's", "visit Fort Aguada" or "Anjuna Market".
 */
export function extractPlace(text: string): string | undefined {
  for (const pattern of PLACE_PATTERNS) {
    const place = text.match(pattern)?.[1]?.trim();
    if (place && place.length > 2 && place.length < 50) return place;
  }
  return undefined;
}

function toKind(value: unknown): ActivityKind {
  const kind = typeof value === "string" ? value.trim().toLowerCase() : "";
  return ACTIVITY_KINDS.find((k) => k === kind) ?? "activity";
}

function toCost(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return Math.max(0, Math.round(value));
  if (typeof value === "string") {
    const direct = Number(value.replace(/[,\s]/g, ""));
    if (Number.isFinite(direct) && value.trim() !== "") return Math.max(0, Math.round(direct));
    const fromText = extractCost(value);
    if (fromText > 0) return fromText;
    const digits = value.match(/\d[\d,]*/);
    return digits ? parseInt(digits[0].replace(/,/g, ""), 10) : 0;
  }
  return 0;
}

const optionalText = z.unknown().transform((value) =>
  typeof value === "string" && value.trim() ? value.trim() : undefined,
);

const rawActivitySchema = z.object({
  time: optionalText,
  title: optionalText,
  activity: optionalText,
  location: optionalText,
  place: optionalText,
  details: optionalText,
  description: optionalText,
  estimatedCost: z.unknown(),
  cost: z.unknown(),
  duration: optionalText,
  kind: z.unknown(),
});

const rawDaySchema = z.object({
  activities: z.array(z.unknown()).default([]),
});

const rawItinerarySchema = z.object({
  days: z.array(z.unknown()).optional(),
  daily_plans: z.array(z.unknown()).optional(),
});

function normalizeActivity(value: unknown): ParsedActivity | null {
  const parsed = rawActivitySchema.safeParse(value);
  if (!parsed.success) return null;
  const raw = parsed.data;

  const title = raw.title ?? raw.activity;
  if (!title) return null;

  const cost = raw.estimatedCost ?? raw.cost;
  return {
    time: raw.time ?? "TBD",
    title,
    location: raw.location ?? raw.place,
    details: raw.details ?? raw.description,
    estimatedCost: cost === undefined ? extractCost(title) : toCost(cost),
    duration: raw.duration ?? "1 hour",
    kind: toKind(raw.kind),
  };
}

function normalizeDays(values: unknown[]): ParsedDay[] {
  const days: ParsedDay[] = [];
  for (const value of values) {
    const parsed = rawDaySchema.safeParse(value);
    if (!parsed.success) continue;
    const activities = parsed.data.activities
      .map(normalizeActivity)
      .filter((activity): activity is ParsedActivity => activity !== null);
    if (activities.length > 0) days.push({ activities });
  }
  return days;
}

function stripFences(text: string): string {
  return text.replace(/```(?:json)?/gi, "").trim();
}

/**
 * Keeps the complete objects of a "days" array cut off mid-way.
 *   {"days":[{...},{"activities":[{"ti   ->   {"days":[{...}]}
 */
export function repairTruncatedJson(broken: string): unknown {
  const arrStart = broken.indexOf("[");
  if (arrStart === -1) return null;

  let lastCompleteIdx = -1;
  let braceDepth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = arrStart + 1; i < broken.length; i++) {
    const ch = broken[i];

    if (escapeNext) { escapeNext = false; continue; }
    if (ch === "\\") { escapeNext = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;

    if (ch === "{") braceDepth++;
    if (ch === "}") {
      braceDepth--;
      if (braceDepth === 0) lastCompleteIdx = i;
    }
    if (ch === "]" && braceDepth === 0) break;
  }

  if (lastCompleteIdx === -1) return null;

  const repaired = broken.substring(0, lastCompleteIdx + 1) + "]}";
  try {
    return JSON.parse(repaired);
  } catch {
    return null;
  }
}

function parseJsonDays(text: string): ParsedDay[] {
  const cleaned = stripFences(text);
  const start = cleaned.indexOf("{");
  if (start === -1) return [];

  const end = cleaned.lastIndexOf("}");
  let data: unknown = null;
  if (end > start) {
    try {
      data = JSON.parse(cleaned.slice(start, end + 1));
    } catch {
      data = null;
    }
  }
  if (data === null) {
    data = repairTruncatedJson(cleaned.slice(start));
    if (data !== null) console.warn("[Parser] ⚠️ Recovered truncated JSON response");
  }

  const parsed = rawItinerarySchema.safeParse(data);
  if (!parsed.success) return [];
  return normalizeDays(parsed.data.days ?? parsed.data.daily_plans ?? []);
}

const DAY_HEADER = /^\s*[#*\s]*Day\s+(\d+)\b[^\n]*$/i;
const TIME_LINE = /^\s*[-*•]?\s*\**\s*(\d{1,2}(?::\d{2})?\s*(?:AM|PM)?(?:\s*[-–]\s*\d{1,2}(?::\d{2})?\s*(?:AM|PM)?)?|Morning|Afternoon|Evening|Night|Late Night)\s*\**\s*:\s*\**\s*(.+)$/i;

function parseTextDays(text: string): ParsedDay[] {
  const days: ParsedDay[] = [];
  let currentDay: ParsedDay | null = null;
  let currentActivity: ParsedActivity | null = null;

  const closeActivity = () => {
    if (currentDay && currentActivity) currentDay.activities.push(currentActivity);
    currentActivity = null;
  };
  const closeDay = () => {
    closeActivity();
    if (currentDay && currentDay.activities.length > 0) days.push(currentDay);
    currentDay = null;
  };

  for (const rawLine of stripFences(text).split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    if (DAY_HEADER.test(line)) {
      closeDay();
      currentDay = { activities: [] };
      continue;
    }
    if (!currentDay) continue;

    const timed = line.match(TIME_LINE);
    if (timed) {
      closeActivity();
      const body = timed[2].replace(/\*+/g, "").trim();
      const title = body.split(/\s+[-–]\s+/)[0].trim();
      currentActivity = {
        time: timed[1].trim(),
        title,
        location: extractPlace(body),
        estimatedCost: extractCost(body),
        duration: extractDuration(body),
        kind: "activity",
      };
      continue;
    }

    if (currentActivity) {
      const note = line.replace(/^[-*•]\s*/, "");
      currentActivity.details = currentActivity.details ? `${currentActivity.details} ${note}` : note;
      if (currentActivity.estimatedCost === 0) currentActivity.estimatedCost = extractCost(note);
      if (!currentActivity.location) currentActivity.location = extractPlace(note);
    }
  }
  closeDay();
  return days;
}

/**
 * Day plans found in a model reply, in order. Empty when nothing parses.
 */
export function parseItineraryResponse(text: string): ParsedDay[] {
  const fromJson = parseJsonDays(text);
  if (fromJson.length > 0) return fromJson;
  return parseTextDays(text);
}

export interface ModificationIntent {
  budgetAdjustment: "increase" | "decrease" | "none";
  accommodation: "budget" | "luxury" | "none";
  newThemes: TravelTheme[];
}

export const NO_CHANGE: ModificationIntent = { budgetAdjustment: "none", accommodation: "none", newThemes: [] };

/**
 * Reads "KEY: value" lines from an intent analysis reply. Unknown keys,
 * values and themes are ignored, so a reply that says nothing usable is
 * NO_CHANGE.
 */
export function parseModificationIntent(text: string): ModificationIntent {
  const fields = new Map<string, string>();
  for (const line of stripFences(text).split("\n")) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const key = line.slice(0, colon).replace(/[^A-Za-z_\s]/g, "").trim().toUpperCase().replace(/\s+/g, "_");
    fields.set(key, line.slice(colon + 1).replace(/\*+/g, "").trim().toLowerCase());
  }

  const budget = fields.get("BUDGET_ADJUSTMENT") ?? "";
  const accommodation = fields.get("ACCOMMODATION_PREFERENCE") ?? "";
  const newThemes = (fields.get("NEW_THEMES") ?? "")
    .split(",")
    .map((name) => TRAVEL_THEMES.find((theme) => theme.toLowerCase() === name.trim()))
    .filter((theme): theme is TravelTheme => theme !== undefined);

  return {
    budgetAdjustment: budget.includes("increase") ? "increase" : budget.includes("decrease") ? "decrease" : "none",
    accommodation: accommodation.includes("luxury") ? "luxury" : accommodation.includes("budget") ? "budget" : "none",
    newThemes: [...new Set(newThemes)],
  };
}
