import { sql } from "drizzle-orm";
import { pgTable, text, integer, serial, timestamp, real, jsonb } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Stored influencer tips, populated outside the app
export const influencerRecommendations = pgTable("influencer_recommendations", {
  id: serial("id").primaryKey(),
  destination: text("destination").notNull(),
  platform: text("platform").notNull(),
  influencerName: text("influencer_name").notNull(),
  placeName: text("place_name").notNull(),
  recommendation: text("recommendation").notNull(),
  category: text("category"),
  budgetRange: text("budget_range"),
  bestTime: text("best_time"),
  latitude: real("latitude"),
  longitude: real("longitude"),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const tripFeedback = pgTable("trip_feedback", {
  id: serial("id").primaryKey(),
  itineraryRef: text("itinerary_ref").notNull(),
  destination: text("destination").notNull(),
  rating: integer("rating").notNull(),
  comments: text("comments"),
  likedPlaces: jsonb("liked_places").$type<string[]>().default([]).notNull(),
  dislikedPlaces: jsonb("disliked_places").$type<string[]>().default([]).notNull(),
  budgetAccuracy: integer("budget_accuracy"),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

// Zod schemas for validation
export const insertTripFeedbackSchema = createInsertSchema(tripFeedback, {
  itineraryRef: (schema) => schema.min(1),
  destination: (schema) => schema.trim().min(1),
  rating: z.number().int().min(1).max(5),
  budgetAccuracy: z.number().int().min(1).max(5).nullish(),
  likedPlaces: z.array(z.string()).default([]),
  dislikedPlaces: z.array(z.string()).default([]),
}).omit({
  id: true,
  createdAt: true,
});

export const TRAVEL_THEMES = ["Heritage", "Nightlife", "Adventure", "Nature", "Luxury", "Family", "Food"] as const;
export const LANGUAGES = ["English", "Hindi", "Telugu", "Tamil"] as const;
export const TRANSPORT_MODES = ["Flight", "Train", "Bus", "Car"] as const;
export const PLAN_TYPES = ["Budget-Friendly", "Standard", "Premium"] as const;
export const ACTIVITY_KINDS = ["activity", "meal", "transport", "lodging"] as const;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((value) => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), "invalid date");

export const tripRequestSchema = z.object({
  origin: z.string().trim().min(1).optional(),
  destination: z.string().trim().min(1, "destination is required"),
  startDate: isoDate,
  days: z.number().int().min(1).max(30),
  budget: z.number().min(0, "budget must not be negative"),
  themes: z.array(z.enum(TRAVEL_THEMES)).default([]),
  language: z.enum(LANGUAGES).default("English"),
  transportMode: z.enum(TRANSPORT_MODES).optional(),
});

export const coordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export const activitySchema = z.object({
  time: z.string(),
  title: z.string(),
  location: z.string().optional(),
  details: z.string().optional(),
  estimatedCost: z.number().int().min(0),
  duration: z.string(),
  kind: z.enum(ACTIVITY_KINDS),
  influencerTip: z.object({
    influencer: z.string(),
    platform: z.string(),
    tip: z.string(),
  }).optional(),
  video: z.object({
    videoId: z.string(),
    title: z.string(),
    url: z.string(),
  }).optional(),
  coordinates: coordinatesSchema.optional(),
});

export const itineraryDaySchema = z.object({
  day: z.number().int().min(1),
  date: isoDate,
  activities: z.array(activitySchema).min(1),
  dayCost: z.number().int().min(0),
});

export const budgetStatusSchema = z.object({
  budget: z.number(),
  totalCost: z.number(),
  margin: z.number(),
  withinBudget: z.boolean(),
  overBy: z.number(),
});

export const itinerarySchema = z.object({
  destination: z.string(),
  origin: z.string().optional(),
  startDate: isoDate,
  days: z.number().int().min(1),
  budget: z.number().min(0),
  themes: z.array(z.enum(TRAVEL_THEMES)),
  language: z.enum(LANGUAGES),
  planType: z.enum(PLAN_TYPES),
  dailyPlans: z.array(itineraryDaySchema).min(1),
  totalCost: z.number().int().min(0),
  budgetStatus: budgetStatusSchema,
  source: z.enum(["ai", "template"]),
  dataSources: z.object({
    influencerRecommendations: z.number().int().min(0),
    videos: z.number().int().min(0),
  }),
  modification: z.string().optional(),
});

export const modifyRequestSchema = z.object({
  itinerary: itinerarySchema,
  instruction: z.string().trim().min(1, "instruction is required"),
});

export const mapMarkerSchema = z.object({
  name: z.string(),
  lat: z.number(),
  lng: z.number(),
});

// Types
export type InfluencerRecommendation = typeof influencerRecommendations.$inferSelect;
export type InsertInfluencerRecommendation = typeof influencerRecommendations.$inferInsert;
export type TripFeedback = typeof tripFeedback.$inferSelect;
export type InsertTripFeedback = z.infer<typeof insertTripFeedbackSchema>;

export type TravelTheme = (typeof TRAVEL_THEMES)[number];
export type Language = (typeof LANGUAGES)[number];
export type TransportMode = (typeof TRANSPORT_MODES)[number];
export type PlanType = (typeof PLAN_TYPES)[number];
export type ActivityKind = (typeof ACTIVITY_KINDS)[number];

export type TripRequest = z.infer<typeof tripRequestSchema>;
export type Coordinates = z.infer<typeof coordinatesSchema>;
export type Activity = z.infer<typeof activitySchema>;
export type ItineraryDay = z.infer<typeof itineraryDaySchema>;
export type BudgetStatus = z.infer<typeof budgetStatusSchema>;
export type Itinerary = z.infer<typeof itinerarySchema>;
export type MapMarker = z.infer<typeof mapMarkerSchema>;

export interface VideoReference {
  videoId: string;
  title: string;
  channel: string;
  url: string;
  thumbnailUrl: string;
  publishedAt: string;
  locations: string[];
  viewCount: number;
  likeCount: number;
}

export interface DestinationInsights {
  destination: string;
  feedbackCount: number;
  averageRating: number | null;
  averageBudgetAccuracy: number | null;
  topLikedPlaces: Array<{ place: string; count: number }>;
}
