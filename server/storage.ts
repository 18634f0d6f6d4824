import {
  type InfluencerRecommendation, type InsertInfluencerRecommendation,
  type TripFeedback, type InsertTripFeedback,
  type DestinationInsights,
  influencerRecommendations, tripFeedback,
} from "@shared/schema";
import type { Database } from "./db";
import { asc, desc, sql } from "drizzle-orm";

const TOP_LIKED_LIMIT = 10;

export interface IStorage {
  // Influencer recommendations (read-only at run time)
  getInfluencerRecommendations(destination: string): Promise<InfluencerRecommendation[]>;

  // Feedback
  saveFeedback(feedback: InsertTripFeedback): Promise<TripFeedback>;
  getDestinationInsights(destination: string): Promise<DestinationInsights>;
}

function normalizeDestination(destination: string): string {
  return destination.trim().toLowerCase();
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  const sum = values.reduce((acc, value) => acc + value, 0);
  return Math.round((sum / values.length) * 100) / 100;
}

export function summarizeFeedback(destination: string, rows: TripFeedback[]): DestinationInsights {
  const likedCounts = new Map<string, number>();
  for (const row of rows) {
    for (const place of new Set(row.likedPlaces)) {
      likedCounts.set(place, (likedCounts.get(place) ?? 0) + 1);
    }
  }

  const topLikedPlaces = Array.from(likedCounts.entries())
    .map(([place, count]) => ({ place, count }))
    .sort((a, b) => b.count - a.count || a.place.localeCompare(b.place))
    .slice(0, TOP_LIKED_LIMIT);

  const accuracies = rows
    .map((row) => row.budgetAccuracy)
    .filter((value): value is number => value !== null);

  return {
    destination,
    feedbackCount: rows.length,
    averageRating: average(rows.map((row) => row.rating)),
    averageBudgetAccuracy: average(accuracies),
    topLikedPlaces,
  };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  async getInfluencerRecommendations(destination: string): Promise<InfluencerRecommendation[]> {
    return this.db
      .select()
      .from(influencerRecommendations)
      .where(sql`lower(${influencerRecommendations.destination}) = ${normalizeDestination(destination)}`)
      .orderBy(asc(influencerRecommendations.id));
  }

  async saveFeedback(feedback: InsertTripFeedback): Promise<TripFeedback> {
    const [row] = await this.db.insert(tripFeedback).values(feedback).returning();
    return row;
  }

  async getDestinationInsights(destination: string): Promise<DestinationInsights> {
    const rows = await this.db
      .select()
      .from(tripFeedback)
      .where(sql`lower(${tripFeedback.destination}) = ${normalizeDestination(destination)}`)
      .orderBy(desc(tripFeedback.createdAt));
    return summarizeFeedback(destination, rows);
  }
}

export class MemStorage implements IStorage {
  private recommendations: InfluencerRecommendation[] = [];
  private feedback: TripFeedback[] = [];
  private nextRecommendationId = 1;
  private nextFeedbackId = 1;

  constructor(seed: InsertInfluencerRecommendation[] = []) {
    seed.forEach((row) => this.addInfluencerRecommendation(row));
  }

  addInfluencerRecommendation(row: InsertInfluencerRecommendation): InfluencerRecommendation {
    const stored: InfluencerRecommendation = {
      id: this.nextRecommendationId++,
      destination: row.destination,
      platform: row.platform,
      influencerName: row.influencerName,
      placeName: row.placeName,
      recommendation: row.recommendation,
      category: row.category ?? null,
      budgetRange: row.budgetRange ?? null,
      bestTime: row.bestTime ?? null,
      latitude: row.latitude ?? null,
      longitude: row.longitude ?? null,
      createdAt: row.createdAt ?? new Date(),
    };
    this.recommendations.push(stored);
    return stored;
  }

  async getInfluencerRecommendations(destination: string): Promise<InfluencerRecommendation[]> {
    const key = normalizeDestination(destination);
    return this.recommendations.filter((row) => row.destination.toLowerCase() === key);
  }

  async saveFeedback(feedback: InsertTripFeedback): Promise<TripFeedback> {
    const stored: TripFeedback = {
      id: this.nextFeedbackId++,
      itineraryRef: feedback.itineraryRef,
      destination: feedback.destination,
      rating: feedback.rating,
      comments: feedback.comments ?? null,
      likedPlaces: feedback.likedPlaces ?? [],
      dislikedPlaces: feedback.dislikedPlaces ?? [],
      budgetAccuracy: feedback.budgetAccuracy ?? null,
      createdAt: new Date(),
    };
    this.feedback.push(stored);
    return stored;
  }

  async getDestinationInsights(destination: string): Promise<DestinationInsights> {
    const key = normalizeDestination(destination);
    const rows = this.feedback.filter((row) => row.destination.toLowerCase() === key);
    return summarizeFeedback(destination, rows);
  }
}
