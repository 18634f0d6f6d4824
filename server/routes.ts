import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import { z } from "zod";
import {
  insertTripFeedbackSchema,
  mapMarkerSchema,
  modifyRequestSchema,
  tripRequestSchema,
} from "@shared/schema";
import { NotFoundError, ServiceNotConfiguredError, ValidationError } from "./errors";
import { renderMapHtml } from "./services/map-html";
import type { Services } from "./services";

const placeQuerySchema = z.object({ place: z.string().trim().min(1, "place is required") });
const topicQuerySchema = z.object({ topic: z.string().trim().min(1, "topic is required") });
const destinationQuerySchema = z.object({ destination: z.string().trim().min(1, "destination is required") });

const nearbyQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lng: z.coerce.number().min(-180).max(180),
  radius: z.coerce.number().int().min(1).max(50000).default(5000),
});

const routeRequestSchema = z.object({
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  travelMode: z.enum(["DRIVE", "TRANSIT", "WALK", "BICYCLE", "TWO_WHEELER"]).default("DRIVE"),
});

const mapRequestSchema = z.object({ markers: z.array(mapMarkerSchema) });

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, label);
  return parsed.data;
}

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function registerRoutes(app: Express, services: Services): Server {
  const { planner, maps, youtube, storage, config } = services;

  // Itineraries
  app.post("/api/itineraries/generate", route(async (req, res) => {
    const request = parseWith(tripRequestSchema, req.body, "trip request");
    res.json(await planner.plan(request));
  }));

  app.post("/api/itineraries/options", route(async (req, res) => {
    const request = parseWith(tripRequestSchema, req.body, "trip request");
    res.json(await planner.planOptions(request));
  }));

  app.post("/api/itineraries/modify", route(async (req, res) => {
    const { itinerary, instruction } = parseWith(modifyRequestSchema, req.body, "modification request");
    res.json(await planner.modify(itinerary, instruction));
  }));

  // Maps
  app.get("/api/geocode", route(async (req, res) => {
    const { place } = parseWith(placeQuerySchema, req.query, "query");
    res.json(await maps.geocode(place));
  }));

  app.get("/api/places/nearby", route(async (req, res) => {
    const { lat, lng, radius } = parseWith(nearbyQuerySchema, req.query, "query");
    const places = await maps.findNearbyAttractions(lat, lng, radius);
    res.json(places.map((place) => ({
      ...place,
      photoUrl: place.photoName ? maps.photoUrl(place.photoName) : undefined,
    })));
  }));

  app.post("/api/routes", route(async (req, res) => {
    const { origin, destination, travelMode } = parseWith(routeRequestSchema, req.body, "route request");
    const summary = await maps.getRoute(origin, destination, travelMode);
    if (!summary) throw new NotFoundError(`No route found from "${origin}" to "${destination}"`);
    res.json(summary);
  }));

  app.post("/api/map/html", route(async (req, res) => {
    const { markers } = parseWith(mapRequestSchema, req.body, "map request");
    if (!config.mapsApiKey) throw new ServiceNotConfiguredError("Google Maps Platform");
    res.type("html").send(renderMapHtml(markers, config.mapsApiKey));
  }));

  // Videos and influencer tips
  app.get("/api/videos", route(async (req, res) => {
    const { topic } = parseWith(topicQuerySchema, req.query, "query");
    res.json(await youtube.searchTravelVideos(topic));
  }));

  app.get("/api/influencers", route(async (req, res) => {
    const { destination } = parseWith(destinationQuerySchema, req.query, "query");
    res.json(await storage.getInfluencerRecommendations(destination));
  }));

  // Feedback
  app.post("/api/feedback", route(async (req, res) => {
    const feedback = parseWith(insertTripFeedbackSchema, req.body, "feedback");
    res.status(201).json(await storage.saveFeedback(feedback));
  }));

  app.get("/api/feedback/insights", route(async (req, res) => {
    const { destination } = parseWith(destinationQuerySchema, req.query, "query");
    res.json(await storage.getDestinationInsights(destination));
  }));

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      services: {
        gemini: !!config.gemini.apiKey || !!config.gemini.project,
        maps: maps.isConfigured(),
        youtube: youtube.isConfigured(),
        database: services.database !== null,
      },
    });
  });

  return createServer(app);
}
