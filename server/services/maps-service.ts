import { z } from "zod";
import { NotFoundError, ServiceNotConfiguredError, UpstreamServiceError, ValidationError } from "../errors";
import { fetchJson, type FetchFn } from "../utils/http";

const GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";
const GOOGLE_PLACES_BASE_URL = "https://places.googleapis.com/v1/places";
const ROUTES_URL = "https://routes.googleapis.com/directions/v2:computeRoutes";
const SERVICE_NAME = "Google Maps Platform";

const geocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(z.object({
    formatted_address: z.string().default(""),
    place_id: z.string().default(""),
    geometry: z.object({
      location: z.object({ lat: z.number(), lng: z.number() }),
    }),
  })).default([]),
});

const nearbyResponseSchema = z.object({
  places: z.array(z.object({
    id: z.string(),
    displayName: z.object({ text: z.string() }).optional(),
    formattedAddress: z.string().optional(),
    location: z.object({ latitude: z.number(), longitude: z.number() }),
    rating: z.number().optional(),
    userRatingCount: z.number().optional(),
    types: z.array(z.string()).optional(),
    photos: z.array(z.object({ name: z.string() })).optional(),
    googleMapsUri: z.string().optional(),
  })).default([]),
});

const routesResponseSchema = z.object({
  routes: z.array(z.object({
    distanceMeters: z.number().optional(),
    duration: z.string().optional(),
  })).default([]),
});

export interface GeocodeResult {
  lat: number;
  lng: number;
  formattedAddress: string;
  placeId: string;
}

export interface NearbyPlace {
  placeId: string;
  name: string;
  address: string;
  lat: number;
  lng: number;
  rating?: number;
  userRatingCount?: number;
  types: string[];
  photoName?: string;
  googleMapsUrl?: string;
}

export type TravelMode = "DRIVE" | "TRANSIT" | "WALK" | "BICYCLE" | "TWO_WHEELER";

export interface RouteSummary {
  distanceMeters: number;
  durationSeconds: number;
  travelMode: TravelMode;
}

export interface MapsServiceOptions {
  apiKey?: string;
  fetch?: FetchFn;
}

export class MapsService {
  private readonly apiKey: string;
  private readonly fetchFn: FetchFn;

  constructor(options: MapsServiceOptions) {
    this.apiKey = options.apiKey ?? "";
    this.fetchFn = options.fetch ?? fetch;
    if (!this.apiKey) {
      console.warn("GOOGLE_MAPS_API_KEY is not set. Maps lookups will not work.");
    }
  }

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  private requireKey(): string {
    if (!this.apiKey) throw new ServiceNotConfiguredError(SERVICE_NAME);
    return this.apiKey;
  }

  /**
   * Resolves a place name to coordinates. An unknown place throws
   * NotFoundError; there is no default coordinate.
   */
  async geocode(place: string): Promise<GeocodeResult> {
    const query = place.trim();
    if (!query) throw new ValidationError("place is required");

    const params = new URLSearchParams({ address: query, key: this.requireKey() });
    const data = await fetchJson(this.fetchFn, SERVICE_NAME, `${GEOCODE_URL}?${params}`, geocodeResponseSchema);

    if (data.status === "ZERO_RESULTS" || (data.status === "OK" && data.results.length === 0)) {
      throw new NotFoundError(`No coordinates found for "${query}"`);
    }
    if (data.status !== "OK") {
      throw new UpstreamServiceError(SERVICE_NAME, `geocoding status ${data.status}`, data.error_message);
    }

    const [first] = data.results;
    return {
      lat: first.geometry.location.lat,
      lng: first.geometry.location.lng,
      formattedAddress: first.formatted_address,
      placeId: first.place_id,
    };
  }

  async findNearbyAttractions(lat: number, lng: number, radiusMeters: number = 5000): Promise<NearbyPlace[]> {
    const fieldMask = [
      "places.id",
      "places.displayName",
      "places.formattedAddress",
      "places.location",
      "places.rating",
      "places.userRatingCount",
      "places.types",
      "places.photos",
      "places.googleMapsUri",
    ].join(",");

    const data = await fetchJson(this.fetchFn, SERVICE_NAME, `${GOOGLE_PLACES_BASE_URL}:searchNearby`, nearbyResponseSchema, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Goog-Api-Key": this.requireKey(),
        "X-Goog-FieldMask": fieldMask,
      },
      body: JSON.stringify({
        includedTypes: ["tourist_attraction"],
        maxResultCount: 20,
        locationRestriction: {
          circle: {
            center: { latitude: lat, longitude: lng },
            radius: radiusMeters,
          },
        },
      }),
    });

    return data.places.map((place) => ({
      placeId: place.id,
      name: place.displayName?.text || "Unknown Place",
      address: place.formattedAddress || "",
      lat: place.location.latitude,
      lng: place.location.longitude,
      rating: place.rating,
      userRatingCount: place.userRatingCount,
      types: place.types || [],
      photoName: place.photos?.[0]?.name,
      googleMapsUrl: place.googleMapsUri,
    }));
  }

  /**
   * Distance and duration between two named places, or null when the
   * Routes API finds no route.
   */
  async getRoute(origin: string, destination: string, travelMode: TravelMode = "DRIVE"): Promise<RouteSummary | null> {
    const data = await fetchJson(this.fetchFn, SERVICE_NAME, ROUTES_URL, routesResponseSchema, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Goog-Api-Key": this.requireKey(),
        "X-Goog-FieldMask": "routes.duration,routes.distanceMeters",
      },
      body: JSON.stringify({
        origin: { address: origin },
        destination: { address: destination },
        travelMode,
      }),
    });

    const route = data.routes[0];
    if (!route) return null;

    return {
      distanceMeters: route.distanceMeters ?? 0,
      durationSeconds: parseInt(route.duration?.replace("s", "") || "0", 10),
      travelMode,
    };
  }

  photoUrl(photoName: string, maxWidth: number = 400): string {
    return `https://places.googleapis.com/v1/${photoName}/media?maxWidthPx=${maxWidth}&key=${this.requireKey()}`;
  }
}
