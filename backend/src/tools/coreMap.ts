/**
 * coreMap.ts
 *
 * Purpose:
 * - Geocoding, reverse geocoding and place lookup (Nominatim), POI search (Overpass)
 *   and routing (OSRM), each returning an Envelope.
 *
 * Place ids:
 * - OSM references of the form N123 / W123 / R123 (node, way, relation).
 *   geocode and search_poi return them; get_place_details expands them.
 */

import { z } from "zod";
import { DataNotFoundError, ValidationError, guard } from "../errors";
import { fail, ok, type Envelope } from "../types";
import type { RateLimitedFetcher } from "./fetcher";
import { assertCoordinates, haversineMeters, round } from "./geo";

export const ROUTE_MODES = ["driving", "walking", "cycling"] as const;
export type RouteMode = (typeof ROUTE_MODES)[number];

const OSRM_PROFILES: Record<RouteMode, string> = {
  driving: "car",
  walking: "foot",
  cycling: "bike",
};

/** Tag keys searched when no category is given. */
export const POI_KEYS = ["amenity", "shop", "tourism", "leisure", "historic"] as const;

const MAX_POIS = 20;
const MAX_RADIUS_M = 50_000;
const MAX_STEPS = 10;
const TAG_NAME = /^[A-Za-z0-9_:-]+$/;

// --- Upstream payloads ---

const StringMap = z.record(z.string());

const NominatimPlace = z.object({
  osm_type: z.string().optional(),
  osm_id: z.number().optional(),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string(),
  class: z.string().optional(),
  category: z.string().optional(),
  type: z.string().optional(),
  address: StringMap.optional(),
  extratags: StringMap.nullable().optional(),
});
type NominatimPlace = z.infer<typeof NominatimPlace>;

const NominatimList = z.array(NominatimPlace);
const NominatimReverse = z.union([z.object({ error: z.string() }), NominatimPlace]);

const OverpassElement = z.object({
  type: z.enum(["node", "way", "relation"]),
  id: z.number(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: z.object({ lat: z.number(), lon: z.number() }).optional(),
  tags: StringMap.optional(),
});
const OverpassResponse = z.object({ elements: z.array(OverpassElement) });

const OsrmStep = z.object({
  distance: z.number(),
  duration: z.number(),
  name: z.string().optional(),
  maneuver: z.object({ type: z.string(), modifier: z.string().optional() }),
});
const OsrmRoute = z.object({
  distance: z.number(),
  duration: z.number(),
  geometry: z.object({
    type: z.literal("LineString"),
    coordinates: z.array(z.tuple([z.number(), z.number()])),
  }),
  legs: z.array(z.object({ steps: z.array(OsrmStep).default([]) })),
});
const OsrmResponse = z.object({
  code: z.string(),
  message: z.string().optional(),
  routes: z.array(OsrmRoute).optional(),
});
type OsrmStep = z.infer<typeof OsrmStep>;

// --- Results ---

export type PointOfInterest = {
  place_id: string;
  name: string;
  category: string;
  key: string | null;
  distance_meters: number;
  latitude: number;
  longitude: number;
};

export type RouteStep = { instruction: string; distance_meters: number; duration_seconds: number };

// --- Helpers ---

const OSM_PREFIX: Record<string, string> = { node: "N", way: "W", relation: "R" };
const OSM_TYPE: Record<string, string> = { N: "node", W: "way", R: "relation" };

export function osmRef(type?: string, id?: number): string | undefined {
  const prefix = type ? OSM_PREFIX[type] : undefined;
  return prefix && id !== undefined ? `${prefix}${id}` : undefined;
}

/** "N123" | "w123" | "123" → "N123"; anything else is rejected. */
export function normalizePlaceId(placeId: string): string {
  const m = /^([NWR])?(\d+)$/i.exec(placeId.trim());
  if (!m) {
    throw new ValidationError("place_id", `expected an OSM reference like N123, W123 or R123 (got '${placeId}')`);
  }
  return `${(m[1] ?? "N").toUpperCase()}${m[2]}`;
}

type PoiQuery = { latitude: number; longitude: number; radius: number; category?: string; key?: string };

/** Overpass QL for nodes and ways around a point, filtered by tag. */
export function buildOverpassQuery({ latitude, longitude, radius, category, key }: PoiQuery): string {
  const around = `(around:${radius},${latitude},${longitude})`;
  const filter = category
    ? key
      ? `["${category}"="${key}"]`
      : `["${category}"]`
    : `[~"^(${POI_KEYS.join("|")})$"~"."]`;
  return [
    "[out:json][timeout:25];",
    "(",
    `  node${filter}${around};`,
    `  way${filter}${around};`,
    ");",
    "out center 100;",
  ].join("\n");
}

export function describeStep(step: OsrmStep): string {
  const { type, modifier } = step.maneuver;
  const road = step.name ? ` onto ${step.name}` : "";
  if (type === "depart") return step.name ? `Head out on ${step.name}` : "Head out";
  if (type === "arrive") return "Arrive at destination";
  if (type === "roundabout" || type === "rotary") return `Take the roundabout${road}`;
  const verb = type === "new name" || type === "continue" ? "Continue" : capitalize(type);
  return `${verb}${modifier ? ` ${modifier}` : ""}${road}`;
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

function pickAddress(address: Record<string, string> = {}) {
  return {
    road: address.road ?? "",
    neighbourhood: address.neighbourhood ?? address.suburb ?? "",
    city: address.city ?? address.town ?? address.village ?? "",
    state: address.state ?? "",
    country: address.country ?? "",
    postcode: address.postcode ?? "",
  };
}

function assertTagName(field: string, value: string) {
  if (!TAG_NAME.test(value)) {
    throw new ValidationError(field, `must be an OpenStreetMap tag name (letters, digits, '_', ':' or '-')`);
  }
}

export type CoreMapSources = {
  nominatim: RateLimitedFetcher;
  osrm: RateLimitedFetcher;
  overpass: RateLimitedFetcher;
};

export function createCoreMap({ nominatim, osrm, overpass }: CoreMapSources) {
  function placeSummary(place: NominatimPlace) {
    return {
      place_id: osmRef(place.osm_type, place.osm_id) ?? null,
      latitude: place.lat,
      longitude: place.lon,
      display_name: place.display_name,
      category: place.category ?? place.class ?? "",
      type: place.type ?? "",
      address: place.address ?? {},
    };
  }

  /** Free-text address → best match. */
  function geocode(query: string) {
    return guard("geocode", async () => {
      const q = query.trim();
      if (!q) throw new ValidationError("query", "must not be empty");

      const res = await nominatim.fetch(
        { path: "/search", params: { q, format: "json", limit: 1, addressdetails: 1 } },
        NominatimList
      );
      if (!res.success) return res;

      const best = res.data[0];
      if (!best) throw new DataNotFoundError(`No results found for '${q}'`);
      return ok(placeSummary(best));
    });
  }

  function reverseGeocode(latitude: number, longitude: number) {
    return guard("reverse_geocode", async () => {
      assertCoordinates(latitude, longitude);

      const res = await nominatim.fetch(
        { path: "/reverse", params: { lat: latitude, lon: longitude, format: "json", addressdetails: 1 } },
        NominatimReverse
      );
      if (!res.success) return res;
      if ("error" in res.data) {
        throw new DataNotFoundError(`No address found near ${latitude}, ${longitude}: ${res.data.error}`);
      }

      const place = res.data;
      return ok({
        display_name: place.display_name,
        address: pickAddress(place.address),
        place_id: osmRef(place.osm_type, place.osm_id) ?? null,
        latitude,
        longitude,
      });
    });
  }

  function searchPoi(
    latitude: number,
    longitude: number,
    radius = 1000,
    category?: string,
    key?: string
  ): Promise<Envelope<{ count: number; pois: PointOfInterest[] }>> {
    return guard("search_poi", async () => {
      assertCoordinates(latitude, longitude);
      if (!Number.isFinite(radius) || radius <= 0) {
        throw new ValidationError("radius", `must be a positive number of metres (got ${radius})`);
      }
      if (radius > MAX_RADIUS_M) {
        throw new ValidationError("radius", `must be at most ${MAX_RADIUS_M} metres (got ${radius})`);
      }
      if (category) assertTagName("category", category);
      if (key) {
        if (!category) throw new ValidationError("key", "requires a category");
        assertTagName("key", key);
      }

      const query = buildOverpassQuery({ latitude, longitude, radius, category, key });
      const res = await overpass.fetch({ method: "POST", form: { data: query } }, OverpassResponse);
      if (!res.success) return res;

      const pois: PointOfInterest[] = [];
      for (const el of res.data.elements) {
        const lat = el.lat ?? el.center?.lat;
        const lon = el.lon ?? el.center?.lon;
        if (lat === undefined || lon === undefined) continue;

        const tags = el.tags ?? {};
        const tag = category ?? POI_KEYS.find((k) => k in tags) ?? "amenity";
        pois.push({
          place_id: `${OSM_PREFIX[el.type]}${el.id}`,
          name: tags.name ?? "Unnamed",
          category: tag,
          key: tags[tag] ?? null,
          distance_meters: round(haversineMeters(latitude, longitude, lat, lon)),
          latitude: lat,
          longitude: lon,
        });
      }

      pois.sort((a, b) => a.distance_meters - b.distance_meters);
      const nearest = pois.slice(0, MAX_POIS);
      return ok({ count: nearest.length, pois: nearest });
    });
  }

  function getPlaceDetails(placeId: string) {
    return guard("get_place_details", async () => {
      const ref = normalizePlaceId(placeId);

      const res = await nominatim.fetch(
        { path: "/lookup", params: { osm_ids: ref, format: "json", addressdetails: 1, extratags: 1 } },
        NominatimList
      );
      if (!res.success) return res;

      const place = res.data[0];
      if (!place) throw new DataNotFoundError(`Place not found: ${placeId}`);

      const extratags = place.extratags ?? {};
      return ok({
        place_id: ref,
        osm_type: OSM_TYPE[ref.charAt(0)],
        name: place.display_name.split(",")[0]?.trim() ?? "",
        full_address: place.display_name,
        latitude: place.lat,
        longitude: place.lon,
        address: place.address ?? {},
        category: place.category ?? place.class ?? "",
        type: place.type ?? "",
        phone: extratags.phone ?? extratags["contact:phone"] ?? "",
        website: extratags.website ?? extratags["contact:website"] ?? "",
        opening_hours: extratags.opening_hours ?? "",
        extratags,
      });
    });
  }

  function getRoute(originLat: number, originLon: number, destLat: number, destLon: number, mode: string = "driving") {
    return guard("get_route", async () => {
      if (!isRouteMode(mode)) {
        throw new ValidationError("mode", `must be one of ${ROUTE_MODES.join(", ")} (got '${mode}')`);
      }
      assertCoordinates(originLat, originLon, "origin");
      assertCoordinates(destLat, destLon, "dest");

      const profile = OSRM_PROFILES[mode];
      const res = await osrm.fetch(
        {
          path: `/route/v1/${profile}/${originLon},${originLat};${destLon},${destLat}`,
          params: { overview: "full", steps: "true", geometries: "geojson" },
        },
        OsrmResponse
      );
      if (!res.success) return res;

      const route = res.data.routes?.[0];
      if (res.data.code !== "Ok" || !route) {
        return fail(`Routing error: ${res.data.message ?? res.data.code}`);
      }

      const steps: RouteStep[] = route.legs
        .flatMap((leg) => leg.steps)
        .slice(0, MAX_STEPS)
        .map((step) => ({
          instruction: describeStep(step),
          distance_meters: round(step.distance),
          duration_seconds: round(step.duration),
        }));

      const km = route.distance / 1000;
      const minutes = route.duration / 60;
      return ok({
        mode,
        distance_meters: round(route.distance),
        distance_km: round(km),
        duration_seconds: round(route.duration),
        duration_minutes: round(minutes),
        geometry: route.geometry,
        steps,
        summary: `${km.toFixed(1)} km, approximately ${Math.round(minutes)} minutes by ${mode}`,
      });
    });
  }

  return { geocode, reverseGeocode, searchPoi, getPlaceDetails, getRoute };
}

export type CoreMap = ReturnType<typeof createCoreMap>;

const ROUTE_MODE_SET: ReadonlySet<string> = new Set(ROUTE_MODES);

export function isRouteMode(value: string): value is RouteMode {
  return ROUTE_MODE_SET.has(value);
}
