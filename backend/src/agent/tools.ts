/**
 * Tools the agent can call: map, travel history and weather. Order here is the order
 * the model sees them in.
 */
import { z } from "zod";
import { ROUTE_MODES, type CoreMap } from "../tools/coreMap";
import { TIME_OF_DAY, type History } from "../tools/history";
import type { Weather } from "../tools/weather";
import { ToolRegistry, defineTool, type ToolDefinition } from "./registry";

const latitude = z.number().describe("Latitude in decimal degrees (-90 to 90)");
const longitude = z.number().describe("Longitude in decimal degrees (-180 to 180)");
const date = (what: string) => z.string().optional().describe(`${what} in YYYY-MM-DD format (optional)`);

export type ToolSources = { core: CoreMap; history: History; weather: Weather };

export function createTools({ core, history, weather }: ToolSources): ToolDefinition[] {
  return [
    // --- Core map ---
    defineTool({
      name: "geocode",
      description:
        "Convert an address or place name to coordinates. Returns latitude, longitude, the normalized address and a place_id usable with get_place_details.",
      input: {
        query: z.string().describe("Address or place name, e.g. 'Hamra Street, Beirut'"),
      },
      run: ({ query }) => core.geocode(query),
    }),
    defineTool({
      name: "reverse_geocode",
      description: "Convert coordinates to the nearest human-readable address, including neighbourhood and city.",
      input: { latitude, longitude },
      run: (a) => core.reverseGeocode(a.latitude, a.longitude),
    }),
    defineTool({
      name: "search_poi",
      description:
        "Find points of interest within a radius of a location, nearest first. Filter with an OpenStreetMap tag: category is the tag key (amenity, shop, tourism...), key is the tag value (cafe, supermarket...). Without a category, all common POI types are returned.",
      input: {
        latitude,
        longitude,
        radius: z.number().optional().describe("Search radius in metres (default 1000, max 50000)"),
        category: z.string().optional().describe("OpenStreetMap tag key, e.g. 'amenity', 'shop', 'tourism'"),
        key: z.string().optional().describe("OpenStreetMap tag value for the category, e.g. 'cafe', 'pharmacy'"),
      },
      run: (a) => core.searchPoi(a.latitude, a.longitude, a.radius, a.category, a.key),
    }),
    defineTool({
      name: "get_place_details",
      description:
        "Get details for a place id returned by geocode or search_poi: name, full address, coordinates, phone, website and opening hours when known.",
      input: {
        place_id: z.string().describe("OpenStreetMap reference such as 'N123456' (node), 'W123456' (way) or 'R123' (relation)"),
      },
      run: ({ place_id }) => core.getPlaceDetails(place_id),
    }),
    defineTool({
      name: "get_route",
      description:
        "Calculate a route between two coordinates. Returns distance, duration, the path geometry, the first turn-by-turn steps and a summary.",
      input: {
        origin_lat: z.number().describe("Origin latitude"),
        origin_lon: z.number().describe("Origin longitude"),
        dest_lat: z.number().describe("Destination latitude"),
        dest_lon: z.number().describe("Destination longitude"),
        mode: z.enum(ROUTE_MODES).optional().describe("Transport mode (default driving)."),
      },
      run: (a) => core.getRoute(a.origin_lat, a.origin_lon, a.dest_lat, a.dest_lon, a.mode),
    }),

    // --- Travel history ---
    defineTool({
      name: "get_frequent_places",
      description:
        "List the user's frequently visited places from their trip history, most visited first. Labels are names the user gave (Home, Office...), not addresses. Only pass dates the user actually gave.",
      input: {
        start_date: date("First day of the window"),
        end_date: date("Last day of the window"),
        min_visits: z.number().optional().describe("Minimum number of visits to include a place (default 3)"),
      },
      run: (a) => history.getFrequentPlaces(a.start_date, a.end_date, a.min_visits),
    }),
    defineTool({
      name: "summarize_travel_stats",
      description:
        "Aggregate travel statistics for a period: number of trips, time and distance travelled, breakdown by transport mode and the most common routes.",
      input: {
        start_date: date("First day of the window"),
        end_date: date("Last day of the window"),
      },
      run: (a) => history.summarizeTravelStats(a.start_date, a.end_date),
    }),
    defineTool({
      name: "get_typical_route",
      description:
        "Typical trip between two of the user's labelled places: most common mode, median and average duration, trip count.",
      input: {
        origin_label: z.string().describe("Origin place label, e.g. 'Home'"),
        destination_label: z.string().describe("Destination place label, e.g. 'Office'"),
        time_of_day: z
          .enum(TIME_OF_DAY)
          .optional()
          .describe("Only trips starting in this part of the day (optional)."),
      },
      run: (a) => history.getTypicalRoute(a.origin_label, a.destination_label, a.time_of_day),
    }),

    // --- Weather & environment ---
    defineTool({
      name: "get_current_weather",
      description:
        "Current weather at a location: temperature, feels-like, humidity, wind, precipitation and conditions. Optionally adds a 3-day outlook.",
      input: {
        latitude,
        longitude,
        include_forecast: z.boolean().optional().describe("Add a 3-day daily outlook (default false)"),
      },
      run: (a) => weather.getCurrentWeather(a.latitude, a.longitude, a.include_forecast),
    }),
    defineTool({
      name: "get_air_quality",
      description: "Air quality index and pollutant concentrations at a location, with a health recommendation.",
      input: { latitude, longitude },
      run: (a) => weather.getAirQuality(a.latitude, a.longitude),
    }),
    defineTool({
      name: "get_astronomy_data",
      description:
        "Sunrise, sunset, daylight hours and moon phase for a location and date. Dates from 92 days ago up to 15 days ahead are supported.",
      input: {
        latitude,
        longitude,
        date: date("Date (defaults to today)"),
      },
      run: (a) => weather.getAstronomyData(a.latitude, a.longitude, a.date),
    }),
  ];
}

export function createToolRegistry(sources: ToolSources): ToolRegistry {
  return new ToolRegistry(createTools(sources));
}
