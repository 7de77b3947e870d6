/**
 * trips.ts
 *
 * Purpose:
 * - Load the read-only trip history once at startup (CSV or JSON, by extension),
 *   validate every record and hand back a frozen sequence.
 *
 * CSV columns:
 *   origin_label, origin_lat, origin_lon, destination_label, destination_lat,
 *   destination_lon, timestamp, mode, duration_minutes, distance_km
 * JSON: an array of { origin: {label, lat?, lon?}, destination: {...}, timestamp,
 *   mode, duration_minutes, distance_km? }
 *
 * Timestamps are local wall-clock times (YYYY-MM-DDTHH:mm[:ss]); a trailing zone is
 * accepted and ignored.
 */

import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ConfigError, describeIssue } from "../errors";

export type TripPlace = Readonly<{ label: string; latitude?: number; longitude?: number }>;

export type Trip = Readonly<{
  origin: TripPlace;
  destination: TripPlace;
  timestamp: string;
  /** YYYY-MM-DD part of the timestamp. */
  date: string;
  /** 0-23, from the timestamp. */
  hour: number;
  mode: string;
  durationMinutes: number;
  distanceKm?: number;
}>;

const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/** True for a real calendar date in YYYY-MM-DD form. */
export function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

const Timestamp = z.string().refine((value) => {
  const m = TIMESTAMP.exec(value);
  return !!m && !!m[1] && isCalendarDate(m[1]) && Number(m[2]) < 24 && Number(m[3]) < 60;
}, "expected a local timestamp like 2025-03-14T08:30");

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);
const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());

const JsonPlace = z.object({
  label: z.string().min(1),
  lat: z.number().optional(),
  lon: z.number().optional(),
});

const JsonTrip = z.object({
  origin: JsonPlace,
  destination: JsonPlace,
  timestamp: Timestamp,
  mode: z.string().min(1),
  duration_minutes: z.number().nonnegative(),
  distance_km: z.number().nonnegative().optional(),
});

const CsvTrip = z.object({
  origin_label: z.string().min(1),
  origin_lat: optionalNumber,
  origin_lon: optionalNumber,
  destination_label: z.string().min(1),
  destination_lat: optionalNumber,
  destination_lon: optionalNumber,
  timestamp: Timestamp,
  mode: z.string().min(1),
  duration_minutes: z.coerce.number().nonnegative(),
  distance_km: optionalNumber,
});

type TripFields = {
  origin: { label: string; lat?: number; lon?: number };
  destination: { label: string; lat?: number; lon?: number };
  timestamp: string;
  mode: string;
  duration_minutes: number;
  distance_km?: number;
};

function place(p: TripFields["origin"]): TripPlace {
  return Object.freeze({ label: p.label, latitude: p.lat, longitude: p.lon });
}

export function toTrip(fields: TripFields): Trip {
  return Object.freeze({
    origin: place(fields.origin),
    destination: place(fields.destination),
    timestamp: fields.timestamp,
    date: fields.timestamp.slice(0, 10),
    hour: Number(fields.timestamp.slice(11, 13)),
    mode: fields.mode.toLowerCase(),
    durationMinutes: fields.duration_minutes,
    distanceKm: fields.distance_km,
  });
}

function invalid(file: string, error: z.ZodError): ConfigError {
  const issue = error.issues[0];
  if (!issue) return new ConfigError(`Invalid trip data in ${file}`);
  const [index, ...rest] = issue.path;
  const where = typeof index === "number" ? `record #${index + 1}` : "trip data";
  return new ConfigError(`Invalid ${where} in ${file}: ${describeIssue({ ...issue, path: rest })}`);
}

export function parseTripsCsv(text: string, file = "<csv>"): readonly Trip[] {
  const rows: unknown = parse(text, { columns: true, skip_empty_lines: true, trim: true });
  const parsed = z.array(CsvTrip).safeParse(rows);
  if (!parsed.success) throw invalid(file, parsed.error);

  return Object.freeze(
    parsed.data.map((r) =>
      toTrip({
        origin: { label: r.origin_label, lat: r.origin_lat, lon: r.origin_lon },
        destination: { label: r.destination_label, lat: r.destination_lat, lon: r.destination_lon },
        timestamp: r.timestamp,
        mode: r.mode,
        duration_minutes: r.duration_minutes,
        distance_km: r.distance_km,
      })
    )
  );
}

export function parseTripsJson(text: string, file = "<json>"): readonly Trip[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Trip data in ${file} is not valid JSON`, err);
  }
  const parsed = z.array(JsonTrip).safeParse(raw);
  if (!parsed.success) throw invalid(file, parsed.error);
  return Object.freeze(parsed.data.map(toTrip));
}

/** Read and validate the dataset file. Throws ConfigError on any problem. */
export function loadTrips(file: string): readonly Trip[] {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read trip data file ${file}`, err);
  }

  switch (path.extname(file).toLowerCase()) {
    case ".csv":
      return parseTripsCsv(text, file);
    case ".json":
      return parseTripsJson(text, file);
    default:
      throw new ConfigError(`Unsupported trip data format: ${file} (expected .csv or .json)`);
  }
}
