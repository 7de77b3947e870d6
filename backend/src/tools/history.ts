/**
 * history.ts
 *
 * Travel analytics over the preloaded trip sequence. No network, no mutation.
 *
 * - An empty date range is a valid outcome: stats come back as zeros and frequent
 *   places as an empty list.
 * - A route pair with no trips is a DataNotFoundError.
 */

import { DataNotFoundError, ValidationError, guard } from "../errors";
import { ok } from "../types";
import { round } from "./geo";
import { isCalendarDate, type Trip, type TripPlace } from "./trips";

export const TIME_OF_DAY = ["morning", "afternoon", "evening", "night"] as const;
export type TimeOfDay = (typeof TIME_OF_DAY)[number];

const TIME_OF_DAY_SET: ReadonlySet<string> = new Set(TIME_OF_DAY);
const TOP_ROUTES = 5;

/** morning 05-11, afternoon 12-16, evening 17-20, night 21-04 */
export function timeOfDayOf(hour: number): TimeOfDay {
  if (hour >= 5 && hour < 12) return "morning";
  if (hour >= 12 && hour < 17) return "afternoon";
  if (hour >= 17 && hour < 21) return "evening";
  return "night";
}

function parseDate(field: string, value?: string): string | undefined {
  if (value === undefined) return undefined;
  if (!isCalendarDate(value)) {
    throw new ValidationError(field, `expected a calendar date in YYYY-MM-DD format (got '${value}')`);
  }
  return value;
}

type DateRange = { start?: string; end?: string };

function parseRange(startDate?: string, endDate?: string): DateRange {
  const start = parseDate("start_date", startDate);
  const end = parseDate("end_date", endDate);
  if (start && end && start > end) {
    throw new ValidationError("start_date", `must not be after end_date (${start} > ${end})`);
  }
  return { start, end };
}

const routeLabel = (origin: string, destination: string) => `${origin} → ${destination}`;

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  return sorted.length % 2 ? upper : ((sorted[mid - 1] ?? 0) + upper) / 2;
}

function countBy<T>(items: readonly T[], key: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

/** Highest count first; equal counts by name ascending. */
function byCountThenName(a: [string, number], b: [string, number]) {
  if (a[1] !== b[1]) return b[1] - a[1];
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

export type FrequentPlace = { label: string; visit_count: number; latitude?: number; longitude?: number };

export function createHistory(trips: readonly Trip[]) {
  function inRange({ start, end }: DateRange): Trip[] {
    return trips.filter((t) => (!start || t.date >= start) && (!end || t.date <= end));
  }

  function timeWindow(range: DateRange, matched: readonly Trip[]) {
    const dates = matched.map((t) => t.date).sort();
    return {
      start_date: range.start ?? dates[0] ?? null,
      end_date: range.end ?? dates[dates.length - 1] ?? null,
    };
  }

  function getFrequentPlaces(startDate?: string, endDate?: string, minVisits = 3) {
    return guard("get_frequent_places", async () => {
      const range = parseRange(startDate, endDate);
      if (!Number.isInteger(minVisits) || minVisits < 1) {
        throw new ValidationError("min_visits", `must be a positive integer (got ${minVisits})`);
      }
      const matched = inRange(range);

      const visits = new Map<string, { count: number; place: TripPlace }>();
      const visit = (p: TripPlace) => {
        const seen = visits.get(p.label);
        const withCoords = p.latitude !== undefined && p.longitude !== undefined ? p : seen?.place ?? p;
        visits.set(p.label, { count: (seen?.count ?? 0) + 1, place: withCoords });
      };
      for (const trip of matched) {
        visit(trip.origin);
        visit(trip.destination);
      }

      const places: FrequentPlace[] = [...visits.entries()]
        .filter(([, v]) => v.count >= minVisits)
        .sort(([a, va], [b, vb]) => byCountThenName([a, va.count], [b, vb.count]))
        .map(([label, v]) => ({
          label,
          visit_count: v.count,
          latitude: v.place.latitude,
          longitude: v.place.longitude,
        }));

      return ok({ time_window: timeWindow(range, matched), total_places: places.length, places });
    });
  }

  function summarizeTravelStats(startDate?: string, endDate?: string) {
    return guard("summarize_travel_stats", async () => {
      const range = parseRange(startDate, endDate);
      const matched = inRange(range);

      const totalMinutes = matched.reduce((sum, t) => sum + t.durationMinutes, 0);
      const totalKm = matched.reduce((sum, t) => sum + (t.distanceKm ?? 0), 0);
      const n = matched.length;

      const byMode: Record<string, { trips: number; duration_minutes: number; distance_km: number }> = {};
      for (const t of matched) {
        const m = byMode[t.mode] ?? { trips: 0, duration_minutes: 0, distance_km: 0 };
        byMode[t.mode] = m;
        m.trips += 1;
        m.duration_minutes = round(m.duration_minutes + t.durationMinutes);
        m.distance_km = round(m.distance_km + (t.distanceKm ?? 0));
      }

      const topRoutes = [...countBy(matched, (t) => routeLabel(t.origin.label, t.destination.label))]
        .sort(byCountThenName)
        .slice(0, TOP_ROUTES)
        .map(([route, count]) => ({ route, trip_count: count }));

      return ok({
        time_window: timeWindow(range, matched),
        summary: {
          total_trips: n,
          total_duration_minutes: round(totalMinutes),
          average_duration_minutes: n ? round(totalMinutes / n) : 0,
          total_distance_km: round(totalKm),
          average_distance_km: n ? round(totalKm / n) : 0,
        },
        by_mode: byMode,
        top_routes: topRoutes,
      });
    });
  }

  function getTypicalRoute(originLabel: string, destinationLabel: string, timeOfDay?: string) {
    return guard("get_typical_route", async () => {
      if (!originLabel.trim()) throw new ValidationError("origin_label", "must not be empty");
      if (!destinationLabel.trim()) throw new ValidationError("destination_label", "must not be empty");
      if (timeOfDay !== undefined && !TIME_OF_DAY_SET.has(timeOfDay)) {
        throw new ValidationError("time_of_day", `must be one of ${TIME_OF_DAY.join(", ")} (got '${timeOfDay}')`);
      }

      const matched = trips.filter(
        (t) =>
          t.origin.label === originLabel &&
          t.destination.label === destinationLabel &&
          (timeOfDay === undefined || timeOfDayOf(t.hour) === timeOfDay)
      );
      const route = routeLabel(originLabel, destinationLabel);
      if (!matched.length) {
        throw new DataNotFoundError(
          `No trips found for route ${route}${timeOfDay ? ` in the ${timeOfDay}` : ""}`
        );
      }

      const modes = countBy(matched, (t) => t.mode);
      const [mostCommon] = [...modes].sort(byCountThenName);
      const durations = matched.map((t) => t.durationMinutes);
      const distances = matched.flatMap((t) => (t.distanceKm === undefined ? [] : [t.distanceKm]));

      return ok({
        route,
        time_of_day: timeOfDay ?? null,
        trip_count: matched.length,
        most_common_mode: mostCommon?.[0] ?? null,
        median_duration_minutes: round(median(durations)),
        average_duration_minutes: round(durations.reduce((a, b) => a + b, 0) / durations.length),
        average_distance_km: distances.length
          ? round(distances.reduce((a, b) => a + b, 0) / distances.length)
          : null,
        mode_distribution: Object.fromEntries(modes),
      });
    });
  }

  return { getFrequentPlaces, summarizeTravelStats, getTypicalRoute };
}

export type History = ReturnType<typeof createHistory>;
