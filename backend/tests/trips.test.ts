import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { ConfigError } from "../src/errors";
import { isCalendarDate, loadTrips, parseTripsCsv, parseTripsJson } from "../src/tools/trips";

const HEADER =
  "origin_label,origin_lat,origin_lon,destination_label,destination_lat,destination_lon,timestamp,mode,duration_minutes,distance_km";

function writeTemp(name: string, content: string) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "trips-"));
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, "utf8");
  return file;
}

test("isCalendarDate accepts real dates only", () => {
  assert.equal(isCalendarDate("2025-03-14"), true);
  assert.equal(isCalendarDate("2024-02-29"), true);
  assert.equal(isCalendarDate("2025-02-29"), false);
  assert.equal(isCalendarDate("2025-3-14"), false);
  assert.equal(isCalendarDate("14/03/2025"), false);
});

test("parses CSV rows, blank cells and mixed-case modes", () => {
  const trips = parseTripsCsv(
    [
      HEADER,
      "Home,33.89,35.50,Office,33.88,35.49,2025-03-03T08:05:00,Driving,18,4.2",
      "Office,,,Gym,,,2025-03-03 18:30,walking,22,",
      "",
    ].join("\n")
  );

  assert.equal(trips.length, 2);
  assert.deepEqual(trips[0], {
    origin: { label: "Home", latitude: 33.89, longitude: 35.5 },
    destination: { label: "Office", latitude: 33.88, longitude: 35.49 },
    timestamp: "2025-03-03T08:05:00",
    date: "2025-03-03",
    hour: 8,
    mode: "driving",
    durationMinutes: 18,
    distanceKm: 4.2,
  });
  assert.equal(trips[1]?.origin.latitude, undefined);
  assert.equal(trips[1]?.hour, 18);
  assert.equal(trips[1]?.distanceKm, undefined);
  assert.ok(Object.isFrozen(trips));
  assert.ok(Object.isFrozen(trips[0]));
});

test("reports the first invalid CSV record by number", () => {
  const csv = [
    HEADER,
    "Home,,,Office,,,2025-03-03T08:05,driving,18,4.2",
    "Home,,,Office,,,2025-02-30T08:05,driving,18,4.2",
  ].join("\n");

  assert.throws(() => parseTripsCsv(csv, "trips.csv"), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.equal(
      err.message,
      "Invalid record #2 in trips.csv: timestamp: expected a local timestamp like 2025-03-14T08:30"
    );
    return true;
  });
});

test("parses JSON trips", () => {
  const trips = parseTripsJson(
    JSON.stringify([
      {
        origin: { label: "Home", lat: 33.89, lon: 35.5 },
        destination: { label: "Office" },
        timestamp: "2025-03-04T09:15:00Z",
        mode: "cycling",
        duration_minutes: 20,
      },
    ])
  );

  assert.equal(trips.length, 1);
  assert.equal(trips[0]?.date, "2025-03-04");
  assert.equal(trips[0]?.hour, 9);
  assert.equal(trips[0]?.destination.latitude, undefined);
  assert.equal(trips[0]?.distanceKm, undefined);
});

test("rejects JSON that is not a list of trips", () => {
  assert.throws(() => parseTripsJson("{oops", "x.json"), /Trip data in x\.json is not valid JSON/);
  assert.throws(() => parseTripsJson("{}", "x.json"), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.equal(err.message, "Invalid trip data in x.json: Expected array, received object");
    return true;
  });
});

test("loadTrips picks the format by extension", () => {
  const csv = writeTemp("trips.csv", `${HEADER}\nHome,,,Gym,,,2025-03-05T19:00,walking,12,0.9\n`);
  assert.equal(loadTrips(csv).length, 1);

  const json = writeTemp("trips.json", "[]");
  assert.deepEqual(loadTrips(json), []);

  const txt = writeTemp("trips.txt", "");
  assert.throws(() => loadTrips(txt), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.equal(err.message, `Unsupported trip data format: ${txt} (expected .csv or .json)`);
    return true;
  });
});

test("loadTrips fails on a missing file", () => {
  const missing = path.join(os.tmpdir(), "no-such-dir", "trips.csv");
  assert.throws(() => loadTrips(missing), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.equal(err.message, `Cannot read trip data file ${missing}`);
    return true;
  });
});

test("the bundled sample dataset loads", () => {
  const trips = loadTrips(path.resolve(__dirname, "../data/trip_history.csv"));
  assert.equal(trips.length, 40);
  assert.equal(trips[0]?.origin.label, "Home");
});
