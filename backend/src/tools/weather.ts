/**
 * weather.ts
 *
 * Purpose:
 * - Current conditions (+ 3-day outlook), air quality and sun/moon data from Open-Meteo.
 *
 * Notes:
 * - Units are metric (°C, km/h, mm, µg/m³).
 * - AQI bands and their health advice are fixed (US EPA scale).
 * - Moon phase is computed locally; sun times come from the forecast API, which only
 *   covers 92 days back to 15 days ahead.
 */

import { z } from "zod";
import { DataNotFoundError, ValidationError, guard } from "../errors";
import { ok } from "../types";
import type { RateLimitedFetcher } from "./fetcher";
import { assertCoordinates, round } from "./geo";
import { isCalendarDate } from "./trips";

export const FORECAST_DAYS = 3;
export const ASTRONOMY_PAST_DAYS = 92;
export const ASTRONOMY_FUTURE_DAYS = 15;

const DAY_MS = 86_400_000;
const SYNODIC_MONTH_DAYS = 29.53;
const REFERENCE_NEW_MOON = Date.UTC(2000, 0, 6, 18, 14);

const WMO_CODES: Record<number, string> = {
  0: "Clear sky",
  1: "Mainly clear",
  2: "Partly cloudy",
  3: "Overcast",
  45: "Fog",
  48: "Depositing rime fog",
  51: "Light drizzle",
  53: "Moderate drizzle",
  55: "Dense drizzle",
  56: "Light freezing drizzle",
  57: "Dense freezing drizzle",
  61: "Slight rain",
  63: "Moderate rain",
  65: "Heavy rain",
  66: "Light freezing rain",
  67: "Heavy freezing rain",
  71: "Slight snow",
  73: "Moderate snow",
  75: "Heavy snow",
  77: "Snow grains",
  80: "Slight rain showers",
  81: "Moderate rain showers",
  82: "Violent rain showers",
  85: "Slight snow showers",
  86: "Heavy snow showers",
  95: "Thunderstorm",
  96: "Thunderstorm with slight hail",
  99: "Thunderstorm with heavy hail",
};

export function describeWeatherCode(code: number | null | undefined): string {
  return code == null ? "Unknown" : WMO_CODES[code] ?? "Unknown";
}

export type AqiBand = { category: string; health_impact: string; recommendation: string };

const AQI_BANDS: ReadonlyArray<readonly [number, AqiBand]> = [
  [50, { category: "Good", health_impact: "Air quality is satisfactory", recommendation: "Enjoy outdoor activities" }],
  [
    100,
    {
      category: "Moderate",
      health_impact: "Acceptable for most people",
      recommendation: "Sensitive individuals should limit prolonged outdoor exertion",
    },
  ],
  [
    150,
    {
      category: "Unhealthy for Sensitive Groups",
      health_impact: "May cause breathing issues for sensitive groups",
      recommendation: "Children, older adults and people with respiratory conditions should reduce outdoor activity",
    },
  ],
  [
    200,
    {
      category: "Unhealthy",
      health_impact: "Everyone may experience health effects",
      recommendation: "Avoid prolonged outdoor activities",
    },
  ],
  [
    300,
    {
      category: "Very Unhealthy",
      health_impact: "Health alert: everyone may experience serious effects",
      recommendation: "Stay indoors and keep windows closed",
    },
  ],
];

const HAZARDOUS: AqiBand = {
  category: "Hazardous",
  health_impact: "Emergency conditions",
  recommendation: "Everyone should avoid all outdoor activities",
};

export function aqiBand(aqi: number): AqiBand {
  return AQI_BANDS.find(([upper]) => aqi <= upper)?.[1] ?? HAZARDOUS;
}

export type MoonPhase = { phase: string; illumination_percent: number };

export function moonPhase(date: string): MoonPhase {
  const [y, m, d] = date.split("-").map(Number);
  const days = (Date.UTC(y ?? 2000, (m ?? 1) - 1, d ?? 1) - REFERENCE_NEW_MOON) / DAY_MS;
  const position = (((days % SYNODIC_MONTH_DAYS) + SYNODIC_MONTH_DAYS) % SYNODIC_MONTH_DAYS) / SYNODIC_MONTH_DAYS;
  const illumination_percent = Math.round(100 * (1 - Math.abs(2 * position - 1)));

  let phase: string;
  if (position < 0.03 || position > 0.97) phase = "New Moon";
  else if (position < 0.22) phase = "Waxing Crescent";
  else if (position < 0.28) phase = "First Quarter";
  else if (position < 0.47) phase = "Waxing Gibbous";
  else if (position < 0.53) phase = "Full Moon";
  else if (position < 0.72) phase = "Waning Gibbous";
  else if (position < 0.78) phase = "Last Quarter";
  else phase = "Waning Crescent";

  return { phase, illumination_percent };
}

// --- Upstream payloads ---

const num = z.number().nullable();

const CurrentWeather = z.object({
  current: z.object({
    time: z.string(),
    temperature_2m: num,
    apparent_temperature: num,
    relative_humidity_2m: num,
    precipitation: num,
    weather_code: num,
    wind_speed_10m: num,
    wind_direction_10m: num,
  }),
  daily: z
    .object({
      time: z.array(z.string()),
      weather_code: z.array(num),
      temperature_2m_max: z.array(num),
      temperature_2m_min: z.array(num),
      precipitation_probability_max: z.array(num),
    })
    .optional(),
});

const AirQuality = z.object({
  current: z.object({
    time: z.string(),
    us_aqi: num,
    european_aqi: num.optional(),
    pm10: num,
    pm2_5: num,
    carbon_monoxide: num,
    nitrogen_dioxide: num,
    ozone: num,
  }),
});

const SunTimes = z.object({
  daily: z.object({
    time: z.array(z.string()),
    sunrise: z.array(z.string()),
    sunset: z.array(z.string()),
    daylight_duration: z.array(num),
    sunshine_duration: z.array(num),
  }),
});

export type WeatherSources = {
  forecast: RateLimitedFetcher;
  airQuality: RateLimitedFetcher;
  /** Clock used for "today"; defaults to the system clock. */
  now?: () => Date;
};

export function createWeather({ forecast, airQuality, now = () => new Date() }: WeatherSources) {
  function getCurrentWeather(latitude: number, longitude: number, includeForecast = false) {
    return guard("get_current_weather", async () => {
      assertCoordinates(latitude, longitude);

      const res = await forecast.fetch(
        {
          path: "/forecast",
          params: {
            latitude,
            longitude,
            current:
              "temperature_2m,relative_humidity_2m,apparent_temperature,precipitation,weather_code,wind_speed_10m,wind_direction_10m",
            daily: includeForecast
              ? "weather_code,temperature_2m_max,temperature_2m_min,precipitation_probability_max"
              : undefined,
            forecast_days: includeForecast ? FORECAST_DAYS : undefined,
            timezone: "auto",
          },
        },
        CurrentWeather
      );
      if (!res.success) return res;

      const c = res.data.current;
      const conditions = describeWeatherCode(c.weather_code);
      const daily = res.data.daily;
      const outlook = includeForecast && daily
        ? daily.time.map((date, i) => ({
            date,
            max_c: daily.temperature_2m_max[i] ?? null,
            min_c: daily.temperature_2m_min[i] ?? null,
            precipitation_probability: daily.precipitation_probability_max[i] ?? null,
            conditions: describeWeatherCode(daily.weather_code[i]),
          }))
        : undefined;

      return ok({
        location: { latitude, longitude },
        timestamp: c.time,
        current: {
          temperature_c: c.temperature_2m,
          feels_like_c: c.apparent_temperature,
          humidity_percent: c.relative_humidity_2m,
          precipitation_mm: c.precipitation,
          wind_speed_kmh: c.wind_speed_10m,
          wind_direction_degrees: c.wind_direction_10m,
          conditions,
        },
        ...(outlook ? { forecast: outlook } : {}),
        summary: `${conditions}, ${c.temperature_2m ?? "N/A"}°C (feels like ${c.apparent_temperature ?? "N/A"}°C)`,
      });
    });
  }

  function getAirQuality(latitude: number, longitude: number) {
    return guard("get_air_quality", async () => {
      assertCoordinates(latitude, longitude);

      const res = await airQuality.fetch(
        {
          path: "/air-quality",
          params: {
            latitude,
            longitude,
            current: "pm10,pm2_5,carbon_monoxide,nitrogen_dioxide,ozone,us_aqi,european_aqi",
          },
        },
        AirQuality
      );
      if (!res.success) return res;

      const c = res.data.current;
      if (c.us_aqi === null) {
        throw new DataNotFoundError(`No air quality index available for ${latitude}, ${longitude}`);
      }
      const band = aqiBand(c.us_aqi);

      return ok({
        location: { latitude, longitude },
        timestamp: c.time,
        air_quality: { us_aqi: c.us_aqi, european_aqi: c.european_aqi ?? null, ...band },
        pollutants: {
          pm2_5: c.pm2_5,
          pm10: c.pm10,
          carbon_monoxide: c.carbon_monoxide,
          nitrogen_dioxide: c.nitrogen_dioxide,
          ozone: c.ozone,
        },
        summary: `Air quality: ${band.category} (US AQI ${c.us_aqi}) - ${band.health_impact}`,
      });
    });
  }

  function getAstronomyData(latitude: number, longitude: number, date?: string) {
    return guard("get_astronomy_data", async () => {
      assertCoordinates(latitude, longitude);

      const today = now().toISOString().slice(0, 10);
      const day = date ?? today;
      if (!isCalendarDate(day)) {
        throw new ValidationError("date", `expected a calendar date in YYYY-MM-DD format (got '${day}')`);
      }
      const offsetDays = Math.round((Date.parse(`${day}T00:00:00Z`) - Date.parse(`${today}T00:00:00Z`)) / DAY_MS);
      if (offsetDays < -ASTRONOMY_PAST_DAYS || offsetDays > ASTRONOMY_FUTURE_DAYS) {
        throw new ValidationError(
          "date",
          `${day} is outside the supported range (${ASTRONOMY_PAST_DAYS} days back to ${ASTRONOMY_FUTURE_DAYS} days ahead of ${today})`
        );
      }

      const res = await forecast.fetch(
        {
          path: "/forecast",
          params: {
            latitude,
            longitude,
            daily: "sunrise,sunset,daylight_duration,sunshine_duration",
            timezone: "auto",
            start_date: day,
            end_date: day,
          },
        },
        SunTimes
      );
      if (!res.success) return res;

      const d = res.data.daily;
      const sunrise = d.sunrise[0];
      const sunset = d.sunset[0];
      if (!sunrise || !sunset) throw new DataNotFoundError(`No sun data available for ${day}`);

      const daylightHours = round((d.daylight_duration[0] ?? 0) / 3600);
      const sunshineHours = round((d.sunshine_duration[0] ?? 0) / 3600);
      const moon = moonPhase(day);

      return ok({
        location: { latitude, longitude },
        date: day,
        sun: { sunrise, sunset, daylight_hours: daylightHours, sunshine_hours: sunshineHours },
        moon,
        summary: `Sunrise ${sunrise}, sunset ${sunset} (${daylightHours} h of daylight). Moon: ${moon.phase}`,
      });
    });
  }

  return { getCurrentWeather, getAirQuality, getAstronomyData };
}

export type Weather = ReturnType<typeof createWeather>;
