import axios, { type AxiosRequestConfig } from "axios";
import { z } from "zod";
import { ExternalProviderError, errorMessage } from "./errors";

export type Coordinates = { latitude: number; longitude: number };

export type CurrentWeather = {
  temperature: number;
  weatherCode: number | null;
  time: string | null;
};

export type WeatherProvider = {
  getCurrent(coordinates: Coordinates): Promise<CurrentWeather>;
};

/** The slice of an axios instance the provider uses. */
export type HttpClient = {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
};

const currentWeatherResponseSchema = z.object({
  current: z.object({
    temperature_2m: z.number(),
    weather_code: z.number().int().optional(),
    time: z.string().optional(),
  }),
});

// WMO weather interpretation codes as reported by Open-Meteo
const WEATHER_CODES: Record<number, string> = {
  0: "Clear Sky",
  1: "Mainly Clear",
  2: "Partly Cloudy",
  3: "Overcast",
  45: "Foggy",
  48: "Foggy",
  51: "Light Drizzle",
  53: "Moderate Drizzle",
  55: "Dense Drizzle",
  61: "Slight Rain",
  63: "Moderate Rain",
  65: "Heavy Rain",
  71: "Slight Snow",
  73: "Moderate Snow",
  75: "Heavy Snow",
  77: "Snow Grains",
  80: "Slight Showers",
  81: "Moderate Showers",
  82: "Violent Showers",
  85: "Slight Snow Showers",
  86: "Heavy Snow Showers",
  95: "Thunderstorm",
  96: "Thunderstorm with Hail",
  99: "Thunderstorm with Hail",
};

export function describeWeatherCode(code: number | null): string {
  return code === null ? "Unknown" : (WEATHER_CODES[code] ?? "Unknown");
}

export type OpenMeteoOptions = {
  baseUrl: string;
  timeoutMs: number;
  http?: HttpClient;
};

/**
 * Current conditions from Open-Meteo. Any transport error, non-2xx status,
 * or payload without `current.temperature_2m` surfaces as ExternalProviderError.
 */
export class OpenMeteoWeatherProvider implements WeatherProvider {
  private readonly http: HttpClient;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: OpenMeteoOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? axios.create();
  }

  async getCurrent({ latitude, longitude }: Coordinates): Promise<CurrentWeather> {
    let data: unknown;
    try {
      const response = await this.http.get(this.baseUrl, {
        params: {
          latitude,
          longitude,
          current: "temperature_2m,weather_code",
          timezone: "auto",
        },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (err: unknown) {
      throw new ExternalProviderError(`Weather request for ${latitude},${longitude} failed: ${errorMessage(err)}`, err);
    }

    const parsed = currentWeatherResponseSchema.safeParse(data);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ExternalProviderError(
        `Malformed weather response for ${latitude},${longitude}: ${problems.join("; ")}`,
        parsed.error,
      );
    }

    const current = parsed.data.current;
    return {
      temperature: current.temperature_2m,
      weatherCode: current.weather_code ?? null,
      time: current.time ?? null,
    };
  }
}
