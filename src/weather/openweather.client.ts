import { Duration, Effect, Layer, Redacted, Schema } from "effect";
import { HttpClient } from "@effect/platform";
import {
  LocationNotFoundError,
  WeatherClient,
  WeatherTransportError,
  type IWeatherClient,
  type WeatherSnapshot,
} from "./types.js";

export type OpenWeatherConfig = {
  readonly apiKey: Redacted.Redacted<string>;
  readonly baseUrl: URL;
  readonly timeoutMs: number;
};

const KELVIN_OFFSET = 273.15;

// Current weather response, only the fields we read
const CurrentWeatherSchema = Schema.Struct({
  name: Schema.String,
  coord: Schema.Struct({
    lat: Schema.Number,
    lon: Schema.Number,
  }),
  main: Schema.Struct({
    temp: Schema.Number, // Kelvin, no `units` param sent
  }),
  clouds: Schema.Struct({
    all: Schema.Number,
  }),
});

export type CurrentWeatherResponse = Schema.Schema.Type<typeof CurrentWeatherSchema>;

const CurrentWeatherFromJson = Schema.parseJson(CurrentWeatherSchema);

export const kelvinToCelsius = (kelvin: number): number => kelvin - KELVIN_OFFSET;

const toSnapshot = (body: CurrentWeatherResponse): WeatherSnapshot => ({
  city: body.name,
  cloudCoverPercent: body.clouds.all,
  temperatureCelsius: kelvinToCelsius(body.main.temp),
  latitude: body.coord.lat,
  longitude: body.coord.lon,
});

const CURRENT_WEATHER_PATH = "data/2.5/weather";

// Resolved below the base path, so a proxy prefix such as /owm/ is kept
export const currentWeatherUrl = (baseUrl: URL): URL => {
  const base = new URL(baseUrl.href);
  if (!base.pathname.endsWith("/")) {
    base.pathname = `${base.pathname}/`;
  }
  return new URL(CURRENT_WEATHER_PATH, base);
};

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `: ${cause.message}` : "";

export class OpenWeatherClient implements IWeatherClient {
  constructor(
    private readonly config: OpenWeatherConfig,
    private readonly httpClient: HttpClient.HttpClient,
  ) { }

  public fetchCurrent(city: string): Effect.Effect<WeatherSnapshot, LocationNotFoundError | WeatherTransportError> {
    const config = this.config;
    const httpClient = this.httpClient;
    const query = city.trim();

    if (query.length === 0) {
      return Effect.fail(new LocationNotFoundError({ city }));
    }

    const url = currentWeatherUrl(config.baseUrl);

    return Effect.gen(function* () {
      const response = yield* httpClient.get(url.toString(), {
        urlParams: {
          q: query,
          appid: Redacted.value(config.apiKey),
        },
        headers: {
          Accept: "application/json",
        },
      });
      const responseText = yield* response.text;

      yield* Effect.logDebug("OpenWeather response:", responseText);

      if (response.status === 404) {
        return yield* new LocationNotFoundError({ city: query });
      }

      if (response.status !== 200) {
        return yield* new WeatherTransportError({
          message: `OpenWeather returned status ${response.status}: ${responseText}`,
        });
      }

      const body = yield* Schema.decodeUnknown(CurrentWeatherFromJson)(responseText).pipe(
        Effect.catchTag("ParseError", (error) => Effect.fail(new WeatherTransportError({
          message: "Unrecognized response from OpenWeather",
          cause: error,
        }))),
      );

      return toSnapshot(body);
    }).pipe(
      Effect.timeout(Duration.millis(config.timeoutMs)),
      Effect.catchTags({
        TimeoutException: () => Effect.fail(new WeatherTransportError({
          message: `OpenWeather did not answer within ${config.timeoutMs}ms`,
        })),
        // the error's own message carries the request url, and with it the api key
        RequestError: (error) => Effect.fail(new WeatherTransportError({
          message: `${error.reason} error while contacting OpenWeather${describeCause(error.cause)}`,
          cause: error,
        })),
        ResponseError: (error) => Effect.fail(new WeatherTransportError({
          message: `${error.reason} error while reading the OpenWeather response${describeCause(error.cause)}`,
          cause: error,
        })),
      }),
    );
  }
}

export const OpenWeatherClientLayer = (
  config: OpenWeatherConfig
): Layer.Layer<WeatherClient, never, HttpClient.HttpClient> =>
  Layer.effect(
    WeatherClient,
    Effect.gen(function* () {
      return new OpenWeatherClient(config, yield* HttpClient.HttpClient);
    })
  );
