import { Effect, Layer } from "effect";
import { AppConfig } from "./config.js";
import { SolarAnalysisLayer } from "./analysis/index.js";
import { OpenWeatherClientLayer } from "./weather/openweather.client.js";

// The api key is read here and handed to the client, which never touches the environment
export const WeatherClientLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = AppConfig.openWeather;

    return OpenWeatherClientLayer({
      apiKey: yield* config.apiKey,
      baseUrl: yield* config.baseUrl,
      timeoutMs: yield* config.timeoutMs,
    });
  })
);

export const serviceLayers = SolarAnalysisLayer.pipe(
  Layer.provide(WeatherClientLive),
);
