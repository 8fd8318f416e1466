import { Config as EffectConfig, LogLevel } from "effect";


export const AppConfig = {
  openWeather: {
    apiKey: EffectConfig.redacted("OPENWEATHER_API_KEY"),
    baseUrl: EffectConfig.url("OPENWEATHER_BASE_URL").pipe(
      EffectConfig.withDefault(new URL("https://api.openweathermap.org"))
    ),
    timeoutMs: EffectConfig.integer("OPENWEATHER_TIMEOUT_MS").pipe(
      EffectConfig.withDefault(10_000)
    ),
  },

  logging: {
    // the report goes to stdout, so info logs stay out of it unless asked for
    level: EffectConfig.logLevel("LOG_LEVEL").pipe(
      EffectConfig.withDefault(LogLevel.Warning)
    ),
  },

  sentry: {
    dsn: EffectConfig.option(EffectConfig.string("SENTRY_DSN")),
  },
};
