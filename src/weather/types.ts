import { Context, Data, Effect } from "effect";

export type WeatherSnapshot = {
  readonly city: string; // name as resolved by the weather source
  readonly cloudCoverPercent: number; // 0-100
  readonly temperatureCelsius: number;
  readonly latitude: number; // display only
  readonly longitude: number; // display only
};

export class LocationNotFoundError extends Data.TaggedError("LocationNotFound")<{
  readonly city: string;
}> {}

export class WeatherTransportError extends Data.TaggedError("WeatherTransport")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class WeatherClient extends Context.Tag("WeatherClient")<
  WeatherClient,
  {
    readonly fetchCurrent: (city: string) => Effect.Effect<
      WeatherSnapshot,
      LocationNotFoundError | WeatherTransportError
    >;
  }
>() {}

export type IWeatherClient = Context.Tag.Service<typeof WeatherClient>;
