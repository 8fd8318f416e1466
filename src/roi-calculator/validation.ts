import { Effect, Schema } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";
import type { WeatherSnapshot } from "../weather/types.js";
import { MAX_OPERATING_TEMPERATURE_CELSIUS } from "./calculator.js";
import type { RawROIInputs, ROIInputs } from "./types.js";

// Accepts numbers as well as the strings a form or a flag hands us
const FiniteNumber = Schema.Union(Schema.Number, Schema.NumberFromString).pipe(
  Schema.filter((value) => Number.isFinite(value))
);

const PositiveNumber = FiniteNumber.pipe(Schema.positive());
const NonNegativeNumber = FiniteNumber.pipe(Schema.nonNegative());

const decodeField = <I>(
  field: keyof RawROIInputs,
  schema: Schema.Schema<number, I>,
  value: unknown,
  message: string
): Effect.Effect<number, InvalidInputError> =>
  Schema.decodeUnknown(schema)(value).pipe(
    Effect.catchTag("ParseError", () => Effect.fail(new InvalidInputError({ field, message })))
  );

export const validateInputs = (raw: RawROIInputs): Effect.Effect<ROIInputs, InvalidInputError> =>
  Effect.all({
    ratedPowerKw: decodeField("ratedPowerKw", PositiveNumber, raw.ratedPowerKw, "must be a number greater than 0"),
    monthlyUsageKwh: decodeField("monthlyUsageKwh", NonNegativeNumber, raw.monthlyUsageKwh, "must be a number of 0 or more"),
    tariffPerUnit: decodeField("tariffPerUnit", NonNegativeNumber, raw.tariffPerUnit, "must be a number of 0 or more"),
  });

// Out-of-domain weather is rejected rather than clamped into the formulas
export const validateSnapshot = (snapshot: WeatherSnapshot): Effect.Effect<WeatherSnapshot, InvalidInputError> => {
  const { cloudCoverPercent, temperatureCelsius } = snapshot;

  if (!Number.isFinite(cloudCoverPercent) || cloudCoverPercent < 0 || cloudCoverPercent > 100) {
    return Effect.fail(new InvalidInputError({
      field: "cloudCoverPercent",
      message: `must be between 0 and 100, got ${cloudCoverPercent}`,
    }));
  }

  if (!Number.isFinite(temperatureCelsius) || temperatureCelsius >= MAX_OPERATING_TEMPERATURE_CELSIUS) {
    return Effect.fail(new InvalidInputError({
      field: "temperatureCelsius",
      message: `must be below ${MAX_OPERATING_TEMPERATURE_CELSIUS}°C, got ${temperatureCelsius}`,
    }));
  }

  return Effect.succeed(snapshot);
};
