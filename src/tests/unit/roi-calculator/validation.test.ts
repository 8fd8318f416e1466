import { describe, it, expect } from "@effect/vitest";
import { Effect, Exit } from "effect";
import { validateInputs, validateSnapshot } from "../../../roi-calculator/validation.js";
import { InvalidInputError } from "../../../errors/invalid-input.error.js";
import { MAX_OPERATING_TEMPERATURE_CELSIUS } from "../../../roi-calculator/calculator.js";
import type { WeatherSnapshot } from "../../../weather/types.js";

const snapshot: WeatherSnapshot = {
  city: "London",
  cloudCoverPercent: 40,
  temperatureCelsius: 18,
  latitude: 51.5085,
  longitude: -0.1257,
};

describe("validateInputs", () => {
  it.effect("should accept numbers and numeric strings", () => Effect.gen(function* () {
    const inputs = yield* validateInputs({
      ratedPowerKw: "5.5",
      monthlyUsageKwh: 350,
      tariffPerUnit: "0",
    });

    expect(inputs).toEqual({
      ratedPowerKw: 5.5,
      monthlyUsageKwh: 350,
      tariffPerUnit: 0,
    });
  }));

  it.effect.each([
    ["ratedPowerKw", { ratedPowerKw: 0, monthlyUsageKwh: 350, tariffPerUnit: 8 }, "must be a number greater than 0"],
    ["ratedPowerKw", { ratedPowerKw: "abc", monthlyUsageKwh: 350, tariffPerUnit: 8 }, "must be a number greater than 0"],
    ["ratedPowerKw", { ratedPowerKw: "Infinity", monthlyUsageKwh: 350, tariffPerUnit: 8 }, "must be a number greater than 0"],
    ["monthlyUsageKwh", { ratedPowerKw: 5, monthlyUsageKwh: -1, tariffPerUnit: 8 }, "must be a number of 0 or more"],
    ["monthlyUsageKwh", { ratedPowerKw: 5, monthlyUsageKwh: Number.NaN, tariffPerUnit: 8 }, "must be a number of 0 or more"],
    ["tariffPerUnit", { ratedPowerKw: 5, monthlyUsageKwh: 350, tariffPerUnit: "-0.5" }, "must be a number of 0 or more"],
    ["tariffPerUnit", { ratedPowerKw: 5, monthlyUsageKwh: 350, tariffPerUnit: "" }, "must be a number of 0 or more"],
    ["tariffPerUnit", { ratedPowerKw: 5, monthlyUsageKwh: 350, tariffPerUnit: null }, "must be a number of 0 or more"],
  ] as const)("should reject an invalid %s", ([field, raw, message]) => Effect.gen(function* () {
    const result = yield* Effect.exit(validateInputs(raw));

    expect(result).toStrictEqual(Exit.fail(new InvalidInputError({ field, message })));
  }));

  it.effect("should report the first invalid field only", () => Effect.gen(function* () {
    const result = yield* Effect.exit(validateInputs({
      ratedPowerKw: -5,
      monthlyUsageKwh: -350,
      tariffPerUnit: -8,
    }));

    expect(result).toStrictEqual(Exit.fail(new InvalidInputError({
      field: "ratedPowerKw",
      message: "must be a number greater than 0",
    })));
  }));
});

describe("validateSnapshot", () => {
  it.effect.each([0, 40, 100])("should accept %d%% cloud cover", (cloudCoverPercent) => Effect.gen(function* () {
    const result = yield* validateSnapshot({ ...snapshot, cloudCoverPercent });

    expect(result.cloudCoverPercent).toBe(cloudCoverPercent);
  }));

  it.effect("should reject cloud cover above 100%", () => Effect.gen(function* () {
    const result = yield* Effect.exit(validateSnapshot({ ...snapshot, cloudCoverPercent: 130 }));

    expect(result).toStrictEqual(Exit.fail(new InvalidInputError({
      field: "cloudCoverPercent",
      message: "must be between 0 and 100, got 130",
    })));
  }));

  it.effect("should reject negative cloud cover", () => Effect.gen(function* () {
    const result = yield* Effect.exit(validateSnapshot({ ...snapshot, cloudCoverPercent: -1 }));

    expect(result).toStrictEqual(Exit.fail(new InvalidInputError({
      field: "cloudCoverPercent",
      message: "must be between 0 and 100, got -1",
    })));
  }));

  it.effect("should accept temperatures just below total thermal loss", () => Effect.gen(function* () {
    const result = yield* validateSnapshot({ ...snapshot, temperatureCelsius: 224.9 });

    expect(result.temperatureCelsius).toBe(224.9);
  }));

  it.effect.each([225, 300])("should reject %d°C, where the panel would produce nothing", (temperatureCelsius) => Effect.gen(function* () {
    const error = yield* Effect.flip(validateSnapshot({ ...snapshot, temperatureCelsius }));

    expect(error._tag).toBe("InvalidInput");
    expect(error.field).toBe("temperatureCelsius");
    expect(error.message).toBe(`must be below ${MAX_OPERATING_TEMPERATURE_CELSIUS}°C, got ${temperatureCelsius}`);
  }));
});
