import { parseArgs } from "node:util";
import { Effect } from "effect";
import { InvalidInputError } from "./errors/invalid-input.error.js";
import type { AnalysisRequest } from "./analysis/types.js";

// Used for any flag left out
export const DEFAULT_ARGS = {
  city: "London",
  systemSizeKw: "5",
  monthlyUsageKwh: "350",
  tariff: "8",
} as const;

export const parseCliArgs = (args: readonly string[]): Effect.Effect<AnalysisRequest, InvalidInputError> =>
  Effect.try({
    try: () => parseArgs({
      args: [...args],
      strict: true,
      allowPositionals: false,
      options: {
        "city": { type: "string" },
        "system-size": { type: "string" },
        "monthly-usage": { type: "string" },
        "tariff": { type: "string" },
      },
    }),
    catch: (error) => new InvalidInputError({
      field: "arguments",
      message: error instanceof Error ? error.message : String(error),
    }),
  }).pipe(
    Effect.map(({ values }) => ({
      city: values["city"] ?? DEFAULT_ARGS.city,
      inputs: {
        ratedPowerKw: values["system-size"] ?? DEFAULT_ARGS.systemSizeKw,
        monthlyUsageKwh: values["monthly-usage"] ?? DEFAULT_ARGS.monthlyUsageKwh,
        tariffPerUnit: values["tariff"] ?? DEFAULT_ARGS.tariff,
      },
    })),
  );
