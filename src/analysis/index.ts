import { Effect, Layer } from "effect";
import { AnalysisEventLogger } from "../event-logger/index.js";
import type { IAnalysisEventLogger } from "../event-logger/types.js";
import { compute, coveragePercent } from "../roi-calculator/calculator.js";
import { validateInputs, validateSnapshot } from "../roi-calculator/validation.js";
import { WeatherClient, type IWeatherClient } from "../weather/types.js";
import {
  SolarAnalysis,
  type AnalysisError,
  type AnalysisReport,
  type AnalysisRequest,
  type ISolarAnalysis,
} from "./types.js";

export class SolarAnalysisService implements ISolarAnalysis {
  public constructor(
    private readonly weatherClient: IWeatherClient,
    private readonly eventLogger: IAnalysisEventLogger = new AnalysisEventLogger(),
  ) { }

  // Inputs are checked before the weather lookup; nothing is computed on a failed lookup
  public run(request: AnalysisRequest): Effect.Effect<AnalysisReport, AnalysisError> {
    const deps = this;

    return Effect.gen(function* () {
      const inputs = yield* validateInputs(request.inputs);
      const city = request.city.trim();

      const fetched = yield* deps.weatherClient.fetchCurrent(city);
      yield* deps.eventLogger.onWeatherFetched(fetched);

      const snapshot = yield* validateSnapshot(fetched);
      const result = compute(inputs, snapshot);

      const report: AnalysisReport = {
        city,
        inputs,
        snapshot,
        result,
        powerDeltaKw: result.actualPowerKw - inputs.ratedPowerKw,
        coveragePercent: coveragePercent(result, inputs),
      };

      yield* deps.eventLogger.onAnalysisCompleted(report);

      return report;
    }).pipe(
      Effect.tapError((error) => deps.eventLogger.onAnalysisRejected(error)),
    );
  }
}

export const SolarAnalysisLayer = Layer.effect(
  SolarAnalysis,
  Effect.gen(function* () {
    return new SolarAnalysisService(yield* WeatherClient);
  })
);
