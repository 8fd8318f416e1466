import { Context, Effect } from "effect";
import type { InvalidInputError } from "../errors/invalid-input.error.js";
import type { RawROIInputs, ROIInputs, ROIResult } from "../roi-calculator/types.js";
import type { LocationNotFoundError, WeatherSnapshot, WeatherTransportError } from "../weather/types.js";

export type AnalysisRequest = {
  readonly city: string;
  readonly inputs: RawROIInputs;
};

export type AnalysisReport = {
  readonly city: string;
  readonly inputs: ROIInputs;
  readonly snapshot: WeatherSnapshot;
  readonly result: ROIResult;
  readonly powerDeltaKw: number; // actual minus rated
  readonly coveragePercent: number | null;
};

export type AnalysisError = InvalidInputError | LocationNotFoundError | WeatherTransportError;

export class SolarAnalysis extends Context.Tag("SolarAnalysis")<
  SolarAnalysis,
  {
    readonly run: (request: AnalysisRequest) => Effect.Effect<AnalysisReport, AnalysisError>;
  }
>() {}

export type ISolarAnalysis = Context.Tag.Service<typeof SolarAnalysis>;
