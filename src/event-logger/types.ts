import type { Effect } from "effect";
import type { AnalysisError, AnalysisReport } from "../analysis/types.js";
import type { WeatherSnapshot } from "../weather/types.js";

export type IAnalysisEventLogger = {
  onWeatherFetched: (snapshot: WeatherSnapshot) => Effect.Effect<void>;
  onAnalysisCompleted: (report: AnalysisReport) => Effect.Effect<void>;
  onAnalysisRejected: (error: AnalysisError) => Effect.Effect<void>;
};
