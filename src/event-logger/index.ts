import type { IAnalysisEventLogger } from "./types.js";
import type { AnalysisError, AnalysisReport } from "../analysis/types.js";
import type { WeatherSnapshot } from "../weather/types.js";
import { Effect } from "effect";

export class AnalysisEventLogger implements IAnalysisEventLogger {

  public onWeatherFetched(snapshot: WeatherSnapshot) {
    return Effect.log(`Weather for ${snapshot.city}: ${snapshot.cloudCoverPercent}% cloud cover, ${snapshot.temperatureCelsius.toFixed(1)}°C`);
  }

  public onAnalysisCompleted(report: AnalysisReport) {
    return Effect.log('Analysis complete', {
      city: report.city,
      actualPowerKw: report.result.actualPowerKw,
      savings: report.result.savings,
    });
  }

  public onAnalysisRejected(error: AnalysisError) {
    return Effect.log(`Analysis rejected: ${error._tag}`);
  }
}
