import type { AnalysisError, AnalysisReport } from "../analysis/types.js";
import { RATED_TEMPERATURE_CELSIUS } from "../roi-calculator/calculator.js";
import { renderBarChart } from "./bar-chart.js";
import { formatFixed } from "./format.js";

export type RenderOptions = {
  readonly barWidth: number;
};

const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  barWidth: 40,
};

const heading = (title: string): string[] => [title, "-".repeat(title.length)];

const renderEnvironment = (report: AnalysisReport): string[] => {
  const { snapshot, result } = report;

  return [
    ...heading(`1. Environmental Analysis for ${report.city}`),
    `Location: ${formatFixed(snapshot.latitude, 4)}, ${formatFixed(snapshot.longitude, 4)}`,
    `Cloud Cover: ${snapshot.cloudCoverPercent}%`,
    `Temperature: ${formatFixed(snapshot.temperatureCelsius, 1)}°C`,
    `Real-Time Output: ${formatFixed(result.actualPowerKw, 2)} kW (delta ${formatFixed(report.powerDeltaKw, 2)} kW)`,
  ];
};

const renderPerformance = (report: AnalysisReport, options: RenderOptions): string[] => {
  const { snapshot, result, inputs } = report;

  return [
    ...heading("2. System Performance (Rated vs Actual)"),
    ...renderBarChart(
      [
        { label: "Rated Max Power (Lab)", value: inputs.ratedPowerKw },
        { label: "Actual Output (Now)", value: result.actualPowerKw },
      ],
      { width: options.barWidth, formatValue: (value) => `${formatFixed(value, 2)} kW` }
    ),
    "",
    "Why is the output lower?",
    `  * Rated Power is measured at ${RATED_TEMPERATURE_CELSIUS}°C. Today it is ${formatFixed(snapshot.temperatureCelsius, 1)}°C.`,
    `  * Thermal Loss: Because of the heat, you are losing ${formatFixed(result.heatLoss * 100, 1)}% efficiency.`,
    `  * Cloud Loss: Clouds are blocking ${snapshot.cloudCoverPercent}% of the sky, reducing irradiance.`,
  ];
};

const renderFinancials = (report: AnalysisReport, options: RenderOptions): string[] => {
  const { result } = report;
  const lines = [
    ...heading("3. Financial Impact Analysis"),
    `Current Monthly Bill: ${formatFixed(result.oldBill, 0)} (without solar)`,
    `New Bill: ${formatFixed(result.newBill, 0)} (-${formatFixed(result.savings, 0)} drop, with solar)`,
    `Est. Monthly Savings: ${formatFixed(result.savings, 0)}`,
    "",
    ...renderBarChart(
      [
        { label: "Current Bill", value: result.oldBill },
        { label: "With Solar", value: result.newBill },
      ],
      { width: options.barWidth, formatValue: (value) => formatFixed(value, 0) }
    ),
  ];

  if (result.savings > 0 && report.coveragePercent !== null) {
    lines.push("", `Success! This system covers ${formatFixed(report.coveragePercent, 0)}% of your energy needs.`);
  }

  return lines;
};

export const renderReport = (
  report: AnalysisReport,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS
): string =>
  [
    ...renderEnvironment(report),
    "",
    ...renderPerformance(report, options),
    "",
    ...renderFinancials(report, options),
  ].join("\n");

export const renderFailure = (error: AnalysisError): string => {
  switch (error._tag) {
    case "InvalidInput":
      return `Invalid input for ${error.field}: ${error.message}`;

    case "LocationNotFound":
      return "City not found! Please check spelling.";

    case "WeatherTransport":
      return `Connection Error: ${error.message}`;
  }
};
