import type { WeatherSnapshot } from "../weather/types.js";
import type { ROIInputs, ROIResult } from "./types.js";

// Pure functions for PV derating and bill projection. No rounding happens here.

// Full cloud cover still lets diffuse light through: 80% loss at most
export const CLOUD_LOSS_CEILING = 0.8;
// Panels are rated at 25°C and lose 0.5% per degree above it
export const RATED_TEMPERATURE_CELSIUS = 25;
export const THERMAL_LOSS_PER_DEGREE = 0.005;
export const PEAK_SUN_HOURS = 5;
export const DAYS_PER_MONTH = 30;

// Temperature at which thermal derating reaches 100%
export const MAX_OPERATING_TEMPERATURE_CELSIUS =
  RATED_TEMPERATURE_CELSIUS + 1 / THERMAL_LOSS_PER_DEGREE;

export const cloudEfficiency = (cloudCoverPercent: number): number =>
  1 - (cloudCoverPercent / 100) * CLOUD_LOSS_CEILING;

// No bonus below the rated temperature
export const heatLoss = (temperatureCelsius: number): number =>
  Math.max(0, (temperatureCelsius - RATED_TEMPERATURE_CELSIUS) * THERMAL_LOSS_PER_DEGREE);

export const compute = (
  inputs: ROIInputs,
  snapshot: Pick<WeatherSnapshot, "cloudCoverPercent" | "temperatureCelsius">
): ROIResult => {
  const cloud = cloudEfficiency(snapshot.cloudCoverPercent);
  const loss = heatLoss(snapshot.temperatureCelsius);
  const temperatureEfficiency = 1 - loss;

  const actualPowerKw = inputs.ratedPowerKw * cloud * temperatureEfficiency;
  const dailyProductionKwh = actualPowerKw * PEAK_SUN_HOURS;
  const monthlyProductionKwh = dailyProductionKwh * DAYS_PER_MONTH;

  // Surplus generation is not credited back, the bill just bottoms out at zero
  const netUsageKwh = Math.max(0, inputs.monthlyUsageKwh - monthlyProductionKwh);
  const oldBill = inputs.monthlyUsageKwh * inputs.tariffPerUnit;
  const newBill = netUsageKwh * inputs.tariffPerUnit;

  return {
    cloudEfficiency: cloud,
    heatLoss: loss,
    temperatureEfficiency,
    actualPowerKw,
    dailyProductionKwh,
    monthlyProductionKwh,
    netUsageKwh,
    oldBill,
    newBill,
    savings: oldBill - newBill,
  };
};

// Share of monthly usage covered by production, capped at 100. Null without usage.
export const coveragePercent = (
  result: Pick<ROIResult, "monthlyProductionKwh">,
  inputs: Pick<ROIInputs, "monthlyUsageKwh">
): number | null => {
  if (inputs.monthlyUsageKwh <= 0) {
    return null;
  }

  return Math.min(100, (result.monthlyProductionKwh / inputs.monthlyUsageKwh) * 100);
};
