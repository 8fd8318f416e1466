export type ROIInputs = {
  readonly ratedPowerKw: number; // nameplate size, > 0
  readonly monthlyUsageKwh: number; // >= 0
  readonly tariffPerUnit: number; // price per kWh, >= 0
};

// Untrusted values straight from a form, flags or a request body
export type RawROIInputs = {
  readonly ratedPowerKw: unknown;
  readonly monthlyUsageKwh: unknown;
  readonly tariffPerUnit: unknown;
};

export type ROIResult = {
  readonly cloudEfficiency: number; // fraction of rated irradiance left after cloud
  readonly heatLoss: number; // fraction lost above the rated temperature
  readonly temperatureEfficiency: number;
  readonly actualPowerKw: number;
  readonly dailyProductionKwh: number;
  readonly monthlyProductionKwh: number;
  readonly netUsageKwh: number; // usage left to buy from the grid, never negative
  readonly oldBill: number;
  readonly newBill: number;
  readonly savings: number;
};
