export type BarChartRow = {
  readonly label: string;
  readonly value: number;
};

const BAR_CHARACTER = "█";

export const renderBar = (value: number, max: number, width: number): string => {
  if (max <= 0 || value <= 0) {
    return "";
  }

  const length = Math.round((Math.min(value, max) / max) * width);
  return BAR_CHARACTER.repeat(length);
};

// Horizontal bars scaled to the largest row, labels left-aligned
export const renderBarChart = (
  rows: readonly BarChartRow[],
  options: {
    readonly width: number;
    readonly formatValue: (value: number) => string;
  }
): string[] => {
  const labelWidth = Math.max(0, ...rows.map((row) => row.label.length));
  const max = Math.max(0, ...rows.map((row) => row.value));

  return rows.map((row) => {
    const bar = renderBar(row.value, max, options.width);
    const cells = [bar, options.formatValue(row.value)].filter((cell) => cell.length > 0);

    return `${row.label.padEnd(labelWidth)} | ${cells.join(" ")}`;
  });
};
