// Enough places to hold the exact binary value of any number we display
const EXACT_DIGITS = 100;

// Like toFixed, except an exact tie goes to the even digit instead of away from zero
export const formatFixed = (value: number, digits: number): string => {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value.toFixed(digits);
  }

  const exact = Math.abs(value).toFixed(EXACT_DIGITS);
  const point = exact.indexOf(".");
  const kept = exact.slice(0, digits === 0 ? point : point + 1 + digits);
  const rest = exact.slice(point + 1 + digits);

  if (!/^50*$/.test(rest) || Number(kept.slice(-1)) % 2 !== 0) {
    return value.toFixed(digits);
  }

  return value < 0 ? `-${kept}` : kept;
};
