// ---------- Math helpers for stats ----------
export function mean(a: number[]): number { return a.reduce((s, x) => s + x, 0) / a.length; }

export function variance(a: number[], m = mean(a)): number {
  const n = a.length; return a.reduce((s, x) => s + (x - m) * (x - m), 0) / (n - 1);
}

export function stddev(a: number[]): number { return Math.sqrt(variance(a)); }

export function cov(x: number[], y: number[], mx = mean(x), my = mean(y)): number {
  const n = x.length; let s = 0;
  for (let i = 0; i < n; i++) s += (x[i] - mx) * (y[i] - my);
  return s / (n - 1);
}

function assertPaired(x: number[], y: number[]) {
  if (x.length !== y.length) throw new Error("x and y must have same length");
  if (x.length < 2) throw new Error("need at least 2 points");
}

export function pearsonR(x: number[], y: number[]): { r: number; n: number; undefinedVariance?: true } {
  assertPaired(x, y);
  const sx = stddev(x), sy = stddev(y);
  if (sx === 0 || sy === 0) return { r: 0, n: x.length, undefinedVariance: true };
  // clamp float drift so |r| never exceeds 1
  const r = Math.max(-1, Math.min(1, cov(x, y) / (sx * sy)));
  return { r, n: x.length };
}

// Normal CDF via erf approximation
function erf(z: number) {
  // Abramowitz-Stegun approximation
  const t = 1 / (1 + 0.5 * Math.abs(z));
  const tau = t * Math.exp(-z * z - 1.26551223 + 1.00002368 * t + 0.37409196 * t * t + 0.09678418 * t ** 3
    - 0.18628806 * t ** 4 + 0.27886807 * t ** 5 - 1.13520398 * t ** 6 + 1.48851587 * t ** 7 - 0.82215223 * t ** 8 + 0.17087277 * t ** 9);
  return z >= 0 ? 1 - tau : tau - 1;
}
function normalCDF(z: number) { return 0.5 * (1 + erf(z / Math.SQRT2)); }

// Two-tailed p from Fisher z-transform (approx, good for n ≥ ~10)
export function pvalFromR(r: number, n: number): number {
  if (n < 4 || Math.abs(r) >= 1) return NaN;
  const z = 0.5 * Math.log((1 + r) / (1 - r)) * Math.sqrt(n - 3);
  return 2 * (1 - normalCDF(Math.abs(z)));
}

export type LinearFit = { intercept: number; slope: number; r: number; r2: number };

// Simple OLS y = a + b x
export function ols(x: number[], y: number[]): LinearFit {
  assertPaired(x, y);
  const n = x.length;
  const mx = mean(x), my = mean(y);
  let sxx = 0, sxy = 0;
  for (let i = 0; i < n; i++) { sxx += (x[i] - mx) * (x[i] - mx); sxy += (x[i] - mx) * (y[i] - my); }
  if (sxx === 0) throw new Error("x has zero variance");
  const b = sxy / sxx;
  const a = my - b * mx;
  const sdX = stddev(x), sdY = stddev(y);
  const r = sdY === 0 ? 0 : sxy / ((n - 1) * sdX * sdY);
  return { intercept: a, slope: b, r, r2: r * r };
}
