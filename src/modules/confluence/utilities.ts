export function clamp(x: number, a: number, b: number) {
  return Math.max(a, Math.min(b, x));
}

/** Clamp into [0, 100]; NaN collapses to `fallback`. */
export function clampScore(x: number, fallback = 50) {
  if (Number.isNaN(x)) return fallback;
  return clamp(x, 0, 100);
}

/** Percent change from `from` to `to`; 0 when `from` is zero. */
export function pctChange(to: number, from: number) {
  if (from === 0) return 0;
  return ((to - from) / from) * 100;
}

export function mean(arr: readonly number[]) {
  if (!arr.length) return 0;
  return arr.reduce((s, n) => s + n, 0) / arr.length;
}

export function stddev(arr: readonly number[]) {
  if (!arr.length) return 0;
  const m = mean(arr);
  return Math.sqrt(arr.reduce((s, n) => s + (n - m) * (n - m), 0) / arr.length);
}

export function takeLast<T>(values: readonly T[], n: number): T[] {
  if (n <= 0) return [];
  return values.slice(-n);
}

export function finiteOr(value: number | undefined, fallback: number) {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/**
 * Wilder RSI series aligned with `closes`. Entries before `period` are NaN;
 * fewer than `period + 2` closes yields an all-NaN series.
 */
export function wilderRsi(closes: readonly number[], period = 14): number[] {
  const rsi = new Array<number>(closes.length).fill(Number.NaN);
  if (closes.length < period + 2) return rsi;

  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let i = 1; i < closes.length; i++) {
    const diff = closes[i] - closes[i - 1];
    gains.push(Math.max(diff, 0));
    losses.push(Math.max(-diff, 0));
  }

  let avgGain = mean(gains.slice(1, period + 1));
  let avgLoss = mean(losses.slice(1, period + 1));
  rsi[period] = rsiFrom(avgGain, avgLoss);

  for (let i = period + 1; i < closes.length; i++) {
    avgGain = (avgGain * (period - 1) + gains[i]) / period;
    avgLoss = (avgLoss * (period - 1) + losses[i]) / period;
    rsi[i] = rsiFrom(avgGain, avgLoss);
  }
  return rsi;
}

function rsiFrom(avgGain: number, avgLoss: number) {
  if (avgLoss === 0) return 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * Percentile rank where the best value scores 100 and the worst 0.
 * Single-member population -> 100, flat population -> 50, empty -> 0.
 */
export function percentileRank(value: number, population: readonly number[]) {
  const clean = population.filter((v) => Number.isFinite(v));
  if (!clean.length) return 0;
  const n = clean.length;
  if (n === 1) return 100;

  const lo = Math.min(...clean);
  const hi = Math.max(...clean);
  if (hi === lo) return 50;

  const better = clean.filter((v) => v > value).length;
  return clamp(((n - better - 1) / (n - 1)) * 100, 0, 100);
}
