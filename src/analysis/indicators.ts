/** Simple Moving Average. NaN for first (period-1) elements. */
export function computeSma(values: readonly number[], period: number): number[] {
  const result: number[] = new Array(values.length).fill(NaN);
  if (period <= 0 || values.length < period) return result;

  let sum = 0;
  for (let i = 0; i < period; i++) sum += values[i];
  result[period - 1] = sum / period;

  for (let i = period; i < values.length; i++) {
    sum += values[i] - values[i - period];
    result[i] = sum / period;
  }
  return result;
}

/** RSI of the full series with Wilder smoothing. Null until period+1 values exist. */
export function computeRsi(values: readonly number[], period: number): number | null {
  if (period <= 0 || values.length < period + 1) return null;

  let gains = 0;
  let losses = 0;
  for (let i = 1; i <= period; i++) {
    const delta = values[i] - values[i - 1];
    if (delta >= 0) gains += delta;
    else losses -= delta;
  }

  let avgGain = gains / period;
  let avgLoss = losses / period;

  for (let i = period + 1; i < values.length; i++) {
    const delta = values[i] - values[i - 1];
    const gain = delta > 0 ? delta : 0;
    const loss = delta < 0 ? -delta : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/** Mean and population standard deviation of the last `period` values. */
export function computeBands(
  values: readonly number[],
  period: number,
  multiplier: number
): { upper: number; middle: number; lower: number } | null {
  if (period <= 0 || values.length < period) return null;
  const window = values.slice(values.length - period);
  const middle = window.reduce((s, v) => s + v, 0) / period;
  const variance = window.reduce((s, v) => s + (v - middle) ** 2, 0) / period;
  const std = Math.sqrt(variance);
  return { upper: middle + multiplier * std, middle, lower: middle - multiplier * std };
}

/** Average True Range with Wilder smoothing. */
export function computeAtr(
  highs: readonly number[],
  lows: readonly number[],
  closes: readonly number[],
  period = 14
): number[] {
  const len = highs.length;
  const result: number[] = new Array(len).fill(NaN);
  if (len < 2 || period <= 0) return result;

  const tr: number[] = [highs[0] - lows[0]];
  for (let i = 1; i < len; i++) {
    tr.push(Math.max(
      highs[i] - lows[i],
      Math.abs(highs[i] - closes[i - 1]),
      Math.abs(lows[i] - closes[i - 1])
    ));
  }

  if (tr.length < period) return result;
  let atr = tr.slice(0, period).reduce((s, v) => s + v, 0) / period;
  result[period - 1] = atr;
  for (let i = period; i < len; i++) {
    atr = (atr * (period - 1) + tr[i]) / period;
    result[i] = atr;
  }
  return result;
}

/** Last finite value of a series, or null. */
export function lastValue(series: readonly number[]): number | null {
  const v = series[series.length - 1];
  return v !== undefined && Number.isFinite(v) ? v : null;
}
