import type { FamilyDefinition } from '../types';

const MAX_CONFIDENCE = 0.95;

/** Follow a percentage move over `lookback` bars when volume confirms it. */
export const momentum: FamilyDefinition = {
  family: 'momentum',
  description: 'Long/short on a lookback move beyond threshold with volume confirmation',
  defaults: { lookback: 12, thresholdPct: 0.5, minVolumeRatio: 1 },
  paramSpace: {
    lookback: { min: 2, max: 100, step: 1, grid: [6, 12, 24] },
    thresholdPct: { min: 0.05, max: 10, step: 0.05, grid: [0.25, 0.5, 1] },
    minVolumeRatio: { min: 0, max: 5, step: 0.1, grid: [0, 1, 1.5] },
  },
  requiredHistory: p => p.lookback + 1,
  evaluate(window, p) {
    const last = window[window.length - 1];
    const base = window[window.length - 1 - p.lookback];
    if (!last || !base || base.close <= 0) {
      return { direction: 'flat', confidence: 0, reason: 'lookback unavailable' };
    }

    const changePct = ((last.close - base.close) / base.close) * 100;
    const prior = window.slice(window.length - 1 - p.lookback, window.length - 1);
    const avgVolume = prior.reduce((s, x) => s + x.volume, 0) / prior.length;
    const volumeRatio = avgVolume > 0 ? last.volume / avgVolume : 1;

    if (Math.abs(changePct) <= p.thresholdPct) {
      return { direction: 'flat', confidence: 0, reason: `move ${changePct.toFixed(3)}% within threshold` };
    }
    if (volumeRatio < p.minVolumeRatio) {
      return { direction: 'flat', confidence: 0, reason: `volume ratio ${volumeRatio.toFixed(2)} < ${p.minVolumeRatio}` };
    }

    const confidence = Math.min(MAX_CONFIDENCE, (Math.abs(changePct) / p.thresholdPct) * 0.35);
    return {
      direction: changePct > 0 ? 'long' : 'short',
      confidence,
      reason: `move ${changePct.toFixed(3)}% over ${p.lookback} bars, volume x${volumeRatio.toFixed(2)}`,
    };
  },
};
