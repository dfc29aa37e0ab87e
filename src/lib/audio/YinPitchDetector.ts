import type { FrequencyRange, PitchAlgorithm, PitchResult } from '../types';
import { computeRms, parabolicInterpolation } from '../audioUtils';
import { addCentsToFrequency } from '../noteUtils';
import {
    DEFAULT_MAX_FREQUENCY,
    DEFAULT_MIN_FREQUENCY,
    NO_PITCH,
    normalizeFrequencyRange,
} from './PitchDetector';
import type { PitchDetector } from './PitchDetector';

// Absolute threshold on the normalized difference function
export const YIN_THRESHOLD = 0.4;

// Lag window is widened a quarter tone beyond the configured band
const BAND_MARGIN_CENTS = 25;

/**
 * YIN (de Cheveigné & Kawahara, 2002): difference function, cumulative mean
 * normalization, first dip under the absolute threshold, parabolic refinement.
 */
export class YinPitchDetector implements PitchDetector {
    readonly algorithm: PitchAlgorithm = 'YIN';
    private readonly threshold: number;
    private range: FrequencyRange = { minFrequency: DEFAULT_MIN_FREQUENCY, maxFrequency: DEFAULT_MAX_FREQUENCY };

    // Scratch buffers, reallocated only when the buffer size changes
    private difference = new Float64Array(0);
    private cmndf = new Float64Array(0);

    constructor(threshold: number = YIN_THRESHOLD) {
        this.threshold = threshold;
    }

    setFrequencyRange(range: FrequencyRange) {
        this.range = normalizeFrequencyRange(range);
    }

    getFrequencyRange(): FrequencyRange {
        return { ...this.range };
    }

    detectPitch(samples: Float32Array, sampleRate: number): PitchResult {
        const halfSize = Math.floor(samples.length / 2);
        if (halfSize < 3 || !(sampleRate > 0) || computeRms(samples) === 0) {
            return { ...NO_PITCH };
        }

        const minTau = Math.max(2, Math.floor(sampleRate / addCentsToFrequency(BAND_MARGIN_CENTS, this.range.maxFrequency)));
        const maxTau = Math.min(halfSize - 2, Math.floor(sampleRate / addCentsToFrequency(-BAND_MARGIN_CENTS, this.range.minFrequency)));
        if (minTau > maxTau) {
            return { ...NO_PITCH };
        }

        if (this.difference.length !== halfSize) {
            this.difference = new Float64Array(halfSize);
            this.cmndf = new Float64Array(halfSize);
        }
        const difference = this.difference;
        const cmndf = this.cmndf;

        // Lags past maxTau + 1 are never read
        const lagLimit = maxTau + 2;

        // 1. Difference function over the first half of the buffer
        for (let tau = 0; tau < lagLimit; tau++) {
            let sum = 0;
            for (let j = 0; j < halfSize; j++) {
                const delta = samples[j] - samples[j + tau];
                sum += delta * delta;
            }
            difference[tau] = sum;
        }

        // 2. Cumulative mean normalized difference
        cmndf[0] = 1;
        let runningSum = 0;
        for (let tau = 1; tau < lagLimit; tau++) {
            runningSum += difference[tau];
            cmndf[tau] = runningSum > 0 ? difference[tau] * tau / runningSum : 1;
        }

        // 3. First strict local minimum under the threshold, inside the band
        let tauEstimate = -1;
        for (let tau = minTau; tau <= maxTau; tau++) {
            const value = cmndf[tau];
            if (value < this.threshold && value < cmndf[tau - 1] && value < cmndf[tau + 1]) {
                tauEstimate = tau;
                break;
            }
        }
        if (tauEstimate === -1) {
            return { ...NO_PITCH };
        }

        // 4. Sub-sample refinement
        const refinedTau = parabolicInterpolation(cmndf, tauEstimate, lagLimit);
        if (!(refinedTau > 0)) {
            return { ...NO_PITCH };
        }
        const confidence = Math.min(1, Math.max(0, 1 - cmndf[tauEstimate] / this.threshold));
        return { pitch: sampleRate / refinedTau, confidence };
    }
}
