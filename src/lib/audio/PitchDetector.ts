import type { FrequencyRange, PitchAlgorithm, PitchResult } from '../types';

export const NO_DETECTED_PITCH = -1;

export const DEFAULT_MIN_FREQUENCY = 80;
export const DEFAULT_MAX_FREQUENCY = 4835;

export const SUPPORTED_ALGORITHMS: readonly PitchAlgorithm[] = Object.freeze(['YIN', 'MPM']);

export const NO_PITCH: Readonly<PitchResult> = Object.freeze({ pitch: NO_DETECTED_PITCH, confidence: 0 });

/**
 * Contract shared by the YIN and MPM detectors. `detectPitch` is synchronous,
 * never throws, and keeps no state between calls apart from the configured
 * frequency band and reusable scratch buffers.
 */
export interface PitchDetector {
    readonly algorithm: PitchAlgorithm;
    detectPitch(samples: Float32Array, sampleRate: number): PitchResult;
    setFrequencyRange(range: FrequencyRange): void;
    getFrequencyRange(): FrequencyRange;
}

export function normalizeFrequencyRange(range: FrequencyRange): FrequencyRange {
    const { minFrequency, maxFrequency } = range;
    if (!(minFrequency > 0) || !(maxFrequency > minFrequency)) {
        throw new RangeError(`Invalid frequency range: ${minFrequency}..${maxFrequency} Hz`);
    }
    return { minFrequency, maxFrequency };
}
