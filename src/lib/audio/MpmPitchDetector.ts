import { PitchDetector as McLeodDetector } from 'pitchy';
import type { FrequencyRange, PitchAlgorithm, PitchResult } from '../types';
import { computeRms } from '../audioUtils';
import {
    DEFAULT_MAX_FREQUENCY,
    DEFAULT_MIN_FREQUENCY,
    NO_PITCH,
    normalizeFrequencyRange,
} from './PitchDetector';
import type { PitchDetector } from './PitchDetector';

// Results up to 10% outside the band are still accepted
const BAND_TOLERANCE = 0.1;
const MIN_SAMPLES = 8;

/**
 * McLeod Pitch Method: normalized square difference function, first key
 * maximum close to the highest one, parabolic refinement. The NSDF work is
 * done by pitchy; clarity at the chosen peak is reported as confidence.
 */
export class MpmPitchDetector implements PitchDetector {
    readonly algorithm: PitchAlgorithm = 'MPM';
    private range: FrequencyRange = { minFrequency: DEFAULT_MIN_FREQUENCY, maxFrequency: DEFAULT_MAX_FREQUENCY };
    private detector: McLeodDetector<Float32Array> | null = null;
    private inputLength = 0;

    setFrequencyRange(range: FrequencyRange) {
        this.range = normalizeFrequencyRange(range);
    }

    getFrequencyRange(): FrequencyRange {
        return { ...this.range };
    }

    detectPitch(samples: Float32Array, sampleRate: number): PitchResult {
        if (samples.length < MIN_SAMPLES || !(sampleRate > 0) || computeRms(samples) === 0) {
            return { ...NO_PITCH };
        }

        // pitchy sizes its FFT buffers for one input length
        if (!this.detector || this.inputLength !== samples.length) {
            this.inputLength = samples.length;
            this.detector = McLeodDetector.forFloat32Array(this.inputLength);
        }

        const [pitch, clarity] = this.detector.findPitch(samples, sampleRate);
        if (!Number.isFinite(pitch) || pitch <= 0 || !Number.isFinite(clarity)) {
            return { ...NO_PITCH };
        }

        const lower = this.range.minFrequency * (1 - BAND_TOLERANCE);
        const upper = this.range.maxFrequency * (1 + BAND_TOLERANCE);
        if (pitch < lower || pitch > upper) {
            return { ...NO_PITCH };
        }

        return { pitch, confidence: Math.min(1, Math.max(0, clarity)) };
    }
}
