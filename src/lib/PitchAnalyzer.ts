import type { FrequencyRange, PitchAlgorithm, PitchResult } from './types';
import { createPitchDetector } from './audio/createPitchDetector';
import { DEFAULT_MAX_FREQUENCY, DEFAULT_MIN_FREQUENCY, NO_DETECTED_PITCH } from './audio/PitchDetector';
import type { PitchDetector } from './audio/PitchDetector';

export const DEFAULT_CONFIDENCE = 0.95;

export interface PitchAnalyzerOptions {
    algorithm?: PitchAlgorithm;
    confidence?: number;
    range?: FrequencyRange;
}

/**
 * Runs the selected detector on one buffer and applies the confidence gate:
 * a result below the threshold keeps its confidence but loses its pitch.
 */
export class PitchAnalyzer {
    private detector: PitchDetector;
    private confidence: number;

    constructor(options: PitchAnalyzerOptions = {}) {
        const range = options.range ?? { minFrequency: DEFAULT_MIN_FREQUENCY, maxFrequency: DEFAULT_MAX_FREQUENCY };
        this.detector = createPitchDetector(options.algorithm ?? 'YIN', range);
        this.confidence = options.confidence ?? DEFAULT_CONFIDENCE;
    }

    getAlgorithm(): PitchAlgorithm {
        return this.detector.algorithm;
    }

    setAlgorithm(algorithm: PitchAlgorithm) {
        if (algorithm === this.detector.algorithm) return;
        this.detector = createPitchDetector(algorithm, this.detector.getFrequencyRange());
        console.log(`[PitchAnalyzer] Algorithm set to ${algorithm}`);
    }

    getConfidence(): number {
        return this.confidence;
    }

    setConfidence(confidence: number) {
        if (!(confidence >= 0 && confidence <= 1)) {
            throw new RangeError(`Confidence must be within 0..1, got ${confidence}`);
        }
        this.confidence = confidence;
    }

    getFrequencyRange(): FrequencyRange {
        return this.detector.getFrequencyRange();
    }

    setFrequencyRange(range: FrequencyRange) {
        this.detector.setFrequencyRange(range);
    }

    analyze(buf: Float32Array, sampleRate: number): PitchResult {
        const result = this.detector.detectPitch(buf, sampleRate);
        if (result.pitch !== NO_DETECTED_PITCH && result.confidence < this.confidence) {
            return { pitch: NO_DETECTED_PITCH, confidence: result.confidence };
        }
        return result;
    }
}
