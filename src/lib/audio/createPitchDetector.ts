import type { FrequencyRange, PitchAlgorithm } from '../types';
import type { PitchDetector } from './PitchDetector';
import { YinPitchDetector } from './YinPitchDetector';
import { MpmPitchDetector } from './MpmPitchDetector';

export function createPitchDetector(algorithm: PitchAlgorithm, range?: FrequencyRange): PitchDetector {
    const detector: PitchDetector = algorithm === 'MPM' ? new MpmPitchDetector() : new YinPitchDetector();
    if (range) detector.setFrequencyRange(range);
    return detector;
}
