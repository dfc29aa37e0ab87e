export type {
    FrequencyRange,
    HarpEngineState,
    HarpSettings,
    Note,
    NoteCell,
    NoteCellState,
    NoteKind,
    PitchAlgorithm,
    PitchResult,
    Tune,
} from './lib/types';

export { addCentsToFrequency, getCents, isWithinCents, round } from './lib/noteUtils';
export { computeRms, parabolicInterpolation } from './lib/audioUtils';
export { NoteLookup, PitchContext, normalizeNoteName, noteLookup } from './lib/NoteLookup';

export {
    CHANNEL_MAX,
    CHANNEL_MIN,
    Harmonica,
    NOTE_MAX,
    NOTE_MIN,
    createHarmonica,
    createHarmonicaByIndex,
} from './lib/harmonica/Harmonica';
export { KEYS, SUPPORTED_KEYS, SUPPORTED_TUNES, TUNINGS } from './lib/harmonica/tunings';
export type { Key, TuningTable } from './lib/harmonica/tunings';
export { buildNoteCells, evaluateCell, getPlayableRange } from './lib/harmonica/noteCells';

export {
    DEFAULT_MAX_FREQUENCY,
    DEFAULT_MIN_FREQUENCY,
    NO_DETECTED_PITCH,
    SUPPORTED_ALGORITHMS,
} from './lib/audio/PitchDetector';
export type { PitchDetector } from './lib/audio/PitchDetector';
export { createPitchDetector } from './lib/audio/createPitchDetector';
export { YIN_THRESHOLD, YinPitchDetector } from './lib/audio/YinPitchDetector';
export { MpmPitchDetector } from './lib/audio/MpmPitchDetector';
export { AnalysisProcessor, DEFAULT_FRAME_SIZE } from './lib/audio/AnalysisProcessor';
export { DEFAULT_CONFIDENCE, PitchAnalyzer } from './lib/PitchAnalyzer';
export type { PitchAnalyzerOptions } from './lib/PitchAnalyzer';

export {
    DEFAULT_SETTINGS,
    SUPPORTED_CONFIDENCES,
    getConfidenceValue,
    isValidSettingIndex,
    sanitizeSettings,
} from './lib/settings';
export { HarpEngine } from './lib/HarpEngine';
