import type { HarpSettings } from './types';
import { SUPPORTED_KEYS, SUPPORTED_TUNES } from './harmonica/tunings';
import { SUPPORTED_ALGORITHMS } from './audio/PitchDetector';
import { NoteLookup } from './NoteLookup';

export const SUPPORTED_CONFIDENCES: readonly string[] = Object.freeze([
    '0.95', '0.9', '0.85', '0.8', '0.75', '0.7', '0.65', '0.6', '0.55', '0.5',
    '0.45', '0.4', '0.35', '0.3', '0.25', '0.2', '0.15', '0.1', '0.05',
]);

export const DEFAULT_SETTINGS: Readonly<HarpSettings> = Object.freeze({
    keyIndex: SUPPORTED_KEYS.indexOf('C'),
    tuneIndex: SUPPORTED_TUNES.indexOf('RICHTER'),
    algorithmIndex: SUPPORTED_ALGORITHMS.indexOf('YIN'),
    concertPitchIndex: NoteLookup.getSupportedConcertPitches().indexOf('440'),
    confidenceIndex: 0,
});

// Persistent keys and the size of the option list each one indexes
const SETTING_LIMITS: Record<keyof HarpSettings, () => number> = {
    keyIndex: () => SUPPORTED_KEYS.length,
    tuneIndex: () => SUPPORTED_TUNES.length,
    algorithmIndex: () => SUPPORTED_ALGORITHMS.length,
    concertPitchIndex: () => NoteLookup.getSupportedConcertPitches().length,
    confidenceIndex: () => SUPPORTED_CONFIDENCES.length,
};

function isSettingKey(key: string): key is keyof HarpSettings {
    return Object.prototype.hasOwnProperty.call(SETTING_LIMITS, key);
}

export function isValidSettingIndex(key: keyof HarpSettings, value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < SETTING_LIMITS[key]();
}

/**
 * Keeps only known keys whose value is an in-range index. Anything else is
 * reported and dropped.
 */
export function sanitizeSettings(raw: unknown): Partial<HarpSettings> {
    const updates: Partial<HarpSettings> = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        console.warn('[Settings] Ignoring non-object settings', raw);
        return updates;
    }
    for (const [key, value] of Object.entries(raw)) {
        if (!isSettingKey(key)) continue;
        if (isValidSettingIndex(key, value)) {
            updates[key] = value;
        } else {
            console.warn(`[Settings] Ignoring invalid ${key}:`, value);
        }
    }
    return updates;
}

export function getConfidenceValue(confidenceIndex: number): number {
    const value = SUPPORTED_CONFIDENCES[confidenceIndex] ?? SUPPORTED_CONFIDENCES[DEFAULT_SETTINGS.confidenceIndex];
    return parseFloat(value);
}
