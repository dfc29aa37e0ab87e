import type { Tune } from '../types';
import type { PitchContext } from '../NoteLookup';
import { addCentsToFrequency, getCents, isWithinCents, round } from '../noteUtils';
import { KEYS, SUPPORTED_KEYS, SUPPORTED_TUNES, TUNINGS, isKey, isTune } from './tunings';
import type { Key, TuningTable } from './tunings';

export const CHANNEL_MIN = 1;
export const CHANNEL_MAX = 10;
export const NOTE_MIN = -3;
export const NOTE_MAX = 4;

const HALF_TONE_CENTS = 100;
const ACTIVE_WINDOW_CENTS = 50;

const DEFAULT_KEY: Key = 'C';
const DEFAULT_TUNE: Tune = 'RICHTER';

/**
 * Ten-channel diatonic harmonica in a given key and tuning.
 *
 * Note offsets per channel:
 *   0        blow
 *   1        draw
 *   2..4     draw bends (or the overdraw at 2 where the blow reed is higher)
 *  -1..-3    blow bends (or the overblow at -1 where the draw reed is higher)
 *
 * Frequencies are truncated to three decimals after every half-tone step.
 */
export class Harmonica {
    readonly key: Key;
    readonly tune: Tune;
    readonly keyFrequency: number;
    private readonly tuning: TuningTable;

    constructor(key: Key, tune: Tune, keyFrequency: number) {
        this.key = key;
        this.tune = tune;
        this.keyFrequency = keyFrequency;
        this.tuning = TUNINGS[tune];
    }

    static getSupportedKeys(): readonly Key[] {
        return SUPPORTED_KEYS;
    }

    static getSupportedTunes(): readonly Tune[] {
        return SUPPORTED_TUNES;
    }

    getKeyName(): Key {
        return this.key;
    }

    getTuneName(): Tune {
        return this.tune;
    }

    getChannelInFrequency(channel: number): number {
        return addCentsToFrequency(this.tuning.halfTonesIn[channel] * HALF_TONE_CENTS, this.keyFrequency);
    }

    getChannelOutFrequency(channel: number): number {
        return addCentsToFrequency(this.tuning.halfTonesOut[channel] * HALF_TONE_CENTS, this.keyFrequency);
    }

    getDrawBendingTonesCount(channel: number): number {
        if (!isValidChannel(channel)) return 0;
        return Math.max(0, this.tuning.halfTonesIn[channel] - this.tuning.halfTonesOut[channel] - 1);
    }

    getBlowBendingTonesCount(channel: number): number {
        if (!isValidChannel(channel)) return 0;
        return Math.max(0, this.tuning.halfTonesOut[channel] - this.tuning.halfTonesIn[channel] - 1);
    }

    hasInverseCentsHandling(channel: number): boolean {
        if (!isValidChannel(channel)) return false;
        return round(this.getChannelOutFrequency(channel)) > round(this.getChannelInFrequency(channel));
    }

    isOverblow(channel: number, note: number): boolean {
        return note === -1 && isValidChannel(channel) && !this.hasInverseCentsHandling(channel);
    }

    isOverdraw(channel: number, note: number): boolean {
        return note === 2 && isValidChannel(channel) && this.hasInverseCentsHandling(channel);
    }

    getNoteFrequency(channel: number, note: number): number {
        if (!isValidChannel(channel) || !Number.isInteger(note) || note < NOTE_MIN || note > NOTE_MAX) {
            return 0;
        }
        if (this.isOverblow(channel, note) || this.isOverdraw(channel, note)) {
            return round(this.getOverblowOverdrawFrequency(channel));
        }
        if (note === 0) return round(this.getChannelOutFrequency(channel));
        if (note === 1) return round(this.getChannelInFrequency(channel));

        // Bends step away from the draw (note > 1) or blow (note < 0) reed one
        // half tone at a time; each step starts from the previous truncated value.
        const direction = note > 1 ? 1 : -1;
        let current = note > 1 ? 1 : 0;
        let frequency = round(note > 1 ? this.getChannelInFrequency(channel) : this.getChannelOutFrequency(channel));
        while (current !== note) {
            current += direction;
            frequency = this.isOverblow(channel, current) || this.isOverdraw(channel, current)
                ? round(this.getOverblowOverdrawFrequency(channel))
                : round(addCentsToFrequency(-HALF_TONE_CENTS, frequency));
        }
        return frequency;
    }

    getNoteFrequencyMinimum(channel: number, note: number): number {
        return addCentsToFrequency(-ACTIVE_WINDOW_CENTS, this.getNoteFrequency(channel, note));
    }

    getNoteFrequencyMaximum(channel: number, note: number): number {
        return addCentsToFrequency(ACTIVE_WINDOW_CENTS, this.getNoteFrequency(channel, note));
    }

    /**
     * Deviation of `frequency` from the cell's expected pitch, positive when sharp.
     */
    getCentsNote(channel: number, note: number, frequency: number): number {
        return getCents(frequency, this.getNoteFrequency(channel, note));
    }

    isNoteActive(channel: number, note: number, frequency: number): boolean {
        return isWithinCents(frequency, this.getNoteFrequency(channel, note), ACTIVE_WINDOW_CENTS);
    }

    // A half tone above the un-bent note of the lower reed
    private getOverblowOverdrawFrequency(channel: number): number {
        const base = this.hasInverseCentsHandling(channel)
            ? this.getChannelOutFrequency(channel)
            : this.getChannelInFrequency(channel);
        return addCentsToFrequency(HALF_TONE_CENTS, base);
    }
}

function isValidChannel(channel: number): boolean {
    return Number.isInteger(channel) && channel >= CHANNEL_MIN && channel <= CHANNEL_MAX;
}

/**
 * Builds a harmonica whose key frequency comes from `context`. Unknown key or
 * tune names fall back to C / Richter.
 */
export function createHarmonica(key: string, tune: string, context: PitchContext): Harmonica {
    const normalizedKey = key.trim().toUpperCase();
    const normalizedTune = tune.trim().toUpperCase();
    const resolvedKey = isKey(normalizedKey) ? normalizedKey : DEFAULT_KEY;
    const resolvedTune = isTune(normalizedTune) ? normalizedTune : DEFAULT_TUNE;
    if (resolvedKey !== normalizedKey || resolvedTune !== normalizedTune) {
        console.warn(`[Harmonica] Unknown key/tune "${key}"/"${tune}", using ${resolvedKey}/${resolvedTune}`);
    }
    return new Harmonica(resolvedKey, resolvedTune, context.getFrequency(KEYS[resolvedKey]));
}

export function createHarmonicaByIndex(keyIndex: number, tuneIndex: number, context: PitchContext): Harmonica {
    const key = SUPPORTED_KEYS[keyIndex] ?? DEFAULT_KEY;
    const tune = SUPPORTED_TUNES[tuneIndex] ?? DEFAULT_TUNE;
    return createHarmonica(key, tune, context);
}
