import type { Tune } from '../types';

export interface TuningTable {
    halfTonesIn: readonly number[]; // draw, index 1..10
    halfTonesOut: readonly number[]; // blow, index 1..10
}

// Half-tone offsets from the key's root; index 0 is unused.
export const TUNINGS: Readonly<Record<Tune, TuningTable>> = Object.freeze({
    RICHTER: {
        halfTonesIn: [0, 2, 7, 11, 14, 17, 21, 23, 26, 29, 33],
        halfTonesOut: [0, 0, 4, 7, 12, 16, 19, 24, 28, 31, 36],
    },
    COUNTRY: {
        halfTonesIn: [0, 2, 7, 11, 14, 18, 21, 23, 26, 29, 33],
        halfTonesOut: [0, 0, 4, 7, 12, 16, 19, 24, 28, 31, 36],
    },
    DIMINISHED: {
        halfTonesIn: [0, 2, 5, 8, 11, 14, 17, 20, 23, 26, 29],
        halfTonesOut: [0, 0, 3, 6, 9, 12, 15, 18, 21, 24, 27],
    },
    HARMONICMOLL: {
        halfTonesIn: [0, 2, 7, 11, 14, 17, 20, 23, 26, 29, 32],
        halfTonesOut: [0, 0, 3, 7, 12, 15, 19, 24, 27, 31, 36],
    },
    PADDYRICHTER: {
        halfTonesIn: [0, 2, 7, 11, 14, 17, 21, 23, 26, 29, 33],
        halfTonesOut: [0, 0, 4, 9, 12, 16, 19, 24, 28, 31, 36],
    },
    MELODYMAKER: {
        halfTonesIn: [0, 2, 7, 11, 14, 18, 21, 23, 26, 29, 33],
        halfTonesOut: [0, 0, 4, 9, 12, 16, 19, 24, 28, 31, 36],
    },
    NATURALMOLL: {
        halfTonesIn: [0, 2, 7, 10, 14, 17, 21, 22, 26, 29, 33],
        halfTonesOut: [0, 0, 3, 7, 12, 15, 19, 24, 27, 31, 36],
    },
    CIRCULAR: {
        halfTonesIn: [0, 2, 5, 9, 12, 16, 19, 22, 26, 29, 33],
        halfTonesOut: [0, 0, 4, 7, 10, 14, 17, 21, 24, 28, 31],
    },
    AUGMENTED: {
        halfTonesIn: [0, 3, 7, 11, 15, 19, 23, 27, 31, 35, 39],
        halfTonesOut: [0, 0, 4, 8, 12, 16, 20, 24, 28, 32, 36],
    },
});

export const SUPPORTED_TUNES: readonly Tune[] = Object.freeze([
    'RICHTER', 'COUNTRY', 'DIMINISHED', 'HARMONICMOLL', 'PADDYRICHTER',
    'MELODYMAKER', 'NATURALMOLL', 'CIRCULAR', 'AUGMENTED',
]);

export function isTune(value: string): value is Tune {
    return SUPPORTED_TUNES.some(tune => tune === value);
}

// Harmonica keys and the note their channel-1 blow reed sounds.
// Prefix L / LL marks low and extra-low harps, H marks high harps.
export const KEYS = Object.freeze({
    A: 'A3',
    A_FLAT: 'G#3',
    B: 'B3',
    B_FLAT: 'A#3',
    C: 'C4',
    D: 'D4',
    D_FLAT: 'C#4',
    E: 'E4',
    E_FLAT: 'D#4',
    F: 'F4',
    F_HASH: 'F#4',
    G: 'G3',
    HA_FLAT: 'G#4',
    HB_FLAT: 'A#4',
    HG: 'G4',
    LA: 'A2',
    LA_FLAT: 'G#2',
    LB: 'B2',
    LB_FLAT: 'A#2',
    LC: 'C3',
    LD: 'D3',
    LD_FLAT: 'C#3',
    LE: 'E3',
    LE_FLAT: 'D#3',
    LF: 'F3',
    LF_HASH: 'F#3',
    LG: 'G2',
    LLE: 'E2',
    LLF: 'F2',
    LLF_HASH: 'F#2',
} as const);

export type Key = keyof typeof KEYS;

export function isKey(value: string): value is Key {
    return Object.prototype.hasOwnProperty.call(KEYS, value);
}

export const SUPPORTED_KEYS: readonly Key[] = Object.freeze(Object.keys(KEYS).filter(isKey));
