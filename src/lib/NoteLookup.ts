import type { Note } from './types';
import { addCentsToFrequency, getCents, isWithinCents, round } from './noteUtils';
import canonicalNotes from './data/notes440.json';

const DEFAULT_CONCERT_PITCH = 440;
const CENTS_WINDOW = 50;
const MIN_OCTAVE = 0;
const MAX_OCTAVE = 8;

const PITCH_CLASSES: Record<string, number> = { C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11 };
const SHARP_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'];
const NOTE_NAME_PATTERN = /^([a-g])([#♯b♭]?)(\d+)$/i;

const SUPPORTED_CONCERT_PITCHES: readonly string[] = Object.freeze([
    '431', '432', '433', '434', '435', '436', '437', '438',
    '439', '440', '441', '442', '443', '444', '445', '446',
]);

/**
 * Resolves any accepted spelling ("db4", " Bb3 ", "C♯5", "Cb4") to the
 * sharp-based table name ("C#4", "A#3", "C#5", "B3").
 */
export function normalizeNoteName(name: string | null | undefined): string {
    if (name === null || name === undefined || name.trim() === '') {
        throw new RangeError('Note name must not be empty');
    }
    const match = NOTE_NAME_PATTERN.exec(name.trim());
    if (!match) {
        throw new RangeError(`Invalid note name: "${name}"`);
    }
    const [, letter, accidental, octaveText] = match;
    const octave = parseInt(octaveText, 10);
    if (octave < MIN_OCTAVE || octave > MAX_OCTAVE) {
        throw new RangeError(`Octave out of range (${MIN_OCTAVE}-${MAX_OCTAVE}): "${name}"`);
    }

    let shift = 0;
    if (accidental === '#' || accidental === '♯') shift = 1;
    else if (accidental !== '') shift = -1; // 'b', 'B' or '♭'

    const semitone = octave * 12 + PITCH_CLASSES[letter.toUpperCase()] + shift;
    const realOctave = Math.floor(semitone / 12);
    if (realOctave < MIN_OCTAVE || realOctave > MAX_OCTAVE) {
        throw new RangeError(`Note outside supported range: "${name}"`);
    }
    return `${SHARP_NAMES[semitone % 12]}${realOctave}`;
}

/**
 * Immutable note table for one concert pitch. Notes are kept in ascending
 * frequency order, which is also the tie-break order for lookups.
 */
export class PitchContext {
    readonly concertPitch: number;
    private readonly notes: readonly Note[];
    private readonly byName: ReadonlyMap<string, Note>;

    private constructor(concertPitch: number, notes: readonly Note[]) {
        this.concertPitch = concertPitch;
        this.notes = notes;
        this.byName = new Map(notes.map(n => [n.name, n]));
    }

    static forConcertPitch(concertPitch: number = DEFAULT_CONCERT_PITCH): PitchContext {
        const cents = getCents(concertPitch, DEFAULT_CONCERT_PITCH);
        const notes = canonicalNotes.map(({ name, frequency }) =>
            Object.freeze({ name, frequency: round(addCentsToFrequency(cents, frequency)) })
        );
        return new PitchContext(concertPitch, Object.freeze(notes));
    }

    getNotes(): readonly Note[] {
        return this.notes;
    }

    getFrequency(noteName: string): number {
        const note = this.byName.get(normalizeNoteName(noteName));
        if (!note) {
            throw new RangeError(`Unknown note: "${noteName}"`);
        }
        return note.frequency;
    }

    getNote(frequency: number): Note | null {
        if (!(frequency > 0)) return null;
        return this.notes.find(note => isWithinCents(frequency, note.frequency, CENTS_WINDOW)) ?? null;
    }

    getNoteName(frequency: number): string | null {
        return this.getNote(frequency)?.name ?? null;
    }
}

/**
 * Shared holder of the active PitchContext. A concert pitch change builds a
 * complete new snapshot and swaps it in, so readers never see a partly
 * retuned table.
 */
export class NoteLookup {
    private context: PitchContext;
    private listeners: ((context: PitchContext) => void)[] = [];

    constructor(concertPitch: number = DEFAULT_CONCERT_PITCH) {
        this.context = PitchContext.forConcertPitch(concertPitch);
    }

    static getSupportedConcertPitches(): readonly string[] {
        return SUPPORTED_CONCERT_PITCHES;
    }

    subscribe(cb: (context: PitchContext) => void) {
        this.listeners.push(cb);
        return () => {
            this.listeners = this.listeners.filter(l => l !== cb);
        };
    }

    getContext(): PitchContext {
        return this.context;
    }

    getConcertPitch(): number {
        return this.context.concertPitch;
    }

    setConcertPitch(concertPitch: number) {
        if (concertPitch === this.context.concertPitch) return;
        const next = PitchContext.forConcertPitch(concertPitch);
        this.context = next;
        console.log(`[NoteLookup] Concert pitch set to ${concertPitch} Hz`);
        this.listeners.forEach(cb => cb(next));
    }

    setConcertPitchByIndex(pitchIndex: number) {
        const pitch = SUPPORTED_CONCERT_PITCHES[pitchIndex];
        if (pitch === undefined) {
            throw new RangeError(`Concert pitch index out of range: ${pitchIndex}`);
        }
        this.setConcertPitch(parseInt(pitch, 10));
    }

    getFrequency(noteName: string): number {
        return this.context.getFrequency(noteName);
    }

    getNoteName(frequency: number): string | null {
        return this.context.getNoteName(frequency);
    }
}

export const noteLookup = new NoteLookup();
