import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NoteLookup, PitchContext, normalizeNoteName } from './NoteLookup';
import { addCentsToFrequency } from './noteUtils';

describe('normalizeNoteName', () => {
    it('accepts case, whitespace and accidental variants', () => {
        expect(normalizeNoteName('a4')).toBe('A4');
        expect(normalizeNoteName(' Bb3 ')).toBe('A#3');
        expect(normalizeNoteName('db4')).toBe('C#4');
        expect(normalizeNoteName('C♯5')).toBe('C#5');
        expect(normalizeNoteName('E♭2')).toBe('D#2');
    });

    it('maps enharmonic spellings across the octave boundary', () => {
        expect(normalizeNoteName('Cb4')).toBe('B3');
        expect(normalizeNoteName('B#3')).toBe('C4');
    });

    it('rejects empty and unparsable names', () => {
        expect(() => normalizeNoteName('')).toThrow(RangeError);
        expect(() => normalizeNoteName('   ')).toThrow(RangeError);
        expect(() => normalizeNoteName(null)).toThrow(RangeError);
        expect(() => normalizeNoteName(undefined)).toThrow(RangeError);
        expect(() => normalizeNoteName('H4')).toThrow(RangeError);
        expect(() => normalizeNoteName('C#')).toThrow('Invalid note name: "C#"');
    });

    it('rejects octaves outside 0..8', () => {
        expect(() => normalizeNoteName('C9')).toThrow(RangeError);
        expect(() => normalizeNoteName('Cb0')).toThrow(RangeError);
        expect(() => normalizeNoteName('B#8')).toThrow(RangeError);
    });
});

describe('PitchContext', () => {
    const context = PitchContext.forConcertPitch(440);

    it('holds 108 ascending notes from C0 to B8', () => {
        const notes = context.getNotes();
        expect(notes).toHaveLength(108);
        expect(notes[0].name).toBe('C0');
        expect(notes[107].name).toBe('B8');
        for (let i = 1; i < notes.length; i++) {
            expect(notes[i].frequency).toBeGreaterThan(notes[i - 1].frequency);
        }
    });

    it('looks up frequencies by name', () => {
        expect(context.getFrequency('A4')).toBe(440);
        expect(context.getFrequency('c4')).toBe(261.626);
        expect(context.getFrequency('Eb4')).toBe(311.127);
    });

    it('round-trips every note name through its frequency', () => {
        for (const note of context.getNotes()) {
            expect(context.getNoteName(note.frequency)).toBe(note.name);
        }
    });

    it('matches within the 50 cent window', () => {
        expect(context.getNoteName(445)).toBe('A4');
        expect(context.getNoteName(addCentsToFrequency(49.9, 440))).toBe('A4');
        expect(context.getNoteName(addCentsToFrequency(50.1, 440))).toBe('A#4');
        expect(context.getNoteName(addCentsToFrequency(-49.9, 440))).toBe('A4');
    });

    it('includes notes exactly 50 cents away', () => {
        expect(context.getNoteName(addCentsToFrequency(50, 440))).toBe('A4');
        const notes = context.getNotes();
        notes.forEach((note, i) => {
            expect(context.getNoteName(addCentsToFrequency(50, note.frequency))).toBe(note.name);
            // A shared boundary goes to the lower note
            const below = context.getNoteName(addCentsToFrequency(-50, note.frequency));
            expect(i === 0 ? [note.name] : [notes[i - 1].name, note.name]).toContain(below);
        });
    });

    it('returns null when no note is close enough', () => {
        expect(context.getNoteName(0)).toBeNull();
        expect(context.getNoteName(-440)).toBeNull();
        expect(context.getNoteName(5)).toBeNull();
        expect(context.getNoteName(20000)).toBeNull();
        expect(context.getNote(Number.NaN)).toBeNull();
    });

    it('puts A4 exactly on every supported concert pitch', () => {
        for (const pitch of NoteLookup.getSupportedConcertPitches()) {
            const hz = parseInt(pitch, 10);
            expect(PitchContext.forConcertPitch(hz).getFrequency('A4')).toBeCloseTo(hz, 2);
        }
    });

    it('rescales the whole table', () => {
        const tuned = PitchContext.forConcertPitch(442);
        expect(tuned.getFrequency('C4')).toBe(262.815);
        expect(tuned.getNoteName(442)).toBe('A4');
    });
});

describe('NoteLookup', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('lists concert pitches 431 to 446', () => {
        const pitches = NoteLookup.getSupportedConcertPitches();
        expect(pitches).toHaveLength(16);
        expect(pitches[0]).toBe('431');
        expect(pitches[15]).toBe('446');
    });

    it('swaps in a new snapshot on concert pitch change', () => {
        const lookup = new NoteLookup();
        const before = lookup.getContext();
        const listener = vi.fn();
        lookup.subscribe(listener);

        lookup.setConcertPitch(442);

        expect(lookup.getConcertPitch()).toBe(442);
        expect(lookup.getFrequency('A4')).toBe(442);
        expect(lookup.getContext()).not.toBe(before);
        expect(before.getFrequency('A4')).toBe(440);
        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith(lookup.getContext());
        expect(console.log).toHaveBeenCalledWith('[NoteLookup] Concert pitch set to 442 Hz');
    });

    it('ignores a change to the current pitch', () => {
        const lookup = new NoteLookup(440);
        const listener = vi.fn();
        lookup.subscribe(listener);
        lookup.setConcertPitch(440);
        expect(listener).not.toHaveBeenCalled();
    });

    it('stops notifying after unsubscribe', () => {
        const lookup = new NoteLookup();
        const listener = vi.fn();
        const unsubscribe = lookup.subscribe(listener);
        unsubscribe();
        lookup.setConcertPitch(435);
        expect(listener).not.toHaveBeenCalled();
    });

    it('selects concert pitch by index', () => {
        const lookup = new NoteLookup();
        lookup.setConcertPitchByIndex(0);
        expect(lookup.getConcertPitch()).toBe(431);
        expect(lookup.getNoteName(431)).toBe('A4');
        expect(() => lookup.setConcertPitchByIndex(16)).toThrow(RangeError);
        expect(() => lookup.setConcertPitchByIndex(-1)).toThrow(RangeError);
        expect(lookup.getConcertPitch()).toBe(431);
    });

    it('rejects unknown note names', () => {
        const lookup = new NoteLookup();
        expect(() => lookup.getFrequency('X4')).toThrow(RangeError);
    });
});
