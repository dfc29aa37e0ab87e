import type { FrequencyRange, NoteCell, NoteKind } from '../types';
import type { PitchContext } from '../NoteLookup';
import { getCents } from '../noteUtils';
import { CHANNEL_MAX, CHANNEL_MIN } from './Harmonica';
import type { Harmonica } from './Harmonica';

function makeCell(harmonica: Harmonica, context: PitchContext, channel: number, note: number, kind: NoteKind, invertCents = false): NoteCell | null {
    const frequency = harmonica.getNoteFrequency(channel, note);
    const noteName = context.getNoteName(frequency);
    if (noteName === null) {
        console.warn(`[NoteCells] No note name for ${kind} on channel ${channel} (${frequency} Hz)`);
        return null;
    }
    return {
        channel,
        note,
        kind,
        noteName,
        frequency,
        minFrequency: harmonica.getNoteFrequencyMinimum(channel, note),
        maxFrequency: harmonica.getNoteFrequencyMaximum(channel, note),
        invertCents,
    };
}

/**
 * Every playable cell of the harp diagram, channel by channel: blow, draw,
 * draw bends, blow bends, then the overblow or overdraw.
 */
export function buildNoteCells(harmonica: Harmonica, context: PitchContext): NoteCell[] {
    const cells: (NoteCell | null)[] = [];
    for (let channel = CHANNEL_MIN; channel <= CHANNEL_MAX; channel++) {
        const inverse = harmonica.hasInverseCentsHandling(channel);
        cells.push(makeCell(harmonica, context, channel, 0, 'blow', inverse));
        cells.push(makeCell(harmonica, context, channel, 1, 'draw'));

        const drawBends = harmonica.getDrawBendingTonesCount(channel);
        for (let note = 2; note < 2 + drawBends; note++) {
            cells.push(makeCell(harmonica, context, channel, note, 'drawBend'));
        }
        const blowBends = harmonica.getBlowBendingTonesCount(channel);
        for (let note = -blowBends; note < 0; note++) {
            cells.push(makeCell(harmonica, context, channel, note, 'blowBend'));
        }

        if (inverse) {
            cells.push(makeCell(harmonica, context, channel, 2, 'overdraw'));
        } else {
            cells.push(makeCell(harmonica, context, channel, -1, 'overblow'));
        }
    }
    return cells.filter((c): c is NoteCell => c !== null);
}

/**
 * Lowest and highest frequency any cell accepts; used as the detector band.
 */
export function getPlayableRange(cells: readonly NoteCell[]): FrequencyRange | null {
    if (cells.length === 0) return null;
    let minFrequency = Infinity;
    let maxFrequency = 0;
    for (const cell of cells) {
        minFrequency = Math.min(minFrequency, cell.minFrequency);
        maxFrequency = Math.max(maxFrequency, cell.maxFrequency);
    }
    return { minFrequency, maxFrequency };
}

export function evaluateCell(cell: NoteCell, frequency: number): { active: boolean; cents: number } {
    if (!(frequency > 0) || frequency < cell.minFrequency || frequency > cell.maxFrequency) {
        return { active: false, cents: 0 };
    }
    const cents = getCents(frequency, cell.frequency);
    return { active: true, cents: cell.invertCents ? -cents : cents };
}
