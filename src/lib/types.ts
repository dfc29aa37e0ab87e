export interface Note {
    name: string;
    frequency: number;
}

export interface PitchResult {
    pitch: number; // Hz, or NO_DETECTED_PITCH
    confidence: number; // 0..1
}

export type PitchAlgorithm = 'YIN' | 'MPM';

export interface FrequencyRange {
    minFrequency: number;
    maxFrequency: number;
}

export type Tune =
    | 'RICHTER'
    | 'COUNTRY'
    | 'DIMINISHED'
    | 'HARMONICMOLL'
    | 'PADDYRICHTER'
    | 'MELODYMAKER'
    | 'NATURALMOLL'
    | 'CIRCULAR'
    | 'AUGMENTED';

export type NoteKind = 'blow' | 'draw' | 'drawBend' | 'blowBend' | 'overblow' | 'overdraw';

export interface NoteCell {
    channel: number;
    note: number;
    kind: NoteKind;
    noteName: string;
    frequency: number;
    minFrequency: number;
    maxFrequency: number;
    invertCents: boolean; // blow note on a channel whose blow reed sits above the draw reed
}

export interface NoteCellState extends NoteCell {
    active: boolean;
    cents: number;
}

export interface HarpSettings {
    keyIndex: number;
    tuneIndex: number;
    algorithmIndex: number;
    concertPitchIndex: number;
    confidenceIndex: number;
}

export interface HarpEngineState {
    settings: HarpSettings;
    keyName: string;
    tuneName: Tune;
    concertPitch: number;
    frequency: number;
    confidence: number;
    noteName: string | null;
    cells: NoteCellState[];
}
