import type { HarpEngineState, HarpSettings, NoteCell, NoteCellState, PitchResult } from './types';
import { NoteLookup, noteLookup as sharedNoteLookup } from './NoteLookup';
import type { PitchContext } from './NoteLookup';
import { Harmonica, createHarmonicaByIndex } from './harmonica/Harmonica';
import { buildNoteCells, evaluateCell, getPlayableRange } from './harmonica/noteCells';
import { NO_DETECTED_PITCH, SUPPORTED_ALGORITHMS } from './audio/PitchDetector';
import { PitchAnalyzer } from './PitchAnalyzer';
import { DEFAULT_SETTINGS, getConfidenceValue, sanitizeSettings } from './settings';

const PERSISTENT_KEYS: (keyof HarpSettings)[] = [
    'keyIndex', 'tuneIndex', 'algorithmIndex', 'concertPitchIndex', 'confidenceIndex',
];

/**
 * Ties the note table, the harmonica model and pitch detection together for
 * the view layer: feed it audio frames (or detected frequencies) and read
 * back which harp cells are sounding and how far off they are.
 *
 * The engine follows its NoteLookup: a concert pitch change made anywhere,
 * including by another engine on the same lookup, retunes this harp too.
 * Call `dispose` to stop following it.
 */
export class HarpEngine {
    state: HarpEngineState;
    harmonica: Harmonica;
    pitchAnalyzer: PitchAnalyzer;

    private readonly noteLookup: NoteLookup;
    // The snapshot the harmonica and cells were built from
    private context: PitchContext;
    private cells: NoteCell[] = [];
    private applyingSettings = false;
    private readonly unsubscribeLookup: () => void;

    // Reactivity
    listeners: (() => void)[] = [];

    constructor(settings: Partial<HarpSettings> = {}, noteLookup: NoteLookup = sharedNoteLookup) {
        this.noteLookup = noteLookup;
        const initial: HarpSettings = { ...DEFAULT_SETTINGS, ...sanitizeSettings(settings) };

        this.noteLookup.setConcertPitchByIndex(initial.concertPitchIndex);
        this.pitchAnalyzer = new PitchAnalyzer({
            algorithm: SUPPORTED_ALGORITHMS[initial.algorithmIndex],
            confidence: getConfidenceValue(initial.confidenceIndex),
        });
        this.context = this.noteLookup.getContext();
        this.harmonica = createHarmonicaByIndex(initial.keyIndex, initial.tuneIndex, this.context);
        this.state = {
            settings: initial,
            keyName: this.harmonica.getKeyName(),
            tuneName: this.harmonica.getTuneName(),
            concertPitch: this.context.concertPitch,
            frequency: NO_DETECTED_PITCH,
            confidence: 0,
            noteName: null,
            cells: [],
        };
        this.rebuildCells();
        this.unsubscribeLookup = this.noteLookup.subscribe(context => this.applyContext(context));
    }

    subscribe(cb: () => void) {
        this.listeners.push(cb);
        return () => {
            this.listeners = this.listeners.filter(l => l !== cb);
        };
    }

    notify() {
        this.listeners.forEach(cb => cb());
    }

    getCells(): readonly NoteCell[] {
        return this.cells;
    }

    dispose() {
        this.unsubscribeLookup();
        this.listeners = [];
    }

    updateSettings(updates: Partial<HarpSettings>) {
        const valid = sanitizeSettings(updates);
        const previous = this.state.settings;
        const settings: HarpSettings = { ...previous, ...valid };
        this.state = { ...this.state, settings };
        const contextBefore = this.context;

        this.applyingSettings = true;
        try {
            if (settings.concertPitchIndex !== previous.concertPitchIndex) {
                this.noteLookup.setConcertPitchByIndex(settings.concertPitchIndex);
            }
        } finally {
            this.applyingSettings = false;
        }
        if (settings.algorithmIndex !== previous.algorithmIndex) {
            this.pitchAnalyzer.setAlgorithm(SUPPORTED_ALGORITHMS[settings.algorithmIndex]);
        }
        if (settings.confidenceIndex !== previous.confidenceIndex) {
            this.pitchAnalyzer.setConfidence(getConfidenceValue(settings.confidenceIndex));
        }
        // A context change has already rebuilt the harp
        if (this.context === contextBefore
            && (settings.keyIndex !== previous.keyIndex || settings.tuneIndex !== previous.tuneIndex)) {
            this.rebuildHarmonica();
        }

        console.log('[HarpEngine] Settings updated', valid);
        this.notify();
    }

    handleFrame(samples: Float32Array, sampleRate: number): PitchResult {
        const result = this.pitchAnalyzer.analyze(samples, sampleRate);
        this.handleFrequency(result.pitch, result.confidence);
        return result;
    }

    handleFrequency(frequency: number, confidence: number = 1) {
        const detected = frequency > 0;
        this.state = {
            ...this.state,
            frequency: detected ? frequency : NO_DETECTED_PITCH,
            confidence,
            noteName: detected ? this.context.getNoteName(frequency) : null,
            cells: this.evaluateCells(detected ? frequency : NO_DETECTED_PITCH),
        };
        this.notify();
    }

    // Persistence
    loadSettings(json: string) {
        try {
            const parsed: unknown = JSON.parse(json);
            const updates = sanitizeSettings(parsed);
            this.updateSettings(updates);
            console.log('[HarpEngine] Settings loaded', updates);
        } catch (e) {
            console.error('[HarpEngine] Failed to load settings', e);
        }
    }

    saveSettings(): string {
        const toSave: Partial<HarpSettings> = {};
        PERSISTENT_KEYS.forEach(key => {
            toSave[key] = this.state.settings[key];
        });
        return JSON.stringify(toSave);
    }

    private applyContext(context: PitchContext) {
        this.context = context;
        const pitchIndex = NoteLookup.getSupportedConcertPitches().indexOf(String(context.concertPitch));
        if (pitchIndex === -1) {
            console.warn(`[HarpEngine] Concert pitch ${context.concertPitch} Hz is not in the supported list`);
        } else if (pitchIndex !== this.state.settings.concertPitchIndex) {
            this.state = { ...this.state, settings: { ...this.state.settings, concertPitchIndex: pitchIndex } };
        }
        this.rebuildHarmonica();
        if (!this.applyingSettings) {
            this.notify();
        }
    }

    private rebuildHarmonica() {
        const { keyIndex, tuneIndex } = this.state.settings;
        this.harmonica = createHarmonicaByIndex(keyIndex, tuneIndex, this.context);
        this.state = {
            ...this.state,
            keyName: this.harmonica.getKeyName(),
            tuneName: this.harmonica.getTuneName(),
            concertPitch: this.context.concertPitch,
        };
        this.rebuildCells();
    }

    private rebuildCells() {
        this.cells = buildNoteCells(this.harmonica, this.context);
        const range = getPlayableRange(this.cells);
        if (range) {
            this.pitchAnalyzer.setFrequencyRange(range);
        }
        this.state = { ...this.state, cells: this.evaluateCells(this.state.frequency) };
        console.log(`[HarpEngine] ${this.harmonica.getKeyName()} ${this.harmonica.getTuneName()}: ${this.cells.length} cells`);
    }

    private evaluateCells(frequency: number): NoteCellState[] {
        return this.cells.map(cell => ({ ...cell, ...evaluateCell(cell, frequency) }));
    }
}
