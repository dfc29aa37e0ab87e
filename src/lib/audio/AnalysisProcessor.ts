import type { PitchResult } from '../types';
import type { PitchAnalyzer } from '../PitchAnalyzer';

export const DEFAULT_FRAME_SIZE = 8192;

/**
 * Collects capture-sized chunks into fixed analysis frames and runs the
 * analyzer each time a frame is full. The frame buffer is allocated once.
 */
export class AnalysisProcessor {
    private readonly analyzer: PitchAnalyzer;
    private readonly frame: Float32Array;
    private frameIndex = 0;
    private sampleRate = 44100;

    // Receives one result per completed frame
    public onResult: ((res: PitchResult) => void) | null = null;

    constructor(analyzer: PitchAnalyzer, frameSize: number = DEFAULT_FRAME_SIZE) {
        if (!Number.isInteger(frameSize) || frameSize <= 0) {
            throw new RangeError(`Frame size must be a positive integer, got ${frameSize}`);
        }
        this.analyzer = analyzer;
        this.frame = new Float32Array(frameSize);
    }

    get frameSize(): number {
        return this.frame.length;
    }

    init(sampleRate: number) {
        if (!(sampleRate > 0)) {
            throw new RangeError(`Sample rate must be positive, got ${sampleRate}`);
        }
        this.sampleRate = sampleRate;
        this.reset();
    }

    /**
     * Appends `chunk`, analysing every frame it completes. Returns the number
     * of frames analysed.
     */
    process(chunk: ArrayLike<number>): number {
        let analysed = 0;
        for (let i = 0; i < chunk.length; i++) {
            this.frame[this.frameIndex++] = chunk[i];
            if (this.frameIndex === this.frame.length) {
                const result = this.analyzer.analyze(this.frame, this.sampleRate);
                this.frameIndex = 0;
                analysed++;
                if (this.onResult) this.onResult(result);
            }
        }
        return analysed;
    }

    reset() {
        this.frameIndex = 0;
    }
}
