import { describe, it, expect } from 'vitest';
import { YinPitchDetector, YIN_THRESHOLD } from './YinPitchDetector';
import { NO_DETECTED_PITCH } from './PitchDetector';
import { centsOff, generateNoise, generateReedTone, generateSineWave } from '../testHelpers';

const SAMPLE_RATE = 44100;

describe('YinPitchDetector', () => {
    it('detects a 440 Hz sine within 1%', () => {
        const detector = new YinPitchDetector();
        const { pitch, confidence } = detector.detectPitch(generateSineWave(440, SAMPLE_RATE), SAMPLE_RATE);
        expect(Math.abs(pitch - 440) / 440).toBeLessThan(0.01);
        expect(confidence).toBeGreaterThan(0.5);
        expect(confidence).toBeLessThanOrEqual(1);
    });

    it('follows notes across the harp range', () => {
        const detector = new YinPitchDetector();
        for (const frequency of [261.626, 523.252, 987.768, 2093.008]) {
            const { pitch } = detector.detectPitch(generateSineWave(frequency, SAMPLE_RATE), SAMPLE_RATE);
            expect(centsOff(pitch, frequency)).toBeLessThan(17);
        }
    });

    it('locks onto the fundamental of a tone with overtones', () => {
        const detector = new YinPitchDetector();
        const { pitch } = detector.detectPitch(generateReedTone(293.665, SAMPLE_RATE), SAMPLE_RATE);
        expect(Math.abs(pitch - 293.665) / 293.665).toBeLessThan(0.01);
    });

    it('works at other sample rates', () => {
        const detector = new YinPitchDetector();
        const { pitch } = detector.detectPitch(generateSineWave(440, 48000), 48000);
        expect(Math.abs(pitch - 440) / 440).toBeLessThan(0.01);
    });

    it('returns no pitch for silence', () => {
        const detector = new YinPitchDetector();
        expect(detector.detectPitch(new Float32Array(4096), SAMPLE_RATE)).toEqual({ pitch: NO_DETECTED_PITCH, confidence: 0 });
    });

    it('degrades to no pitch on degenerate input', () => {
        const detector = new YinPitchDetector();
        const noPitch = { pitch: NO_DETECTED_PITCH, confidence: 0 };
        expect(detector.detectPitch(new Float32Array(0), SAMPLE_RATE)).toEqual(noPitch);
        expect(detector.detectPitch(generateSineWave(440, SAMPLE_RATE, 5), SAMPLE_RATE)).toEqual(noPitch);
        expect(detector.detectPitch(generateSineWave(440, SAMPLE_RATE), 0)).toEqual(noPitch);
        expect(detector.detectPitch(generateSineWave(440, SAMPLE_RATE), Number.NaN)).toEqual(noPitch);
    });

    it('ignores pitches below the configured band', () => {
        const detector = new YinPitchDetector();
        detector.setFrequencyRange({ minFrequency: 500, maxFrequency: 2000 });
        expect(detector.detectPitch(generateSineWave(220, SAMPLE_RATE), SAMPLE_RATE).pitch).toBe(NO_DETECTED_PITCH);

        const { pitch } = detector.detectPitch(generateSineWave(1000, SAMPLE_RATE), SAMPLE_RATE);
        expect(Math.abs(pitch - 1000) / 1000).toBeLessThan(0.01);
    });

    it('returns the same result when the band only trims unused lags', () => {
        const wide = new YinPitchDetector();
        const narrow = new YinPitchDetector();
        narrow.setFrequencyRange({ minFrequency: 300, maxFrequency: 4835 });
        const frame = generateSineWave(440, SAMPLE_RATE, 8192);
        expect(narrow.detectPitch(frame, SAMPLE_RATE)).toEqual(wide.detectPitch(frame, SAMPLE_RATE));
    });

    it('keeps confidence within 0..1 on noise', () => {
        const detector = new YinPitchDetector();
        const { confidence } = detector.detectPitch(generateNoise(4096), SAMPLE_RATE);
        expect(confidence).toBeGreaterThanOrEqual(0);
        expect(confidence).toBeLessThanOrEqual(1);
    });

    it('gives the same answer when reused across buffer sizes', () => {
        const detector = new YinPitchDetector();
        const first = detector.detectPitch(generateSineWave(440, SAMPLE_RATE, 4096), SAMPLE_RATE);
        detector.detectPitch(generateSineWave(440, SAMPLE_RATE, 2048), SAMPLE_RATE);
        const again = detector.detectPitch(generateSineWave(440, SAMPLE_RATE, 4096), SAMPLE_RATE);
        expect(again).toEqual(first);
    });

    it('exposes its configuration', () => {
        const detector = new YinPitchDetector();
        expect(detector.algorithm).toBe('YIN');
        expect(YIN_THRESHOLD).toBe(0.4);
        expect(detector.getFrequencyRange()).toEqual({ minFrequency: 80, maxFrequency: 4835 });
        expect(() => detector.setFrequencyRange({ minFrequency: 0, maxFrequency: 100 })).toThrow(RangeError);
        expect(() => detector.setFrequencyRange({ minFrequency: 300, maxFrequency: 300 })).toThrow(RangeError);
        expect(detector.getFrequencyRange()).toEqual({ minFrequency: 80, maxFrequency: 4835 });
    });
});
