/**
 * Synthetic signal generators shared by the detector and engine tests.
 */

export function generateSineWave(
    frequency: number,
    sampleRate: number = 44100,
    numSamples: number = 4096,
    amplitude: number = 0.5,
): Float32Array {
    const buffer = new Float32Array(numSamples);
    const angularFreq = (2 * Math.PI * frequency) / sampleRate;
    for (let i = 0; i < numSamples; i++) {
        buffer[i] = amplitude * Math.sin(angularFreq * i);
    }
    return buffer;
}

// Fundamental plus 2x and 3x partials, peak-normalized to `amplitude`
export function generateReedTone(
    fundamental: number,
    sampleRate: number = 44100,
    numSamples: number = 4096,
    amplitude: number = 0.5,
): Float32Array {
    const partials = [1, 0.5, 0.25];
    const buffer = new Float32Array(numSamples);
    partials.forEach((gain, h) => {
        const angularFreq = (2 * Math.PI * fundamental * (h + 1)) / sampleRate;
        for (let i = 0; i < numSamples; i++) {
            buffer[i] += gain * Math.sin(angularFreq * i);
        }
    });
    let peak = 0;
    for (let i = 0; i < numSamples; i++) peak = Math.max(peak, Math.abs(buffer[i]));
    for (let i = 0; i < numSamples; i++) buffer[i] = (buffer[i] / peak) * amplitude;
    return buffer;
}

// Deterministic pseudo-random noise (LCG) so tests never flake
export function generateNoise(numSamples: number = 4096, amplitude: number = 0.5, seed: number = 1): Float32Array {
    const buffer = new Float32Array(numSamples);
    let state = seed >>> 0;
    for (let i = 0; i < numSamples; i++) {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        buffer[i] = amplitude * ((state / 0xffffffff) * 2 - 1);
    }
    return buffer;
}

export function centsOff(detected: number, reference: number): number {
    return Math.abs(1200 * Math.log2(detected / reference));
}

export function mixSignals(a: Float32Array, b: Float32Array): Float32Array {
    const out = new Float32Array(Math.min(a.length, b.length));
    for (let i = 0; i < out.length; i++) out[i] = a[i] + b[i];
    return out;
}
