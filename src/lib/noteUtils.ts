// Precision used for every frequency the tuning model hands out
const DECIMAL_FACTOR = 1000;

// A scaled value this close to an integer counts as that integer
const REPRESENTATION_EPSILON = 1e-7;

/**
 * Interval between two frequencies in cents.
 * Positive when `f1` is higher than `f2`; a detected pitch is always
 * compared as `getCents(detected, expected)`, so positive means sharp.
 */
export function getCents(f1: number, f2: number): number {
    return 1200 * Math.log2(f1 / f2);
}

export function addCentsToFrequency(cents: number, frequency: number): number {
    return Math.pow(2, cents / 1200) * frequency;
}

/**
 * Truncates to three decimals: `floor(value * 1000) / 1000`, except that a
 * scaled value within 1e-7 of an integer is taken as that integer.
 */
export function round(value: number): number {
    const scaled = value * DECIMAL_FACTOR;
    const nearest = Math.round(scaled);
    const truncated = Math.abs(scaled - nearest) < REPRESENTATION_EPSILON ? nearest : Math.floor(scaled);
    return truncated / DECIMAL_FACTOR;
}

export function isWithinCents(frequency: number, reference: number, cents: number): boolean {
    const lower = addCentsToFrequency(-cents, reference);
    const upper = addCentsToFrequency(cents, reference);
    return frequency >= lower && frequency <= upper;
}
