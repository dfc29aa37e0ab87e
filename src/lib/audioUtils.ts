export function computeRms(buf: ArrayLike<number>): number {
    if (buf.length === 0) return 0;
    let sum = 0;
    for (let i = 0; i < buf.length; i++) sum += buf[i] * buf[i];
    return Math.sqrt(sum / buf.length);
}

/**
 * Refines the position of an extremum at `index` by fitting a parabola
 * through it and its two neighbours. Boundary indices, flat neighbourhoods
 * and shifts larger than one sample return `index` unchanged.
 */
export function parabolicInterpolation(values: ArrayLike<number>, index: number, length: number = values.length): number {
    if (index <= 0 || index >= length - 1) return index;

    const x0 = values[index - 1];
    const x1 = values[index];
    const x2 = values[index + 1];
    const denominator = x0 - 2 * x1 + x2;
    if (Math.abs(denominator) < 1e-10) return index;

    const adjustment = 0.5 * (x0 - x2) / denominator;
    if (Math.abs(adjustment) > 1) return index;
    return index + adjustment;
}
