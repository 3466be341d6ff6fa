/**
 * Small numeric helpers shared by the Analyst and the Cognition Base.
 */

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Position of `value` within [min, max], clamped to [0, 1].
 * A degenerate range (a single observed value) maps to 1.
 */
export function normalize(value: number, min: number, max: number): number {
    if (max <= min) return 1;
    return Math.min(1, Math.max(0, (value - min) / (max - min)));
}

/**
 * Relative gain of `value` over `baseline`; absolute gain when the baseline is 0.
 */
export function relativeGain(value: number, baseline: number): number {
    if (baseline === 0) return value;
    return (value - baseline) / Math.abs(baseline);
}

export function percent(ratio: number): string {
    return `${Math.round(ratio * 100)}%`;
}
