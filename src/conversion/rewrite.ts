/**
 * Fixed-point rewriting with a termination measure.
 *
 * `step` applies one rule at one site and returns the rewritten value, or
 * null when no rule applies. Every step must strictly decrease `measure`
 * (a non-negative integer); a step that does not is reported as
 * REWRITE_DID_NOT_CONVERGE instead of looping.
 */

import { ConversionError, ConversionErrorCode } from './errors.js';

export interface FixedPointResult<T> {
    value: T;
    /** Number of rewrite steps applied. */
    steps: number;
}

export function rewriteToFixedPoint<T>(
    initial: T,
    step: (value: T) => T | null,
    measure: (value: T) => number,
    label: string,
): FixedPointResult<T> {
    let value = initial;
    let current = measure(value);
    let steps = 0;

    for (;;) {
        const next = step(value);
        if (next === null) return { value, steps };
        const nextMeasure = measure(next);
        if (nextMeasure >= current || nextMeasure < 0) {
            throw new ConversionError(`${label}: rewrite step did not decrease its measure`, ConversionErrorCode.REWRITE_DID_NOT_CONVERGE, {
                before: current,
                after: nextMeasure,
                steps,
            });
        }
        value = next;
        current = nextMeasure;
        steps++;
    }
}
