/**
 * Unknown-value handling shared by every stage of the decoder.
 *
 * A captured bit can be indeterminate (`X`), so every derived value carries an
 * explicit "unknown" state instead of falling back to zero or false.
 */

/** A value that may be unknown. `null` always means "unknown", never zero. */
export type Maybe<T> = T | null;

/** Match / mismatch / cannot tell. */
export type TriState = boolean | null;

/** One sampled bit: `null` for the indeterminate marker or a missing cell. */
export type Bit = 0 | 1 | null;

/** Compares two possibly-unknown values. */
export function compareKnown<T>(a: Maybe<T>, b: Maybe<T>): TriState {
	if (a === null || b === null) return null;
	return a === b;
}

export function popcount(value: number): number {
	let v = value >>> 0;
	let count = 0;
	while (v !== 0) {
		v &= v - 1;
		count++;
	}
	return count;
}
