import type { Maybe } from "./known.js";

/** Upper-case hex with a `0x` prefix, zero-padded to `digits`. */
export function hex(value: number, digits: number): string {
	return `0x${value.toString(16).toUpperCase().padStart(digits, "0")}`;
}

/** As {@link hex}, with `unknown` standing in for a `null` value. */
export function hexOrUnknown(value: Maybe<number>, digits: number, unknown = "?"): string {
	return value === null ? unknown : hex(value, digits);
}
