/**
 * TERC4 symbol codec and data island control pattern recognition.
 */

import type { Maybe } from "../util/known.js";
import { CHANNELS, type Channel, GUARD_CODE, PREAMBLE_CODE, TERC4_CODES } from "./constants.js";

const TERC4_SYMBOLS: ReadonlyMap<number, number> = new Map(
	TERC4_CODES.map((code, symbol) => [code, symbol] as const),
);

export type ChannelCodes = Record<Channel, Maybe<number>>;

export function encodeTerc4(symbol: number): number {
	if (!Number.isInteger(symbol) || symbol < 0 || symbol > 0xf) {
		throw new RangeError(`TERC4 symbol out of range: ${symbol}`);
	}
	return TERC4_CODES[symbol] ?? 0;
}

/** Symbol for a captured 10-bit code; `null` for an unknown or invalid code. */
export function decodeTerc4(code: Maybe<number>): Maybe<number> {
	if (code === null) return null;
	return TERC4_SYMBOLS.get(code) ?? null;
}

export function isGuardSample(sample: ChannelCodes): boolean {
	return CHANNELS.every((ch) => sample[ch] === GUARD_CODE);
}

export function isPreambleSample(sample: ChannelCodes): boolean {
	return CHANNELS.every((ch) => sample[ch] === PREAMBLE_CODE);
}
