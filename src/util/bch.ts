/**
 * BCH(31,24) ECC for data island packet headers, shared between the decoder,
 * the encoder and the polynomial diagnostics.
 * Generator: 0x8D (x^7 + x^3 + x^2 + 1), systematic LFSR encoder, MSB first.
 */

import {
	BCH_DEGREE,
	BCH_POLYNOMIAL,
	COMMON_BCH_POLYNOMIALS,
	type PolynomialCandidate,
} from "../island/constants.js";
import { popcount, type TriState } from "./known.js";

const MAX_DEGREE = 24;
const HEADER_BITS = 24;
const NEAR_MATCH_ERRORS = 3;

export type HeaderBytes = readonly [number, number, number];

export interface EccCheck {
	expected: number;
	match: boolean;
	bitErrors: number;
}

export interface PolynomialScore {
	name: string;
	polynomial: number;
	degree: number;
	computed: number;
	bitErrors: number;
}

export interface PolynomialTestResult {
	header: HeaderBytes;
	received: number;
	/** Ascending bit errors; ties keep candidate order. */
	ranked: PolynomialScore[];
	best: PolynomialScore | null;
	perfect: boolean;
	/** Imperfect candidates with fewer than 3 bit errors. */
	nearMatches: PolynomialScore[];
}

/**
 * Remainder of `data` (shifted up by `degree`) modulo a generator polynomial,
 * computed by a `degree`-bit LFSR over `dataBits` bits, MSB first.
 * `polynomial` includes its leading x^degree term; only the lower terms tap.
 */
export function lfsrRemainder(
	data: number,
	dataBits: number,
	polynomial: number,
	degree: number,
): number {
	if (!Number.isInteger(degree) || degree < 1 || degree > MAX_DEGREE) {
		throw new RangeError(`Register width must be 1..${MAX_DEGREE}, got ${degree}`);
	}
	if (!Number.isInteger(polynomial) || polynomial <= 0 || polynomial >= 2 ** (degree + 1)) {
		throw new RangeError(`Polynomial 0x${polynomial.toString(16)} does not fit degree ${degree}`);
	}
	if (!Number.isInteger(dataBits) || dataBits < 0 || dataBits > 32) {
		throw new RangeError(`dataBits must be 0..32, got ${dataBits}`);
	}

	const mask = (1 << degree) - 1;
	const taps = polynomial & mask;
	let lfsr = 0;
	for (let i = dataBits - 1; i >= 0; i--) {
		const bit = Math.floor(data / 2 ** i) & 1;
		const feedback = bit ^ ((lfsr >> (degree - 1)) & 1);
		lfsr = (lfsr << 1) & mask;
		if (feedback) lfsr ^= taps;
	}
	return lfsr;
}

export function headerWord(hb0: number, hb1: number, hb2: number): number {
	return ((hb0 & 0xff) << 16) | ((hb1 & 0xff) << 8) | (hb2 & 0xff);
}

/** 8-bit ECC byte for a packet header; bit 7 is always 0. */
export function computeBchEcc(hb0: number, hb1: number, hb2: number): number {
	return lfsrRemainder(headerWord(hb0, hb1, hb2), HEADER_BITS, BCH_POLYNOMIAL, BCH_DEGREE) & 0x7f;
}

export function verifyEcc(header: HeaderBytes, received: number): EccCheck {
	const expected = computeBchEcc(header[0], header[1], header[2]);
	const bitErrors = popcount((expected ^ received) & 0xff);
	return { expected, match: bitErrors === 0, bitErrors };
}

/** Tri-state ECC comparison: `null` when either side is unknown. */
export function eccMatches(expected: number | null, received: number | null): TriState {
	if (expected === null || received === null) return null;
	return expected === received;
}

/**
 * Score candidate generator polynomials against one observed header/ECC pair.
 * Pure: nothing is cached or mutated.
 */
export function testPolynomials(
	header: HeaderBytes,
	received: number,
	candidates: readonly PolynomialCandidate[] = COMMON_BCH_POLYNOMIALS,
): PolynomialTestResult {
	const data = headerWord(header[0], header[1], header[2]);
	const scores = candidates.map((c): PolynomialScore => {
		const degree = c.degree ?? BCH_DEGREE;
		const computed = lfsrRemainder(data, HEADER_BITS, c.polynomial, degree);
		return {
			name: c.name,
			polynomial: c.polynomial,
			degree,
			computed,
			bitErrors: popcount(computed ^ received),
		};
	});

	const ranked = [...scores].sort((a, b) => a.bitErrors - b.bitErrors);
	const best = ranked[0] ?? null;
	return {
		header,
		received,
		ranked,
		best,
		perfect: best !== null && best.bitErrors === 0,
		nearMatches: scores.filter((s) => s.bitErrors > 0 && s.bitErrors < NEAR_MATCH_ERRORS),
	};
}

/** Human-readable form of a generator polynomial, e.g. `x^7 + x^3 + x^2 + 1`. */
export function describePolynomial(polynomial: number): string {
	const terms: string[] = [];
	for (let p = 31; p >= 0; p--) {
		if (Math.floor(polynomial / 2 ** p) % 2 === 0) continue;
		terms.push(p === 0 ? "1" : p === 1 ? "x" : `x^${p}`);
	}
	return terms.length > 0 ? terms.join(" + ") : "0";
}
