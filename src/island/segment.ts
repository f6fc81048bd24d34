/**
 * Data island segmentation.
 *
 * Two levels:
 *   1. `scanBursts` walks the capture with an idle/active state machine and
 *      yields bounded bursts of island traffic.
 *   2. `splitSegments` divides one burst into preamble, guard bands, header,
 *      ECC and payload.
 */

import type { Bit, Maybe } from "../util/known.js";
import {
	ECC_SAMPLES,
	GUARD_LENGTH,
	HEADER_SAMPLES,
	MAX_ISLAND_SAMPLES,
	PREAMBLE_LENGTH,
} from "./constants.js";
import { type ChannelCodes, isGuardSample } from "./terc4.js";

export interface IslandSample extends ChannelCodes {
	/** Row index in the capture. */
	index: number;
	time: number;
	hCount: Maybe<number>;
	enable: Bit;
	preamble: Bit;
}

/** Per-row signals the segmenter consumes. Optional signals are `null` when not captured. */
export interface IslandSources {
	times: readonly number[];
	/** Island enable; a rising edge starts a burst. */
	enable: readonly Bit[];
	/** Preamble indicator used to size the preamble segment. */
	preamble: readonly Bit[] | null;
	/** Horizontal position counter; a decrease ends the burst. */
	hCounter: readonly Maybe<number>[] | null;
	red: readonly Maybe<number>[];
	green: readonly Maybe<number>[];
	blue: readonly Maybe<number>[];
}

export interface SegmentOptions {
	/** Burst length cap, default 96 */
	maxIslandSamples?: number;
	/** Preamble length used when no indicator marks it, default 8 */
	preambleLength?: number;
	/** Guard band width, default 2 */
	guardLength?: number;
	/**
	 * End a burst when the enable signal falls, default true.
	 * Disable when the enable signal only covers the preamble.
	 */
	endOnFallingEdge?: boolean;
}

export type BurstEnd = "falling-edge" | "counter-wrap" | "length-cap" | "end-of-capture";

export interface Burst {
	samples: IslandSample[];
	endReason: BurstEnd;
}

export const SEGMENT_NAMES = [
	"preamble",
	"leadingGuard",
	"header",
	"ecc",
	"payload",
	"trailingGuard",
] as const;
export type SegmentName = (typeof SEGMENT_NAMES)[number];

export type IslandSegments = Record<SegmentName, IslandSample[]>;

/** How a segment boundary was found: matched pattern, fixed offset, or not at all. */
export type GuardLocation = "pattern" | "offset" | "none";

export interface SegmentLayout {
	segments: IslandSegments;
	preambleSource: "indicator" | "fixed";
	leadingGuard: GuardLocation;
	trailingGuard: GuardLocation;
}

export interface DataIsland extends Burst, SegmentLayout {}

type ScanState =
	| { mode: "idle"; prevEnable: Bit }
	| { mode: "active"; samples: IslandSample[]; prevHCount: Maybe<number> };

function sampleAt(sources: IslandSources, index: number): IslandSample {
	return {
		index,
		time: sources.times[index] ?? index,
		hCount: sources.hCounter?.[index] ?? null,
		enable: sources.enable[index] ?? null,
		preamble: sources.preamble?.[index] ?? null,
		red: sources.red[index] ?? null,
		green: sources.green[index] ?? null,
		blue: sources.blue[index] ?? null,
	};
}

function positiveInteger(value: number, name: string): number {
	if (!Number.isInteger(value) || value <= 0) {
		throw new RangeError(`${name} must be a positive integer, got ${value}`);
	}
	return value;
}

/**
 * Yield the bursts of island traffic in capture order.
 *
 * A burst starts on a rising edge of `enable` and ends on the first of:
 * a falling edge (the low sample is excluded), an h-counter decrease (the
 * wrap sample is excluded and scanned again as a possible new start), the
 * length cap, or the end of the capture.
 */
export function* scanBursts(sources: IslandSources, options: SegmentOptions = {}): Generator<Burst> {
	const cap = positiveInteger(options.maxIslandSamples ?? MAX_ISLAND_SAMPLES, "maxIslandSamples");
	const endOnFallingEdge = options.endOnFallingEdge ?? true;
	const length = sources.enable.length;

	let state: ScanState = { mode: "idle", prevEnable: null };
	let i = 0;

	while (i < length) {
		if (state.mode === "idle") {
			const enable = sources.enable[i] ?? null;
			if (enable === 1 && state.prevEnable !== 1) {
				// Same index is consumed by the active state below.
				state = { mode: "active", samples: [], prevHCount: null };
			} else {
				state = { mode: "idle", prevEnable: enable };
				i++;
			}
			continue;
		}

		const sample = sampleAt(sources, i);

		if (endOnFallingEdge && sample.enable === 0) {
			yield { samples: state.samples, endReason: "falling-edge" };
			state = { mode: "idle", prevEnable: 0 };
			i++;
			continue;
		}

		if (state.prevHCount !== null && sample.hCount !== null && sample.hCount < state.prevHCount) {
			yield { samples: state.samples, endReason: "counter-wrap" };
			// New line: re-arm edge detection and re-examine the wrap sample.
			state = { mode: "idle", prevEnable: null };
			continue;
		}

		state.samples.push(sample);
		state.prevHCount = sample.hCount;
		i++;

		if (state.samples.length >= cap) {
			yield { samples: state.samples, endReason: "length-cap" };
			state = { mode: "idle", prevEnable: sample.enable };
		}
	}

	if (state.mode === "active" && state.samples.length > 0) {
		yield { samples: state.samples, endReason: "end-of-capture" };
	}
}

function locatePreamble(
	samples: readonly IslandSample[],
	fixedLength: number,
): { length: number; source: "indicator" | "fixed" } {
	let length = 0;
	while (length < samples.length && samples[length]?.preamble === 1) length++;
	if (length > 0) return { length, source: "indicator" };
	return { length: Math.min(fixedLength, samples.length), source: "fixed" };
}

function isGuardWindow(window: readonly IslandSample[], guardLength: number): boolean {
	return window.length === guardLength && window.every(isGuardSample);
}

function locateLeadingGuard(
	samples: readonly IslandSample[],
	start: number,
	guardLength: number,
): { guard: IslandSample[]; end: number; location: GuardLocation } {
	if (start >= samples.length) return { guard: [], end: start, location: "none" };

	for (let idx = start; idx + guardLength <= samples.length; idx++) {
		const window = samples.slice(idx, idx + guardLength);
		if (isGuardWindow(window, guardLength)) {
			return { guard: window, end: idx + guardLength, location: "pattern" };
		}
	}

	const end = Math.min(start + guardLength, samples.length);
	return { guard: samples.slice(start, end), end, location: "offset" };
}

function locateTrailingGuard(
	samples: readonly IslandSample[],
	minStart: number,
	guardLength: number,
): { guard: IslandSample[]; start: number; location: GuardLocation } {
	for (let idx = samples.length - guardLength; idx >= minStart; idx--) {
		const window = samples.slice(idx, idx + guardLength);
		if (isGuardWindow(window, guardLength)) {
			return { guard: window, start: idx, location: "pattern" };
		}
	}

	const start = Math.max(samples.length - guardLength, minStart);
	if (start < samples.length) {
		return { guard: samples.slice(start), start, location: "offset" };
	}
	return { guard: [], start: samples.length, location: "none" };
}

/**
 * Divide one burst into its protocol segments.
 *
 * The guard bands are searched by pattern first and fall back to fixed
 * offsets. The trailing guard never reaches into the leading guard or header.
 * Samples skipped by the leading guard search belong to no segment.
 */
export function splitSegments(
	samples: readonly IslandSample[],
	options: SegmentOptions = {},
): SegmentLayout {
	const guardLength = positiveInteger(options.guardLength ?? GUARD_LENGTH, "guardLength");
	const preambleLength = positiveInteger(
		options.preambleLength ?? PREAMBLE_LENGTH,
		"preambleLength",
	);

	const preamble = locatePreamble(samples, preambleLength);
	const leading = locateLeadingGuard(samples, preamble.length, guardLength);
	const dataStart = leading.end;
	const trailing = locateTrailingGuard(
		samples,
		Math.min(dataStart + HEADER_SAMPLES, samples.length),
		guardLength,
	);

	let data: IslandSample[];
	let trailingGuard = trailing.guard;
	let trailingLocation = trailing.location;
	if (trailing.start <= dataStart) {
		data = samples.slice(dataStart);
		trailingGuard = [];
		trailingLocation = "none";
	} else {
		data = samples.slice(dataStart, trailing.start);
	}

	return {
		segments: {
			preamble: samples.slice(0, preamble.length),
			leadingGuard: leading.guard,
			header: data.slice(0, HEADER_SAMPLES),
			ecc: data.slice(HEADER_SAMPLES, HEADER_SAMPLES + ECC_SAMPLES),
			payload: data.slice(HEADER_SAMPLES + ECC_SAMPLES),
			trailingGuard,
		},
		preambleSource: preamble.source,
		leadingGuard: leading.location,
		trailingGuard: trailingLocation,
	};
}

/** Detect every data island in the capture and split it into segments. */
export function segmentIslands(sources: IslandSources, options: SegmentOptions = {}): DataIsland[] {
	const islands: DataIsland[] = [];
	for (const burst of scanBursts(sources, options)) {
		if (burst.samples.length === 0) continue;
		islands.push({ ...burst, ...splitSegments(burst.samples, options) });
	}
	return islands;
}
