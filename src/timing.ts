/**
 * Raster position of a capture against the 640x480@60 reference timing.
 */

import type { Maybe } from "./util/known.js";

export interface VideoTiming {
	hActive: number;
	hTotal: number;
	vActive: number;
	vTotal: number;
}

/** VESA 640x480@60 Hz, 25.175 MHz pixel clock. */
export const VGA_TIMING: VideoTiming = { hActive: 640, hTotal: 800, vActive: 480, vTotal: 525 };

export interface CounterWraps {
	count: number;
	/** Highest value seen before a wrap, plus one. */
	detectedTotal: Maybe<number>;
}

export interface AxisSummary {
	min: number;
	max: number;
	region: string;
	wraps: CounterWraps;
	/** Reference total disagreeing with the detected one. */
	warning: string | null;
}

export interface TimingSummary {
	timing: VideoTiming;
	horizontal: AxisSummary;
	vertical: AxisSummary | null;
	/** Percentage of one line covered by the captured h range. */
	horizontalCoverage: number;
	/** Whether the capture reaches into a blanking interval, where islands live. */
	inBlanking: boolean;
}

function knownRange(values: readonly Maybe<number>[]): { min: number; max: number } | null {
	let min = Number.POSITIVE_INFINITY;
	let max = Number.NEGATIVE_INFINITY;
	for (const v of values) {
		if (v === null) continue;
		if (v < min) min = v;
		if (v > max) max = v;
	}
	return min <= max ? { min, max } : null;
}

function regionLabel(min: number, max: number, active: number, blanking: string): string {
	if (min >= active) return blanking;
	if (max < active) return "Active Video";
	return `Active Video + ${blanking}`;
}

export function counterWraps(values: readonly Maybe<number>[]): CounterWraps {
	let count = 0;
	let highest: Maybe<number> = null;
	for (let i = 1; i < values.length; i++) {
		const prev = values[i - 1] ?? null;
		const cur = values[i] ?? null;
		if (prev === null || cur === null || cur >= prev) continue;
		count++;
		if (highest === null || prev > highest) highest = prev;
	}
	return { count, detectedTotal: highest === null ? null : highest + 1 };
}

function axisSummary(
	values: readonly Maybe<number>[],
	active: number,
	total: number,
	blanking: string,
): AxisSummary | null {
	const range = knownRange(values);
	if (!range) return null;
	const wraps = counterWraps(values);
	const warning =
		wraps.detectedTotal !== null && wraps.detectedTotal !== total
			? `expected ${total}, got ${wraps.detectedTotal}`
			: null;
	return {
		...range,
		region: regionLabel(range.min, range.max, active, blanking),
		wraps,
		warning,
	};
}

/** `null` when the horizontal counter has no known value. */
export function analyzeTiming(
	hCounts: readonly Maybe<number>[],
	vCounts: readonly Maybe<number>[] | null,
	timing: VideoTiming = VGA_TIMING,
): TimingSummary | null {
	const horizontal = axisSummary(hCounts, timing.hActive, timing.hTotal, "Horizontal Blanking");
	if (!horizontal) return null;
	const vertical = vCounts
		? axisSummary(vCounts, timing.vActive, timing.vTotal, "Vertical Blanking")
		: null;

	return {
		timing,
		horizontal,
		vertical,
		horizontalCoverage: ((horizontal.max - horizontal.min + 1) / timing.hTotal) * 100,
		inBlanking:
			horizontal.max >= timing.hActive || (vertical !== null && vertical.max >= timing.vActive),
	};
}
