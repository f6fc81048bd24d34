/**
 * Multi-bit bus reconstruction from per-bit capture columns.
 *
 * The analyzer exports each bus bit as its own column named `<bus>[<bit>]`.
 * Bits are merged per row; one indeterminate (or missing) bit makes the whole
 * bus value unknown.
 */

import { UNKNOWN_LITERAL } from "./capture.js";
import type { Maybe } from "./known.js";

const BUS_COLUMN_PATTERN = /(.+)\[(\d+)\]/;

/** Highest bit position a bus value can carry exactly as a JS number. */
const MAX_BUS_BIT = 52;

export interface BusBit {
	bit: number;
	column: number;
}

export interface BusLayout {
	name: string;
	/** MSB first. */
	bits: BusBit[];
}

export type BusMap = Map<string, Maybe<number>[]>;

/** A bus left out of reconstruction; the rest of the capture is unaffected. */
export interface SkippedBus {
	name: string;
	reason: string;
}

export interface BusLayoutScan {
	layouts: BusLayout[];
	skipped: SkippedBus[];
}

/**
 * Group `<bus>[<bit>]` columns into bus layouts, in order of first appearance.
 * Columns without a bit suffix are single-bit signals and are not returned.
 * A bus with a bit past {@link MAX_BUS_BIT} or a repeated bit position is
 * skipped as a whole.
 */
export function findBusLayouts(columns: readonly string[]): BusLayoutScan {
	const layouts = new Map<string, BusBit[]>();
	const problems = new Map<string, string>();

	columns.forEach((header, column) => {
		const match = BUS_COLUMN_PATTERN.exec(header.trim());
		if (!match) return;
		const name = match[1] ?? "";
		const bit = Number(match[2]);
		if (problems.has(name)) return;

		let bits = layouts.get(name);
		if (!bits) {
			bits = [];
			layouts.set(name, bits);
		}
		if (bit > MAX_BUS_BIT) {
			problems.set(name, `bit ${bit} exceeds ${MAX_BUS_BIT}`);
		} else if (bits.some((b) => b.bit === bit)) {
			problems.set(name, `more than one column for bit ${bit}`);
		} else {
			bits.push({ bit, column });
		}
	});

	return {
		layouts: [...layouts]
			.filter(([name]) => !problems.has(name))
			.map(([name, bits]) => ({ name, bits: bits.sort((a, b) => b.bit - a.bit) })),
		skipped: [...problems].map(([name, reason]) => ({ name, reason })),
	};
}

/** Value of one bus in one row, or `null` if any bit is `X` or missing. */
export function busValue(row: readonly string[], bits: readonly BusBit[]): Maybe<number> {
	let value = 0;
	for (const { bit, column } of bits) {
		const cell = row[column];
		if (cell === undefined) return null;
		const literal = cell.trim();
		if (literal === UNKNOWN_LITERAL) return null;
		if (literal === "1") value += 2 ** bit;
	}
	return value;
}

/** One optional value per row for each laid-out bus. */
export function busesFromLayouts(
	layouts: readonly BusLayout[],
	rows: readonly (readonly string[])[],
): BusMap {
	const buses: BusMap = new Map();
	for (const layout of layouts) {
		buses.set(
			layout.name,
			rows.map((row) => busValue(row, layout.bits)),
		);
	}
	return buses;
}

/**
 * Reconstruct every bus in the capture: one optional value per row.
 * Skipped buses are absent from the map.
 */
export function reconstructBuses(
	columns: readonly string[],
	rows: readonly (readonly string[])[],
): BusMap {
	return busesFromLayouts(findBusLayouts(columns).layouts, rows);
}
