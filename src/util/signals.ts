/**
 * Single-column queries over a capture: lookup, transitions, value search.
 */

import { type Capture, rowTime, UNKNOWN_LITERAL } from "./capture.js";
import type { Bit, Maybe } from "./known.js";

export interface Transition<T> {
	time: number;
	from: T;
	to: T;
}

export interface ValueHit {
	time: number;
	value: string;
}

const BIT_SUFFIX = /\[\d+\]$/;

/**
 * Index of the entry naming a signal. Tried in order: exact name, name
 * without a `[bit]` suffix, trailing hierarchy path, then any entry
 * containing it. `-1` when nothing matches.
 */
export function matchSignalName(names: readonly string[], name: string): number {
	const bare = (candidate: string) => candidate.replace(BIT_SUFFIX, "");
	const passes: ((candidate: string) => boolean)[] = [
		(c) => c === name,
		(c) => bare(c) === name,
		(c) => bare(c).endsWith(`/${name}`),
		(c) => c.includes(name),
	];
	for (const pass of passes) {
		const index = names.findIndex(pass);
		if (index >= 0) return index;
	}
	return -1;
}

/** Column index of a signal, see {@link matchSignalName}. */
export function findColumn(columns: readonly string[], name: string): number {
	return matchSignalName(columns, name);
}

/** First candidate name present in the columns, with its index. */
export function findFirstColumn(
	columns: readonly string[],
	names: readonly string[],
): { name: string; column: number } | null {
	for (const name of names) {
		const column = findColumn(columns, name);
		if (column >= 0) return { name, column };
	}
	return null;
}

function cell(row: readonly string[], column: number): string {
	return row[column]?.trim() ?? UNKNOWN_LITERAL;
}

export function toBit(literal: string): Bit {
	if (literal === "1") return 1;
	if (literal === "0") return 0;
	return null;
}

export function columnBits(capture: Capture, column: number): Bit[] {
	return capture.rows.map((row) => toBit(cell(row, column)));
}

/**
 * Every change of a single-bit signal's literal, optionally filtered by the
 * value before and after. `null` if the signal is not in the capture.
 */
export function findTransitions(
	capture: Capture,
	name: string,
	from?: string,
	to?: string,
): Transition<string>[] | null {
	const column = findColumn(capture.columns, name);
	if (column < 0) return null;

	const transitions: Transition<string>[] = [];
	let prev: string | null = null;
	capture.rows.forEach((row, i) => {
		const value = cell(row, column);
		if (prev !== null && value !== prev) {
			if ((from === undefined || prev === from) && (to === undefined || value === to)) {
				transitions.push({ time: rowTime(row, i), from: prev, to: value });
			}
		}
		prev = value;
	});
	return transitions;
}

/** Up to `limit` rows where a signal has the given literal value. */
export function searchValue(
	capture: Capture,
	name: string,
	value: string,
	limit = 10,
): ValueHit[] | null {
	const column = findColumn(capture.columns, name);
	if (column < 0) return null;

	const hits: ValueHit[] = [];
	for (let i = 0; i < capture.rows.length && hits.length < limit; i++) {
		const row = capture.rows[i] ?? [];
		if (row[column] === undefined) continue;
		if (cell(row, column) === value) hits.push({ time: rowTime(row, i), value });
	}
	return hits;
}

/** Changes of a bus value; unknown values neither start nor end a change. */
export function findValueChanges(
	values: readonly Maybe<number>[],
	times: readonly number[],
): Transition<number>[] {
	const changes: Transition<number>[] = [];
	let prev: Maybe<number> = null;
	values.forEach((value, i) => {
		if (value === null) return;
		if (prev !== null && value !== prev) {
			changes.push({ time: times[i] ?? i, from: prev, to: value });
		}
		prev = value;
	});
	return changes;
}
