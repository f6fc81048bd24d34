/// <reference types="node" />

import { readFileSync } from "node:fs";

/** Literal the analyzer writes for an indeterminate bit. */
export const UNKNOWN_LITERAL = "X";

const TIME_UNIT_MARKER = "time unit:";
const TIME_UNIT_PATTERN = /time unit:\s*(\w+)/;
const FREQUENCY_PATTERN = /^(\d+(?:\.\d+)?)\s*([kmg]?)hz$/i;
const FREQUENCY_SCALE: Record<string, number> = { "": 1, k: 1e3, m: 1e6, g: 1e9 };

export interface Capture {
	/** Unit named on the header line, `null` if absent. */
	timeUnit: string | null;
	/** Header columns; column 0 is the time index. */
	columns: string[];
	/** Raw sample rows as written by the analyzer. */
	rows: string[][];
}

export interface TimeUnit {
	unit: string;
	/** Length of one time index in `unit`. */
	period: number;
}

/**
 * Parse a logic analyzer CSV export.
 *
 * The header is the first line containing `time unit:` (line 0 if no line
 * does). Every following line with more than one field is a sample row.
 */
export function parseCapture(text: string): Capture {
	const lines = text.split(/\r?\n/);
	let headerIndex = lines.findIndex((line) => line.includes(TIME_UNIT_MARKER));
	if (headerIndex < 0) headerIndex = 0;

	const headerLine = (lines[headerIndex] ?? "").trim();
	const columns = headerLine.split(",").map((c) => c.trim());
	const unitMatch = TIME_UNIT_PATTERN.exec(headerLine);

	const rows: string[][] = [];
	for (let i = headerIndex + 1; i < lines.length; i++) {
		const line = lines[i] ?? "";
		if (line.trim() === "") continue;
		const row = line.split(",");
		if (row.length > 1) rows.push(row);
	}

	return { timeUnit: unitMatch?.[1] ?? null, columns, rows };
}

export function readCaptureFile(filePath: string): Capture {
	return parseCapture(readFileSync(filePath, "utf8"));
}

/** Time index of a row; falls back to the row index when column 0 is not an integer. */
export function rowTime(row: readonly string[], index: number): number {
	const value = Number.parseInt((row[0] ?? "").trim(), 10);
	return Number.isNaN(value) ? index : value;
}

export function captureTimes(capture: Capture): number[] {
	return capture.rows.map((row, i) => rowTime(row, i));
}

/**
 * Interpret a time unit override.
 * Plain units pass through; a sample clock frequency (e.g. `25.2mhz`) becomes
 * the matching sample period in ns, us or ms.
 */
export function parseTimeUnit(text: string): TimeUnit {
	const trimmed = text.trim();
	const match = FREQUENCY_PATTERN.exec(trimmed);
	if (!match) {
		if (trimmed === "") throw new Error("Empty time unit");
		return { unit: trimmed, period: 1 };
	}

	const scale = FREQUENCY_SCALE[(match[2] ?? "").toLowerCase()] ?? 1;
	const freq = Number(match[1]) * scale;
	if (!(freq > 0)) throw new Error(`Invalid sample frequency: ${text}`);

	const period = 1 / freq;
	if (period < 1e-6) return { unit: "ns", period: period * 1e9 };
	if (period < 1e-3) return { unit: "us", period: period * 1e6 };
	return { unit: "ms", period: period * 1e3 };
}
