import type { EncodedSample } from "../src/island/encode.js";
import type { IslandSources } from "../src/island/segment.js";
import type { Bit, Maybe } from "../src/util/known.js";

/** TMDS control code for blanking with HSYNC/VSYNC low; never a TERC4 or guard code. */
export const IDLE_CODE = 0b0010101011;

export const CHANNEL_WIDTH = 10;
export const COUNTER_WIDTH = 10;

export interface CaptureRow {
	enable: Bit;
	preamble: Bit;
	hCount: Maybe<number>;
	red: Maybe<number>;
	green: Maybe<number>;
	blue: Maybe<number>;
}

export function idleRows(count: number, firstH: number): CaptureRow[] {
	return Array.from({ length: count }, (_, i) => ({
		enable: 0,
		preamble: 0,
		hCount: firstH + i,
		red: IDLE_CODE,
		green: IDLE_CODE,
		blue: IDLE_CODE,
	}));
}

/** Island rows with enable held high; the preamble flag follows the encoder. */
export function islandRows(samples: readonly EncodedSample[], firstH: number): CaptureRow[] {
	return samples.map((s, i) => ({
		enable: 1,
		preamble: s.preamble ? 1 : 0,
		hCount: firstH + i,
		red: s.codes.red,
		green: s.codes.green,
		blue: s.codes.blue,
	}));
}

function bitHeaders(name: string, width: number): string[] {
	return Array.from({ length: width }, (_, i) => `${name}[${width - 1 - i}]`);
}

function bitCells(value: Maybe<number>, width: number): string[] {
	return Array.from({ length: width }, (_, i) =>
		value === null ? "X" : String((value >> (width - 1 - i)) & 1),
	);
}

function bitCell(bit: Bit): string {
	return bit === null ? "X" : String(bit);
}

export const CAPTURE_COLUMNS = [
	"Time(time unit: ns)",
	"u_hdmi/data_island_enable",
	"preamble_active",
	...bitHeaders("horizontal_counter", COUNTER_WIDTH),
	...bitHeaders("tmds_encoded_red", CHANNEL_WIDTH),
	...bitHeaders("tmds_encoded_green", CHANNEL_WIDTH),
	...bitHeaders("tmds_encoded_blue", CHANNEL_WIDTH),
];

/** Analyzer-style CSV export of the rows; time index equals the row index. */
export function captureCsv(rows: readonly CaptureRow[]): string {
	const lines = [CAPTURE_COLUMNS.join(",")];
	rows.forEach((row, i) => {
		lines.push(
			[
				String(i),
				bitCell(row.enable),
				bitCell(row.preamble),
				...bitCells(row.hCount, COUNTER_WIDTH),
				...bitCells(row.red, CHANNEL_WIDTH),
				...bitCells(row.green, CHANNEL_WIDTH),
				...bitCells(row.blue, CHANNEL_WIDTH),
			].join(","),
		);
	});
	return `${lines.join("\n")}\n`;
}

/** Segmenter input for the rows, bypassing the CSV layer. */
export function rowSources(rows: readonly CaptureRow[]): IslandSources {
	return {
		times: rows.map((_, i) => i),
		enable: rows.map((r) => r.enable),
		preamble: rows.map((r) => r.preamble),
		hCounter: rows.map((r) => r.hCount),
		red: rows.map((r) => r.red),
		green: rows.map((r) => r.green),
		blue: rows.map((r) => r.blue),
	};
}
