import { describe, expect, test } from "vitest";
import {
	analyzeCapture,
	DEFAULT_SIGNAL_NAMES,
	findBus,
	findPolynomialSample,
	resolveIslandSources,
	signalActivity,
} from "../src/analyze.js";
import { encodeIslandSamples } from "../src/island/encode.js";
import { reconstructBuses } from "../src/util/bus.js";
import { parseCapture } from "../src/util/capture.js";
import { captureCsv, idleRows, islandRows } from "./test-capture.js";

const AUDIO = encodeIslandSamples({ header: [0x02, 0x00, 0x00], subpackets: [[0x01, 0x00, 0x80]] });
const ACR = encodeIslandSamples({
	header: [0x01, 0x00, 0x00],
	subpackets: [
		[0x70, 0x62, 0x00],
		[0x00, 0x18, 0x00],
	],
});

/** Rows 0-1 idle, audio island at 2-25, idle 26, ACR island at 27-54, idle 55. */
const twoIslands = parseCapture(
	captureCsv([
		...idleRows(2, 636),
		...islandRows(AUDIO, 638),
		...idleRows(1, 662),
		...islandRows(ACR, 663),
		...idleRows(1, 691),
	]),
);

describe("analyzeCapture", () => {
	const analysis = analyzeCapture(twoIslands);

	test("reconstructs the capture's buses", () => {
		expect(analysis.rowCount).toBe(56);
		expect([...analysis.buses.keys()]).toEqual([
			"horizontal_counter",
			"tmds_encoded_red",
			"tmds_encoded_green",
			"tmds_encoded_blue",
		]);
	});

	test("finds and decodes both islands", () => {
		expect(analysis.unavailable).toEqual([]);
		expect(analysis.islands).toHaveLength(2);
		expect(analysis.packets.map((p) => p.header.label)).toEqual([
			"Audio Sample Packet",
			"Audio Clock Regeneration (ACR)",
		]);
		expect(analysis.packets.map((p) => p.start.index)).toEqual([2, 27]);
		expect(analysis.packets.every((p) => p.ecc.match === true)).toBe(true);
	});

	test("decodes the ACR payload", () => {
		expect(analysis.packets[1]?.payload).toEqual({
			kind: "audio-clock-regeneration",
			cts: 25_200,
			n: 6_144,
			sampleRate: "48 kHz",
		});
	});

	test("places the capture on the raster", () => {
		expect(analysis.timing?.horizontal.min).toBe(636);
		expect(analysis.timing?.horizontal.max).toBe(691);
		expect(analysis.timing?.horizontal.region).toBe("Active Video + Horizontal Blanking");
		expect(analysis.timing?.vertical).toBeNull();
	});

	test("control signals absent from the capture are reported as such", () => {
		expect(analysis.activity).toEqual({ hsyncEdges: null, vsyncEdges: null, stateChanges: null });
	});

	test("every call starts from scratch", () => {
		const again = analyzeCapture(twoIslands);
		expect(again.packets).toEqual(analysis.packets);
		expect(again.packets[0]).not.toBe(analysis.packets[0]);
	});

	test("missing island signals are listed", () => {
		const result = analyzeCapture(parseCapture("Time,sig\n0,1\n1,0\n"));
		expect(result.unavailable).toEqual(["enable", "red", "green", "blue"]);
		expect(result.packets).toEqual([]);
		expect(result.timing).toBeNull();
	});

	test("preamble flag used as the enable does not end the island", () => {
		const capture = parseCapture(
			captureCsv([
				...idleRows(2, 600),
				...islandRows(encodeIslandSamples({ header: [0x02, 0x00, 0x00] }), 602),
				...idleRows(3, 622),
			]),
		);
		const result = analyzeCapture(capture, { signals: { enable: ["preamble_active"] } });
		expect(result.packets).toHaveLength(1);
		expect(result.packets[0]?.endReason).toBe("end-of-capture");
		expect(result.packets[0]?.totalSamples).toBe(23);
		expect(result.packets[0]?.header.label).toBe("Audio Sample Packet");
		expect(result.packets[0]?.ecc.match).toBe(true);
	});

	test("buses that cannot be reconstructed are skipped without stopping the decode", () => {
		const csv = captureCsv([
			...idleRows(1, 639),
			...islandRows(encodeIslandSamples({ header: [0x02, 0x00, 0x00] }), 640),
			...idleRows(1, 660),
		]);
		const [header = "", ...rows] = csv.trimEnd().split("\n");
		const widened = [
			`${header},debug_timestamp[60],u_dbg/flags[0],u_dbg/flags[0]`,
			...rows.map((row) => `${row},0,0,1`),
		].join("\n");

		const result = analyzeCapture(parseCapture(widened));
		expect(result.skippedBuses).toEqual([
			{ name: "debug_timestamp", reason: "bit 60 exceeds 52" },
			{ name: "u_dbg/flags", reason: "more than one column for bit 0" },
		]);
		expect(result.buses.size).toBe(4);
		expect(result.unavailable).toEqual([]);
		expect(result.packets).toHaveLength(1);
		expect(result.packets[0]?.header.label).toBe("Audio Sample Packet");
		expect(result.packets[0]?.ecc.match).toBe(true);
	});

	test("island length cap is configurable", () => {
		const result = analyzeCapture(twoIslands, { segment: { maxIslandSamples: 12 } });
		expect(result.islands.map((i) => i.endReason)).toEqual(["length-cap", "length-cap"]);
		expect(result.packets[0]?.header.complete).toBe(false);
	});
});

describe("resolveIslandSources", () => {
	test("separate enable and preamble columns keep falling-edge termination", () => {
		const buses = reconstructBuses(twoIslands.columns, twoIslands.rows);
		const resolution = resolveIslandSources(twoIslands, buses);
		expect(resolution.status).toBe("ok");
		if (resolution.status === "ok") {
			expect(resolution.segment.endOnFallingEdge).toBeUndefined();
			expect(resolution.sources.enable).toHaveLength(56);
		}
	});

	test("shared enable and preamble column disables falling-edge termination", () => {
		const buses = reconstructBuses(twoIslands.columns, twoIslands.rows);
		const resolution = resolveIslandSources(
			twoIslands,
			buses,
			{ ...DEFAULT_SIGNAL_NAMES, enable: ["preamble_active"] },
			{ maxIslandSamples: 40 },
		);
		expect(resolution.status === "ok" ? resolution.segment : null).toEqual({
			maxIslandSamples: 40,
			endOnFallingEdge: false,
		});
	});
});

describe("findBus", () => {
	test("exact name first, then substring", () => {
		const buses = new Map([
			["u_pattern/h_count", [1, 2]],
			["h_count", [3, 4]],
		]);
		expect(findBus(buses, ["h_count"])).toEqual([3, 4]);
		expect(findBus(buses, ["pattern/h"])).toEqual([1, 2]);
		expect(findBus(buses, ["v_count"])).toBeNull();
	});

	test("a whole hierarchy segment beats a longer name containing it", () => {
		const buses = new Map([
			["u_pattern/h_count_next", [9]],
			["top/u_pattern/h_count", [1]],
		]);
		expect(findBus(buses, ["u_pattern/h_count"])).toEqual([1]);
		expect(findBus(buses, ["h_count_n"])).toEqual([9]);
	});
});

describe("signalActivity", () => {
	test("sync edges and state changes", () => {
		const capture = parseCapture(
			[
				"Time,video_hsync,u_hdmi/debug_state[1],u_hdmi/debug_state[0]",
				"0,0,0,0",
				"1,1,0,1",
				"2,0,1,0",
				"3,1,1,0",
			].join("\n"),
		);
		const activity = signalActivity(capture, reconstructBuses(capture.columns, capture.rows));
		expect(activity.hsyncEdges?.map((e) => e.time)).toEqual([1, 3]);
		expect(activity.vsyncEdges).toBeNull();
		expect(activity.stateChanges).toEqual([
			{ time: 1, from: 0, to: 1 },
			{ time: 2, from: 1, to: 2 },
		]);
	});
});

describe("findPolynomialSample", () => {
	test("first packet with a complete header and known ECC", () => {
		const sample = findPolynomialSample(analyzeCapture(twoIslands).packets);
		expect(sample?.header).toEqual([0x02, 0x00, 0x00]);
		expect(sample?.received).toBe(0x67);
		expect(sample?.packet.start.index).toBe(2);
	});

	test("none without packets", () => {
		expect(findPolynomialSample([])).toBeNull();
	});
});
