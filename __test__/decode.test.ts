import { describe, expect, test } from "vitest";
import { GUARD_CODE, PREAMBLE_CODE, TERC4_CODES } from "../src/island/constants.js";
import {
	acrValue,
	assembleByte,
	classifyAcrN,
	decodeAudioSubpacket,
	decodeIsland,
	decodePayload,
	decodeSubpacket,
	type Packet,
	packetLabel,
	signExtend24,
} from "../src/island/decode.js";
import { encodeIslandSamples, type PacketContent } from "../src/island/encode.js";
import { type IslandSample, segmentIslands } from "../src/island/segment.js";
import { encodeTerc4 } from "../src/island/terc4.js";
import { type CaptureRow, idleRows, islandRows, rowSources } from "./test-capture.js";

/** Row of the first header sample: one idle row, then preamble and leading guard. */
const HEADER_ROW = 11;
const ECC_ROW = HEADER_ROW + 4;

function packetRows(content: PacketContent): CaptureRow[] {
	return [...idleRows(1, 0), ...islandRows(encodeIslandSamples(content), 1), ...idleRows(1, 100)];
}

function decodeRows(rows: readonly CaptureRow[]): Packet {
	const [island] = segmentIslands(rowSources(rows));
	if (!island) throw new Error("no island in rows");
	return decodeIsland(island);
}

function decodeContent(content: PacketContent): Packet {
	return decodeRows(packetRows(content));
}

function withRow(rows: CaptureRow[], index: number, patch: Partial<CaptureRow>): CaptureRow[] {
	return rows.map((row, i) => (i === index ? { ...row, ...patch } : row));
}

function symbolSample(index: number, red: number, green: number, blue: number): IslandSample {
	return {
		index,
		time: index,
		hCount: index,
		enable: 1,
		preamble: 0,
		red: encodeTerc4(red),
		green: encodeTerc4(green),
		blue: encodeTerc4(blue),
	};
}

describe("packet header", () => {
	test("audio sample header with valid ECC", () => {
		const packet = decodeContent({ header: [0x02, 0x00, 0x00] });
		expect(packet.header).toMatchObject({
			hb0: 0x02,
			hb1: 0x00,
			hb2: 0x00,
			complete: true,
			kind: { kind: "audio-sample", code: 0x02 },
			label: "Audio Sample Packet",
		});
		expect(packet.header.nibbles.red).toEqual([2, 0, 0, 0]);
		expect(packet.ecc).toEqual({
			received: 0x67,
			expected: 0x67,
			match: true,
			bitErrors: 0,
			nibbles: [3, 1, 2, 1],
		});
	});

	test.each([
		[0x03, 0x00, 0x00],
		[0x84, 0x01, 0x0d],
		[0xff, 0xff, 0xff],
	])("encoded header %i %i %i decodes with matching ECC", (hb0, hb1, hb2) => {
		const packet = decodeContent({ header: [hb0, hb1, hb2] });
		expect([packet.header.hb0, packet.header.hb1, packet.header.hb2]).toEqual([hb0, hb1, hb2]);
		expect(packet.ecc.match).toBe(true);
	});

	test("corrupted ECC is a mismatch with its bit error count", () => {
		const packet = decodeContent({ header: [0x02, 0x00, 0x00], ecc: 0x66 });
		expect(packet.ecc).toMatchObject({ received: 0x66, expected: 0x67, match: false, bitErrors: 1 });
	});

	test("unknown packet type keeps its code", () => {
		const packet = decodeContent({ header: [0x42, 0x00, 0x00] });
		expect(packet.header.kind).toEqual({ kind: "unknown", code: 0x42 });
		expect(packet.header.label).toBe("Unknown (0x42)");
		expect(packet.payload).toBeNull();
	});

	test("indeterminate header nibble leaves the header incomplete", () => {
		const rows = withRow(packetRows({ header: [0x02, 0x00, 0x00] }), HEADER_ROW, { red: null });
		const packet = decodeRows(rows);
		expect(packet.header).toMatchObject({
			hb0: null,
			hb1: 0x00,
			complete: false,
			kind: null,
			label: "Incomplete header",
		});
		expect(packet.header.nibbles.red).toEqual([null, 0, 0, 0]);
		expect(packet.ecc).toMatchObject({ received: 0x67, expected: null, match: null, bitErrors: null });
		expect(packet.payload).toBeNull();
	});

	test("indeterminate ECC nibble leaves the match undetermined", () => {
		const rows = withRow(packetRows({ header: [0x02, 0x00, 0x00] }), ECC_ROW, { red: null });
		const packet = decodeRows(rows);
		expect(packet.ecc).toMatchObject({ received: null, expected: 0x67, match: null });
	});
});

describe("packet labels", () => {
	test.each([
		[0x00, "Null Packet"],
		[0x01, "Audio Clock Regeneration (ACR)"],
		[0x0d, "Vendor-Specific InfoFrame"],
	])("type %i", (code, label) => {
		expect(decodeContent({ header: [code, 0, 0] }).header.label).toBe(label);
	});

	test("null kind", () => {
		expect(packetLabel(null)).toBe("Incomplete header");
	});
});

describe("payloads", () => {
	test("audio sample sub-packet", () => {
		const packet = decodeContent({ header: [0x02, 0x00, 0x00], subpackets: [[0x01, 0x00, 0x80]] });
		expect(packet.payloadSamples).toHaveLength(4);
		expect(packet.payload).toEqual({
			kind: "audio-sample",
			subpacketCount: 1,
			samples: [{ present: 0x01, left: 98_304, right: 98_304, left16: 384, right16: 384 }],
		});
	});

	test("ACR values and sample rate", () => {
		const packet = decodeContent({
			header: [0x01, 0x00, 0x00],
			subpackets: [
				[0x70, 0x62, 0x00],
				[0x00, 0x18, 0x00],
			],
		});
		expect(packet.payload).toEqual({
			kind: "audio-clock-regeneration",
			cts: 25_200,
			n: 6_144,
			sampleRate: "48 kHz",
		});
	});

	test("ACR without its sub-packets has unknown values", () => {
		const packet = decodeContent({ header: [0x01, 0x00, 0x00] });
		expect(packet.payload).toEqual({
			kind: "audio-clock-regeneration",
			cts: null,
			n: null,
			sampleRate: null,
		});
	});

	test("at most four full sub-packets are read", () => {
		const payload = Array.from({ length: 18 }, (_, i) => symbolSample(i, 0, 0, 0));
		const decoded = decodePayload({ kind: "audio-sample", code: 0x02 }, payload);
		expect(decoded?.kind === "audio-sample" ? decoded.subpacketCount : -1).toBe(4);
	});

	test("partial trailing window is ignored", () => {
		const payload = Array.from({ length: 6 }, (_, i) => symbolSample(i, 0, 0, 0));
		const decoded = decodePayload({ kind: "audio-sample", code: 0x02 }, payload);
		expect(decoded?.kind === "audio-sample" ? decoded.subpacketCount : -1).toBe(1);
	});

	test("other packet types have no decoded payload", () => {
		expect(decodePayload({ kind: "avi-infoframe", code: 0x04 }, [])).toBeNull();
	});
});

describe("audio samples", () => {
	test("negative full-scale left sample", () => {
		expect(decodeAudioSubpacket([0x01, 0x00, 0x00, 0x80, 0x00, 0x00, 0x00])).toEqual({
			present: 1,
			left: -8_388_608,
			right: 0,
			left16: -32_768,
			right16: 0,
		});
	});

	test("minus one and plus one", () => {
		expect(decodeAudioSubpacket([0x01, 0xff, 0xff, 0xff, 0x01, 0x00, 0x00])).toEqual({
			present: 1,
			left: -1,
			right: 1,
			left16: -1,
			right16: 0,
		});
	});

	test("sign extension of 24-bit values", () => {
		expect(signExtend24(0x7fffff)).toBe(8_388_607);
		expect(signExtend24(0x800000)).toBe(-8_388_608);
		expect(signExtend24(0x1000001)).toBe(1);
	});
});

describe("ACR classification", () => {
	test.each([
		[6144, "48 kHz"],
		[6272, "44.1 kHz"],
		[12288, "96 kHz"],
		[5000, "custom"],
	])("N=%i is %s", (n, label) => {
		expect(classifyAcrN(n)).toBe(label);
	});

	test("zero is unclassified", () => {
		expect(classifyAcrN(0)).toBeNull();
	});

	test("20-bit value keeps only the low nibble of the third byte", () => {
		expect(acrValue([0x70, 0x62, 0xf1])).toBe(0x16270);
	});
});

describe("byte assembly", () => {
	test("sample 0 supplies bits 1:0", () => {
		const samples = [
			symbolSample(0, 1, 0, 0),
			symbolSample(1, 2, 0, 0),
			symbolSample(2, 3, 0, 0),
			symbolSample(3, 0, 0, 0),
		];
		expect(assembleByte(samples, "red")).toBe(0x39);
	});

	test("fewer than four samples cannot form a byte", () => {
		expect(assembleByte([symbolSample(0, 1, 0, 0)], "red")).toBeNull();
		expect(decodeSubpacket([symbolSample(0, 1, 0, 0)])).toBeNull();
	});

	test("sub-packet byte k comes from channel k mod 3", () => {
		const samples = Array.from({ length: 4 }, (_, i) => symbolSample(i, 1, 2, 3));
		expect(decodeSubpacket(samples)).toEqual([0x55, 0xaa, 0xff, 0x55, 0xaa, 0xff, 0x55]);
	});
});

describe("island bounds and symbol detail", () => {
	const packet = decodeContent({ header: [0x02, 0x00, 0x00] });

	test("start and end of the island", () => {
		expect(packet.start).toEqual({ index: 1, time: 1, hCount: 1 });
		expect(packet.end).toEqual({ index: 20, time: 20, hCount: 20 });
		expect(packet.totalSamples).toBe(20);
		expect(packet.endReason).toBe("falling-edge");
	});

	test("control codes are checked against the expected pattern", () => {
		expect(packet.segments.preamble[0]?.channels.red).toEqual({
			value: PREAMBLE_CODE,
			decoded: null,
			expected: PREAMBLE_CODE,
			match: true,
		});
		expect(packet.segments.leadingGuard[0]?.channels.green).toEqual({
			value: GUARD_CODE,
			decoded: 8,
			expected: GUARD_CODE,
			match: true,
		});
	});

	test("data symbols are checked against their own re-encoding", () => {
		expect(packet.segments.header[0]?.channels.red).toEqual({
			value: TERC4_CODES[2],
			decoded: 2,
			expected: TERC4_CODES[2],
			match: true,
		});
	});

	test("unknown codes have no expectation", () => {
		const rows = withRow(packetRows({ header: [0x02, 0x00, 0x00] }), HEADER_ROW, { red: null });
		expect(decodeRows(rows).segments.header[0]?.channels.red).toEqual({
			value: null,
			decoded: null,
			expected: null,
			match: null,
		});
	});
});
