import { computeBchEcc, eccMatches } from "../util/bch.js";
import { hex } from "../util/hex.js";
import { compareKnown, type Maybe, popcount, type TriState } from "../util/known.js";
import {
	ACR_SAMPLE_RATES,
	CHANNELS,
	type Channel,
	GUARD_CODE,
	HEADER_SAMPLES,
	type KnownPacketKind,
	MAX_SUBPACKETS,
	PACKET_TYPES,
	PREAMBLE_CODE,
	SUBPACKET_BYTES,
	SUBPACKET_SAMPLES,
} from "./constants.js";
import {
	type BurstEnd,
	type DataIsland,
	type IslandSample,
	type SegmentName,
} from "./segment.js";
import { type ChannelCodes, decodeTerc4, encodeTerc4 } from "./terc4.js";

export type PacketKind = { kind: KnownPacketKind; code: number } | { kind: "unknown"; code: number };

export interface ChannelSymbol {
	value: Maybe<number>;
	decoded: Maybe<number>;
	expected: Maybe<number>;
	match: TriState;
}

export interface SymbolEntry {
	index: number;
	time: number;
	hCount: Maybe<number>;
	channels: Record<Channel, ChannelSymbol>;
}

export interface PacketHeader {
	hb0: Maybe<number>;
	hb1: Maybe<number>;
	hb2: Maybe<number>;
	/** All three bytes assembled from known nibbles. */
	complete: boolean;
	/** Resolved only for a complete header. */
	kind: PacketKind | null;
	label: string;
	nibbles: Record<Channel, Maybe<number>[]>;
}

export interface EccResult {
	received: Maybe<number>;
	/** Computed only when the header is complete. */
	expected: Maybe<number>;
	match: TriState;
	bitErrors: Maybe<number>;
	nibbles: Maybe<number>[];
}

export interface AudioSubpacket {
	present: number;
	/** 24-bit PCM, sign-extended. */
	left: number;
	right: number;
	/** Upper 16 bits of the 24-bit samples, signed. */
	left16: number;
	right16: number;
}

export interface AudioSamplePayload {
	kind: "audio-sample";
	subpacketCount: number;
	/** `null` where a sub-packet has an unknown nibble. */
	samples: Maybe<AudioSubpacket>[];
}

export interface AcrPayload {
	kind: "audio-clock-regeneration";
	cts: Maybe<number>;
	n: Maybe<number>;
	sampleRate: Maybe<string>;
}

export type PacketPayload = AudioSamplePayload | AcrPayload;

export interface SamplePosition {
	index: number;
	time: number;
	hCount: Maybe<number>;
}

export interface Packet {
	start: SamplePosition;
	end: SamplePosition;
	totalSamples: number;
	endReason: BurstEnd;
	header: PacketHeader;
	ecc: EccResult;
	payloadSamples: IslandSample[];
	payload: PacketPayload | null;
	segments: Record<SegmentName, SymbolEntry[]>;
}

const PACKET_TYPE_TABLE: ReadonlyMap<number, { kind: KnownPacketKind; label: string }> = new Map(
	Object.entries(PACKET_TYPES).map(([code, type]) => [Number(code), type] as const),
);

export function packetKindFor(code: number): PacketKind {
	const known = PACKET_TYPE_TABLE.get(code);
	return known ? { kind: known.kind, code } : { kind: "unknown", code };
}

export function packetLabel(kind: PacketKind | null): string {
	if (kind === null) return "Incomplete header";
	if (kind.kind === "unknown") return `Unknown (${hex(kind.code, 2)})`;
	return PACKET_TYPE_TABLE.get(kind.code)?.label ?? `Unknown (${hex(kind.code, 2)})`;
}

/**
 * Assemble one byte from the 2 low bits of a channel's symbols over 4
 * consecutive samples, sample 0 in bits 1:0. `null` if any symbol is unknown.
 */
export function assembleByte(samples: readonly ChannelCodes[], channel: Channel): Maybe<number> {
	if (samples.length < HEADER_SAMPLES) return null;
	let value = 0;
	for (let i = 0; i < HEADER_SAMPLES; i++) {
		const sample = samples[i];
		const nibble = sample ? decodeTerc4(sample[channel]) : null;
		if (nibble === null) return null;
		value |= (nibble & 0x3) << (i * 2);
	}
	return value;
}

function channelNibbles(samples: readonly ChannelCodes[], channel: Channel): Maybe<number>[] {
	return samples.slice(0, HEADER_SAMPLES).map((s) => decodeTerc4(s[channel]));
}

export function decodePacketHeader(samples: readonly ChannelCodes[]): PacketHeader {
	const hb0 = assembleByte(samples, "red");
	const hb1 = assembleByte(samples, "green");
	const hb2 = assembleByte(samples, "blue");
	const complete = hb0 !== null && hb1 !== null && hb2 !== null;
	const kind = complete ? packetKindFor(hb0) : null;

	return {
		hb0,
		hb1,
		hb2,
		complete,
		kind,
		label: packetLabel(kind),
		nibbles: {
			red: channelNibbles(samples, "red"),
			green: channelNibbles(samples, "green"),
			blue: channelNibbles(samples, "blue"),
		},
	};
}

export function decodeEcc(samples: readonly ChannelCodes[], header: PacketHeader): EccResult {
	const received = assembleByte(samples, "red");
	const expected =
		header.hb0 !== null && header.hb1 !== null && header.hb2 !== null
			? computeBchEcc(header.hb0, header.hb1, header.hb2)
			: null;

	return {
		received,
		expected,
		match: eccMatches(expected, received),
		bitErrors: expected !== null && received !== null ? popcount(expected ^ received) : null,
		nibbles: channelNibbles(samples, "red"),
	};
}

/**
 * Decode a 4-sample sub-packet into 7 bytes; byte k is carried on channel
 * k % 3 (red, green, blue).
 */
export function decodeSubpacket(samples: readonly ChannelCodes[]): Maybe<number[]> {
	if (samples.length < SUBPACKET_SAMPLES) return null;
	const bytes: number[] = [];
	for (let k = 0; k < SUBPACKET_BYTES; k++) {
		const byte = assembleByte(samples, CHANNELS[k % CHANNELS.length] ?? "red");
		if (byte === null) return null;
		bytes.push(byte);
	}
	return bytes;
}

export function signExtend24(value: number): number {
	const v = value & 0xffffff;
	return v & 0x800000 ? v - 0x1000000 : v;
}

function byteAt(bytes: readonly number[], i: number): number {
	return (bytes[i] ?? 0) & 0xff;
}

/** Interpret sub-packet bytes: SB0 sample present, SB1-3 left, SB4-6 right (little-endian). */
export function decodeAudioSubpacket(bytes: readonly number[]): AudioSubpacket {
	const left = signExtend24(byteAt(bytes, 1) | (byteAt(bytes, 2) << 8) | (byteAt(bytes, 3) << 16));
	const right = signExtend24(byteAt(bytes, 4) | (byteAt(bytes, 5) << 8) | (byteAt(bytes, 6) << 16));
	return {
		present: byteAt(bytes, 0),
		left,
		right,
		left16: left >> 8,
		right16: right >> 8,
	};
}

/** 20-bit CTS or N value from the first three bytes of a sub-packet. */
export function acrValue(bytes: readonly number[]): number {
	return byteAt(bytes, 0) | (byteAt(bytes, 1) << 8) | ((byteAt(bytes, 2) & 0x0f) << 16);
}

export function classifyAcrN(n: number): Maybe<string> {
	const known = ACR_SAMPLE_RATES.find((r) => r.n === n);
	if (known) return known.label;
	return n > 0 ? "custom" : null;
}

function subpacketWindows(payload: readonly IslandSample[]): IslandSample[][] {
	const count = Math.min(Math.floor(payload.length / SUBPACKET_SAMPLES), MAX_SUBPACKETS);
	return Array.from({ length: count }, (_, i) =>
		payload.slice(i * SUBPACKET_SAMPLES, (i + 1) * SUBPACKET_SAMPLES),
	);
}

export function decodePayload(kind: PacketKind, payload: readonly IslandSample[]): PacketPayload | null {
	switch (kind.kind) {
		case "audio-sample": {
			const windows = subpacketWindows(payload);
			return {
				kind: "audio-sample",
				subpacketCount: windows.length,
				samples: windows.map((w) => {
					const bytes = decodeSubpacket(w);
					return bytes ? decodeAudioSubpacket(bytes) : null;
				}),
			};
		}
		case "audio-clock-regeneration": {
			const ctsBytes = decodeSubpacket(payload.slice(0, SUBPACKET_SAMPLES));
			const nBytes = decodeSubpacket(payload.slice(SUBPACKET_SAMPLES, 2 * SUBPACKET_SAMPLES));
			const n = nBytes ? acrValue(nBytes) : null;
			return {
				kind: "audio-clock-regeneration",
				cts: ctsBytes ? acrValue(ctsBytes) : null,
				n,
				sampleRate: n !== null ? classifyAcrN(n) : null,
			};
		}
		default:
			return null;
	}
}

function expectedCode(segment: SegmentName, decoded: Maybe<number>): Maybe<number> {
	switch (segment) {
		case "preamble":
			return PREAMBLE_CODE;
		case "leadingGuard":
		case "trailingGuard":
			return GUARD_CODE;
		default:
			return decoded !== null ? encodeTerc4(decoded) : null;
	}
}

export function symbolEntries(samples: readonly IslandSample[], segment: SegmentName): SymbolEntry[] {
	const symbol = (value: Maybe<number>): ChannelSymbol => {
		const decoded = decodeTerc4(value);
		const expected = expectedCode(segment, decoded);
		return { value, decoded, expected, match: compareKnown(value, expected) };
	};
	return samples.map((sample) => ({
		index: sample.index,
		time: sample.time,
		hCount: sample.hCount,
		channels: {
			red: symbol(sample.red),
			green: symbol(sample.green),
			blue: symbol(sample.blue),
		},
	}));
}

function positionOf(sample: IslandSample | undefined): SamplePosition {
	return { index: sample?.index ?? -1, time: sample?.time ?? -1, hCount: sample?.hCount ?? null };
}

/** Decode one segmented data island into a packet record. */
export function decodeIsland(island: DataIsland): Packet {
	const { segments } = island;
	const header = decodePacketHeader(segments.header);
	const ecc = decodeEcc(segments.ecc, header);
	const payload = header.kind ? decodePayload(header.kind, segments.payload) : null;

	return {
		start: positionOf(island.samples[0]),
		end: positionOf(island.samples[island.samples.length - 1]),
		totalSamples: island.samples.length,
		endReason: island.endReason,
		header,
		ecc,
		payloadSamples: segments.payload,
		payload,
		segments: {
			preamble: symbolEntries(segments.preamble, "preamble"),
			leadingGuard: symbolEntries(segments.leadingGuard, "leadingGuard"),
			header: symbolEntries(segments.header, "header"),
			ecc: symbolEntries(segments.ecc, "ecc"),
			payload: symbolEntries(segments.payload, "payload"),
			trailingGuard: symbolEntries(segments.trailingGuard, "trailingGuard"),
		},
	};
}
