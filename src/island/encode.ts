import { computeBchEcc, type HeaderBytes } from "../util/bch.js";
import {
	type Channel,
	GUARD_CODE,
	GUARD_LENGTH,
	HEADER_SAMPLES,
	MAX_SUBPACKETS,
	PREAMBLE_CODE,
	PREAMBLE_LENGTH,
} from "./constants.js";
import { encodeTerc4 } from "./terc4.js";

/** One sub-packet as the decoder sees it: the bytes carried on red, green and blue. */
export type SubpacketChannels = readonly [number, number, number];

export interface PacketContent {
	header: HeaderBytes;
	/** Transmitted ECC byte; computed from the header when omitted. */
	ecc?: number;
	subpackets?: readonly SubpacketChannels[];
}

export interface IslandFrameOptions {
	/** Preamble samples, default 8 */
	preambleLength?: number;
	/** Guard band samples at each end, default 2 */
	guardLength?: number;
}

export interface EncodedSample {
	codes: Record<Channel, number>;
	preamble: boolean;
}

/** 2-bit symbols of one byte over 4 samples, bits 1:0 first. */
export function byteSymbols(byte: number): number[] {
	return Array.from({ length: HEADER_SAMPLES }, (_, i) => (byte >> (i * 2)) & 0x3);
}

function sampleFromSymbols(red: number, green: number, blue: number): EncodedSample {
	return {
		codes: { red: encodeTerc4(red), green: encodeTerc4(green), blue: encodeTerc4(blue) },
		preamble: false,
	};
}

function channelBytesToSamples(bytes: SubpacketChannels): EncodedSample[] {
	const [r, g, b] = bytes.map(byteSymbols);
	return Array.from({ length: HEADER_SAMPLES }, (_, i) =>
		sampleFromSymbols(r?.[i] ?? 0, g?.[i] ?? 0, b?.[i] ?? 0),
	);
}

function constantSamples(code: number, count: number, preamble: boolean): EncodedSample[] {
	return Array.from({ length: count }, () => ({
		codes: { red: code, green: code, blue: code },
		preamble,
	}));
}

/** Header, ECC and payload samples of one packet (no preamble or guards). */
export function encodePacketSamples(content: PacketContent): EncodedSample[] {
	const [hb0, hb1, hb2] = content.header;
	const ecc = content.ecc ?? computeBchEcc(hb0, hb1, hb2);
	const subpackets = content.subpackets ?? [];
	if (subpackets.length > MAX_SUBPACKETS) {
		throw new RangeError(`At most ${MAX_SUBPACKETS} sub-packets, got ${subpackets.length}`);
	}

	return [
		...channelBytesToSamples([hb0, hb1, hb2]),
		...channelBytesToSamples([ecc, 0, 0]),
		...subpackets.flatMap(channelBytesToSamples),
	];
}

/** A complete island: preamble, leading guard, packet, trailing guard. */
export function encodeIslandSamples(
	content: PacketContent,
	options: IslandFrameOptions = {},
): EncodedSample[] {
	const preambleLength = options.preambleLength ?? PREAMBLE_LENGTH;
	const guardLength = options.guardLength ?? GUARD_LENGTH;
	return [
		...constantSamples(PREAMBLE_CODE, preambleLength, true),
		...constantSamples(GUARD_CODE, guardLength, false),
		...encodePacketSamples(content),
		...constantSamples(GUARD_CODE, guardLength, false),
	];
}
