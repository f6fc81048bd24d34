/** HDMI data island constants (HDMI 1.4 section 5.2.3 and 5.3). */

/** TERC4: 4-bit symbol -> 10-bit TMDS code, indexed by symbol. */
export const TERC4_CODES = [
	0b1010011100, 0b1001100011, 0b1011100100, 0b1011100010, 0b0101110001, 0b0100011110,
	0b0110001110, 0b0100111100, 0b1011001100, 0b0100111001, 0b0110011100, 0b1011000110,
	0b1010001110, 0b1001110001, 0b0101100011, 0b1011000011,
] as const;

/** Data island preamble control code, identical on all three channels. */
export const PREAMBLE_CODE = 0b1101010100;

/** Data island guard band code, identical on all three channels. */
export const GUARD_CODE = 0b1011001100;

export const CHANNELS = ["red", "green", "blue"] as const;
export type Channel = (typeof CHANNELS)[number];

export const PREAMBLE_LENGTH = 8;
export const GUARD_LENGTH = 2;
export const HEADER_SAMPLES = 4;
export const ECC_SAMPLES = 4;
export const SUBPACKET_SAMPLES = 4;
export const MAX_SUBPACKETS = 4;
export const SUBPACKET_BYTES = 7;

/** Safety cap on burst length: preamble + guards + one full packet, with margin. */
export const MAX_ISLAND_SAMPLES = 96;

/** BCH(31,24) generator x^7 + x^3 + x^2 + 1, leading term included. */
export const BCH_POLYNOMIAL = 0x8d;
export const BCH_DEGREE = 7;

export const PACKET_TYPES = {
	0x00: { kind: "null", label: "Null Packet" },
	0x01: { kind: "audio-clock-regeneration", label: "Audio Clock Regeneration (ACR)" },
	0x02: { kind: "audio-sample", label: "Audio Sample Packet" },
	0x03: { kind: "general-control", label: "General Control Packet" },
	0x04: { kind: "avi-infoframe", label: "AVI InfoFrame" },
	0x05: { kind: "spd-infoframe", label: "Source Product Description InfoFrame" },
	0x06: { kind: "audio-infoframe", label: "Audio InfoFrame" },
	0x07: { kind: "mpeg-infoframe", label: "MPEG Source InfoFrame" },
	0x0a: { kind: "gamut-metadata", label: "Gamut Metadata Packet" },
	0x0d: { kind: "vendor-infoframe", label: "Vendor-Specific InfoFrame" },
} as const;

export type KnownPacketKind = (typeof PACKET_TYPES)[keyof typeof PACKET_TYPES]["kind"];

/** ACR N values for the common audio sample rates at a 25.2 MHz TMDS clock. */
export const ACR_SAMPLE_RATES = [
	{ n: 6144, label: "48 kHz" },
	{ n: 6272, label: "44.1 kHz" },
	{ n: 12288, label: "96 kHz" },
] as const;

export interface PolynomialCandidate {
	name: string;
	/** Generator polynomial with the leading x^degree term. */
	polynomial: number;
	degree?: number;
}

/**
 * Degree-7 generators worth trying when a capture disagrees with the standard ECC.
 * Every lower term taps the register, x^6 included, so the x^6 entries give a
 * different ECC than a register that only taps x^0..x^5.
 */
export const COMMON_BCH_POLYNOMIALS: readonly PolynomialCandidate[] = [
	{ name: "x^7 + x + 1", polynomial: 0b10000011 },
	{ name: "x^7 + x^3 + x^2 + 1", polynomial: 0b10001101 },
	{ name: "x^7 + x^6 + 1", polynomial: 0b11000001 },
	{ name: "x^7 + x^6 + x^5 + x^4 + x^2 + x + 1", polynomial: 0b11110111 },
	{ name: "x^7 + x^6 + x^3 + x + 1", polynomial: 0b11001011 },
	{ name: "x^7 + x^4 + x^3 + x^2 + 1", polynomial: 0b10011101 },
	{ name: "x^7 + x^5 + x^4 + x^3 + x^2 + x + 1", polynomial: 0b10111111 },
	{ name: "x^7 + x^3 + 1", polynomial: 0b10001001 },
	{ name: "x^7 + x^4 + 1", polynomial: 0b10010001 },
	{ name: "x^7 + x^5 + x^3 + x^2 + 1", polynomial: 0b10101101 },
];
