/**
 * Plain-text rendering of an analysis. Every function returns lines; the
 * caller decides where they go.
 */

import type { CaptureAnalysis } from "./analyze.js";
import { type PolynomialTestResult, describePolynomial } from "./util/bch.js";
import type { TimeUnit } from "./util/capture.js";
import { hex, hexOrUnknown } from "./util/hex.js";
import type { Maybe, TriState } from "./util/known.js";
import { CHANNELS } from "./island/constants.js";
import type { ChannelSymbol, Packet, PacketPayload, SymbolEntry } from "./island/decode.js";
import { SEGMENT_NAMES, type SegmentName } from "./island/segment.js";
import type { AxisSummary, TimingSummary } from "./timing.js";

export interface ReportOptions {
	/** Shown on the source line, usually the capture path. */
	source: string;
	/** Unit applied to time indices, default `samples` with period 1 */
	timeUnit?: TimeUnit;
}

const SEGMENT_TITLES: Record<SegmentName, string> = {
	preamble: "Preamble",
	leadingGuard: "Leading guard",
	header: "Header",
	ecc: "ECC",
	payload: "Payload",
	trailingGuard: "Trailing guard",
};

const CHANNEL_LETTERS = { red: "R", green: "G", blue: "B" } as const;

export function formatTime(time: number, unit: TimeUnit): string {
	if (unit.period === 1) return `${time} ${unit.unit}`;
	return `${Number((time * unit.period).toFixed(3))} ${unit.unit}`;
}

function matchLabel(match: TriState): string {
	if (match === null) return "?";
	return match ? "OK" : "BAD";
}

/** One channel of one sample, e.g. `R:0x2AC/0x2AC OK nib:0x2`. */
export function formatChannelSymbol(letter: string, symbol: ChannelSymbol): string {
	const value = hexOrUnknown(symbol.value, 3, "X");
	const expected = hexOrUnknown(symbol.expected, 3);
	return `${letter}:${value}/${expected} ${matchLabel(symbol.match)} nib:${hexOrUnknown(symbol.decoded, 1)}`;
}

function formatSymbolEntry(entry: SymbolEntry, unit: TimeUnit): string {
	const h = entry.hCount === null ? "?" : String(entry.hCount);
	const channels = CHANNELS.map((c) => formatChannelSymbol(CHANNEL_LETTERS[c], entry.channels[c]));
	return `    [${entry.index}] t=${formatTime(entry.time, unit)} H=${h}  ${channels.join("  ")}`;
}

function formatAxis(label: string, axis: AxisSummary): string[] {
	const lines = [`  ${label} range: ${axis.min}-${axis.max} (${axis.region})`];
	if (axis.wraps.count > 0) {
		lines.push(`  ${label} wraps: ${axis.wraps.count} (detected total ${axis.wraps.detectedTotal ?? "?"})`);
	}
	if (axis.warning) lines.push(`  Warning: ${label} total ${axis.warning}`);
	return lines;
}

export function formatTiming(timing: TimingSummary | null): string[] {
	if (!timing) return ["Timing: no horizontal counter"];
	const { hActive, vActive } = timing.timing;
	const lines = [`Timing (${hActive}x${vActive} reference):`];
	lines.push(...formatAxis("H", timing.horizontal));
	lines.push(`  H coverage: ${timing.horizontalCoverage.toFixed(1)}% of a line`);
	if (timing.vertical) lines.push(...formatAxis("V", timing.vertical));
	lines.push(`  In blanking: ${timing.inBlanking ? "yes" : "no"}`);
	return lines;
}

function formatActivity(analysis: CaptureAnalysis): string[] {
	const { hsyncEdges, vsyncEdges, stateChanges } = analysis.activity;
	const count = (edges: readonly unknown[] | null) => (edges ? String(edges.length) : "not captured");
	return [
		`HSYNC rising edges: ${count(hsyncEdges)}`,
		`VSYNC rising edges: ${count(vsyncEdges)}`,
		`State changes: ${count(stateChanges)}`,
	];
}

/** Packet counts by type label, in order of first appearance. */
export function packetSummary(packets: readonly Packet[]): Map<string, number> {
	const counts = new Map<string, number>();
	for (const p of packets) counts.set(p.header.label, (counts.get(p.header.label) ?? 0) + 1);
	return counts;
}

function formatEcc(packet: Packet): string {
	const { received, expected, match, bitErrors } = packet.ecc;
	const status =
		match === null ? "UNKNOWN" : match ? "OK" : `MISMATCH (${bitErrors ?? "?"} bit errors)`;
	return `  ECC: received ${hexOrUnknown(received, 2)}, expected ${hexOrUnknown(expected, 2)}, ${status}`;
}

export function formatPayload(payload: PacketPayload | null): string[] {
	if (!payload) return [];
	if (payload.kind === "audio-clock-regeneration") {
		const n = payload.n === null ? "?" : String(payload.n);
		const cts = payload.cts === null ? "?" : String(payload.cts);
		const rate = payload.sampleRate ? ` (${payload.sampleRate})` : "";
		return [`  ACR: CTS=${cts} N=${n}${rate}`];
	}

	const lines = [`  Audio: ${payload.subpacketCount} sub-packet(s)`];
	payload.samples.forEach((s, i) => {
		if (!s) {
			lines.push(`    SP${i}: unknown`);
			return;
		}
		lines.push(
			`    SP${i}: present=${hex(s.present, 2)} L=${s.left} R=${s.right} (L16=${s.left16} R16=${s.right16})`,
		);
	});
	return lines;
}

function byteOrUnknown(value: Maybe<number>): string {
	return hexOrUnknown(value, 2, "??");
}

export function formatPacket(packet: Packet, number: number, unit: TimeUnit): string[] {
	const { start, end, header } = packet;
	const h = (v: Maybe<number>) => (v === null ? "?" : String(v));
	const lines = [
		`Packet ${number}: rows ${start.index}-${end.index} (${packet.totalSamples} samples), H ${h(start.hCount)}-${h(end.hCount)}, ended by ${packet.endReason}`,
		`  Start: ${formatTime(start.time, unit)}`,
		`  Type: ${header.label} (HB0=${byteOrUnknown(header.hb0)} HB1=${byteOrUnknown(header.hb1)} HB2=${byteOrUnknown(header.hb2)})`,
		formatEcc(packet),
		...formatPayload(packet.payload),
	];

	for (const name of SEGMENT_NAMES) {
		const entries = packet.segments[name];
		if (entries.length === 0) continue;
		lines.push(`  ${SEGMENT_TITLES[name]} (${entries.length}):`);
		for (const entry of entries) lines.push(formatSymbolEntry(entry, unit));
	}
	return lines;
}

export function formatReport(analysis: CaptureAnalysis, options: ReportOptions): string[] {
	const unit = options.timeUnit ?? { unit: "samples", period: 1 };
	const lines = [
		"HDMI Data Island Analysis",
		`Source: ${options.source}`,
		`Samples: ${analysis.rowCount}, buses: ${analysis.buses.size}`,
		...analysis.skippedBuses.map((b) => `Skipped bus ${b.name}: ${b.reason}`),
		"",
		...formatTiming(analysis.timing),
		"",
		...formatActivity(analysis),
		"",
	];

	if (analysis.unavailable.length > 0) {
		lines.push(`Data island signals not found: ${analysis.unavailable.join(", ")}`);
		return lines;
	}

	lines.push(`Data islands: ${analysis.packets.length}`);
	for (const [label, count] of packetSummary(analysis.packets)) {
		lines.push(`  ${label}: ${count}`);
	}

	analysis.packets.forEach((packet, i) => {
		lines.push("", ...formatPacket(packet, i + 1, unit));
	});
	return lines;
}

export function formatPolynomialReport(result: PolynomialTestResult): string[] {
	const [hb0, hb1, hb2] = result.header;
	const lines = [
		"BCH polynomial test",
		`Header: HB0=${hex(hb0, 2)} HB1=${hex(hb1, 2)} HB2=${hex(hb2, 2)}, received ECC ${hex(result.received, 2)}`,
		"",
		"Rank  Errors  Computed  Polynomial",
	];
	result.ranked.forEach((score, i) => {
		lines.push(
			`${String(i + 1).padStart(4)}  ${String(score.bitErrors).padStart(6)}  ${hex(score.computed, 2).padStart(8)}  ${score.name}`,
		);
	});
	lines.push("");

	const best = result.best;
	if (!best) {
		lines.push("No candidates");
	} else if (result.perfect) {
		lines.push(`Perfect match: ${describePolynomial(best.polynomial)} (${hex(best.polynomial, 2)})`);
	} else {
		lines.push(`No perfect match; best ${best.name} with ${best.bitErrors} bit errors`);
	}
	for (const near of result.nearMatches) {
		lines.push(`Near match: ${near.name} (${near.bitErrors} bit errors)`);
	}
	return lines;
}
