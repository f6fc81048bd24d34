import type { HeaderBytes } from "./util/bch.js";
import { type BusMap, busesFromLayouts, findBusLayouts, type SkippedBus } from "./util/bus.js";
import { type Capture, captureTimes } from "./util/capture.js";
import type { Maybe } from "./util/known.js";
import {
	columnBits,
	findFirstColumn,
	findTransitions,
	findValueChanges,
	matchSignalName,
	type Transition,
} from "./util/signals.js";
import { decodeIsland, type Packet } from "./island/decode.js";
import {
	type DataIsland,
	type IslandSources,
	type SegmentOptions,
	segmentIslands,
} from "./island/segment.js";
import { analyzeTiming, type TimingSummary } from "./timing.js";

/** Candidate capture names per signal role; the first one present wins. */
export interface SignalNames {
	enable: readonly string[];
	preamble: readonly string[];
	hCounter: readonly string[];
	vCounter: readonly string[];
	red: readonly string[];
	green: readonly string[];
	blue: readonly string[];
	hsync: readonly string[];
	vsync: readonly string[];
	state: readonly string[];
}

export type SignalRole = keyof SignalNames;

export const DEFAULT_SIGNAL_NAMES: SignalNames = {
	enable: ["u_hdmi/data_island_enable", "debug_data_island", "preamble_active"],
	preamble: ["preamble_active"],
	hCounter: ["horizontal_counter", "u_pattern/h_count", "u_hdmi/debug_h_count"],
	vCounter: ["vertical_counter", "u_pattern/v_count", "u_hdmi/debug_v_count"],
	red: ["tmds_encoded_red"],
	green: ["tmds_encoded_green"],
	blue: ["tmds_encoded_blue"],
	hsync: ["video_hsync", "hsync"],
	vsync: ["video_vsync", "vsync"],
	state: ["u_hdmi/u_audio_controller/state", "u_hdmi/debug_state"],
};

export interface AnalyzeOptions {
	/** Overrides for individual roles, merged over {@link DEFAULT_SIGNAL_NAMES} */
	signals?: Partial<SignalNames>;
	segment?: SegmentOptions;
}

export type SourceResolution =
	| { status: "ok"; sources: IslandSources; segment: SegmentOptions }
	| { status: "unavailable"; missing: SignalRole[] };

/** Control signal activity alongside the islands; `null` where a signal is not captured. */
export interface SignalActivity {
	hsyncEdges: Transition<string>[] | null;
	vsyncEdges: Transition<string>[] | null;
	stateChanges: Transition<number>[] | null;
}

export interface CaptureAnalysis {
	/** Sample rows in the capture. */
	rowCount: number;
	buses: BusMap;
	/** Buses left out of {@link buses}, with the reason. */
	skippedBuses: SkippedBus[];
	islands: DataIsland[];
	packets: Packet[];
	timing: TimingSummary | null;
	activity: SignalActivity;
	/** Required roles not found in the capture; empty when islands could be scanned. */
	unavailable: SignalRole[];
}

/** Bus values for the first candidate naming a bus, matched as {@link matchSignalName} does. */
export function findBus(buses: BusMap, names: readonly string[]): Maybe<number>[] | null {
	const busNames = [...buses.keys()];
	for (const name of names) {
		const busName = busNames[matchSignalName(busNames, name)];
		const values = busName === undefined ? undefined : buses.get(busName);
		if (values) return values;
	}
	return null;
}

/**
 * Pick the columns feeding the island segmenter.
 *
 * Only the enable signal and the three channel buses are required. When the
 * enable signal is the preamble flag itself its falling edge ends the
 * preamble, not the island, so falling-edge termination is switched off.
 */
export function resolveIslandSources(
	capture: Capture,
	buses: BusMap,
	names: SignalNames = DEFAULT_SIGNAL_NAMES,
	segment: SegmentOptions = {},
): SourceResolution {
	const enable = findFirstColumn(capture.columns, names.enable);
	const red = findBus(buses, names.red);
	const green = findBus(buses, names.green);
	const blue = findBus(buses, names.blue);

	if (!enable || !red || !green || !blue) {
		const missing: SignalRole[] = [];
		if (!enable) missing.push("enable");
		if (!red) missing.push("red");
		if (!green) missing.push("green");
		if (!blue) missing.push("blue");
		return { status: "unavailable", missing };
	}

	const preamble = findFirstColumn(capture.columns, names.preamble);
	const sharedFlag = preamble !== null && preamble.column === enable.column;

	return {
		status: "ok",
		sources: {
			times: captureTimes(capture),
			enable: columnBits(capture, enable.column),
			preamble: preamble ? columnBits(capture, preamble.column) : null,
			hCounter: findBus(buses, names.hCounter),
			red,
			green,
			blue,
		},
		segment: sharedFlag ? { ...segment, endOnFallingEdge: false } : segment,
	};
}

function risingEdges(capture: Capture, names: readonly string[]): Transition<string>[] | null {
	const found = findFirstColumn(capture.columns, names);
	return found ? findTransitions(capture, found.name, "0", "1") : null;
}

export function signalActivity(
	capture: Capture,
	buses: BusMap,
	names: SignalNames = DEFAULT_SIGNAL_NAMES,
): SignalActivity {
	const state = findBus(buses, names.state);
	return {
		hsyncEdges: risingEdges(capture, names.hsync),
		vsyncEdges: risingEdges(capture, names.vsync),
		stateChanges: state ? findValueChanges(state, captureTimes(capture)) : null,
	};
}

/** Full pass over a capture. Nothing is cached between calls. */
export function analyzeCapture(capture: Capture, options: AnalyzeOptions = {}): CaptureAnalysis {
	const names: SignalNames = { ...DEFAULT_SIGNAL_NAMES, ...options.signals };
	const rowCount = capture.rows.length;
	const { layouts, skipped: skippedBuses } = findBusLayouts(capture.columns);
	const buses = busesFromLayouts(layouts, capture.rows);

	const hCounts = findBus(buses, names.hCounter);
	const timing = hCounts ? analyzeTiming(hCounts, findBus(buses, names.vCounter)) : null;

	const activity = signalActivity(capture, buses, names);

	const resolution = resolveIslandSources(capture, buses, names, options.segment);
	if (resolution.status === "unavailable") {
		return {
			rowCount,
			buses,
			skippedBuses,
			islands: [],
			packets: [],
			timing,
			activity,
			unavailable: resolution.missing,
		};
	}

	const islands = segmentIslands(resolution.sources, resolution.segment);
	return {
		rowCount,
		buses,
		skippedBuses,
		islands,
		packets: islands.map(decodeIsland),
		timing,
		activity,
		unavailable: [],
	};
}

export interface PolynomialSample {
	packet: Packet;
	header: HeaderBytes;
	received: number;
}

/** First packet with a complete header and a fully known received ECC. */
export function findPolynomialSample(packets: readonly Packet[]): PolynomialSample | null {
	for (const packet of packets) {
		const { hb0, hb1, hb2 } = packet.header;
		const received = packet.ecc.received;
		if (hb0 !== null && hb1 !== null && hb2 !== null && received !== null) {
			return { packet, header: [hb0, hb1, hb2], received };
		}
	}
	return null;
}
