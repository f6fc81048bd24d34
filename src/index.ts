export {
	type AnalyzeOptions,
	analyzeCapture,
	type CaptureAnalysis,
	DEFAULT_SIGNAL_NAMES,
	findBus,
	findPolynomialSample,
	type PolynomialSample,
	resolveIslandSources,
	type SignalActivity,
	signalActivity,
	type SignalNames,
	type SignalRole,
	type SourceResolution,
} from "./analyze.js";
export {
	ACR_SAMPLE_RATES,
	BCH_POLYNOMIAL,
	CHANNELS,
	type Channel,
	COMMON_BCH_POLYNOMIALS,
	GUARD_CODE,
	type KnownPacketKind,
	PACKET_TYPES,
	type PolynomialCandidate,
	PREAMBLE_CODE,
	TERC4_CODES,
} from "./island/constants.js";
export {
	type AcrPayload,
	type AudioSamplePayload,
	type AudioSubpacket,
	classifyAcrN,
	decodeAudioSubpacket,
	decodeIsland,
	decodePacketHeader,
	decodeSubpacket,
	type EccResult,
	type Packet,
	type PacketHeader,
	type PacketKind,
	type PacketPayload,
	packetLabel,
} from "./island/decode.js";
export {
	encodeIslandSamples,
	encodePacketSamples,
	type EncodedSample,
	type PacketContent,
	type SubpacketChannels,
} from "./island/encode.js";
export {
	type BurstEnd,
	type DataIsland,
	type IslandSample,
	type IslandSources,
	scanBursts,
	type SegmentOptions,
	segmentIslands,
	splitSegments,
} from "./island/segment.js";
export { decodeTerc4, encodeTerc4, isGuardSample, isPreambleSample } from "./island/terc4.js";
export {
	formatPolynomialReport,
	formatReport,
	type ReportOptions,
} from "./report.js";
export { analyzeTiming, type TimingSummary, VGA_TIMING, type VideoTiming } from "./timing.js";
export {
	computeBchEcc,
	describePolynomial,
	type HeaderBytes,
	lfsrRemainder,
	type PolynomialTestResult,
	testPolynomials,
	verifyEcc,
} from "./util/bch.js";
export { type BusMap, reconstructBuses, type SkippedBus } from "./util/bus.js";
export {
	type Capture,
	parseCapture,
	parseTimeUnit,
	readCaptureFile,
	type TimeUnit,
} from "./util/capture.js";
export type { Bit, Maybe, TriState } from "./util/known.js";
export { findTransitions, findValueChanges, searchValue } from "./util/signals.js";
