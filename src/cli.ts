#!/usr/bin/env node
import { writeFileSync } from "node:fs";
import { resolve } from "node:path";

import {
	type AnalyzeOptions,
	analyzeCapture,
	findPolynomialSample,
	formatPolynomialReport,
	formatReport,
	parseTimeUnit,
	readCaptureFile,
	searchValue,
	testPolynomials,
	type TimeUnit,
} from "./index.js";

const DEFAULT_SEARCH_COUNT = 10;

function printUsage(): void {
	console.error(`hdmi-island - HDMI data island decoder for logic analyzer captures

Usage:
  hdmi-island analyze <capture.csv> [options]
  hdmi-island polytest <capture.csv>
  hdmi-island search <capture.csv> <signal> <value> [options]

Analyze options:
  --time-unit <u>     Time unit or sample clock, e.g. ns or 25.2mhz (default: from capture)
  --max-samples <n>   Longest island scanned before it is cut off (default: 96)
  --export [file]     Also write the report to a file (default: <capture>_analysis.txt)

Search options:
  --count <n>         Maximum number of matches (default: 10)
`);
}

function positiveInt(flag: string, value: string | undefined): number {
	if (value === undefined) throw new Error(`Missing value for ${flag}`);
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new Error(`Invalid ${flag} value: ${value}`);
	}
	return parsed;
}

function defaultExportPath(capturePath: string): string {
	return capturePath.endsWith(".csv")
		? `${capturePath.slice(0, -".csv".length)}_analysis.txt`
		: `${capturePath}_analysis.txt`;
}

function runAnalyze(argv: string[]): void {
	const captureFile = argv[0];
	if (!captureFile) {
		console.error("Error: missing capture file");
		printUsage();
		process.exit(1);
	}

	let timeUnit: TimeUnit | undefined;
	let exportPath: string | undefined;
	const options: AnalyzeOptions = {};

	for (let i = 1; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === "--time-unit") {
			i++;
			const value = argv[i];
			if (!value) throw new Error("Missing value for --time-unit");
			timeUnit = parseTimeUnit(value);
		} else if (arg === "--max-samples") {
			i++;
			options.segment = { maxIslandSamples: positiveInt("--max-samples", argv[i]) };
		} else if (arg === "--export") {
			const next = argv[i + 1];
			if (next !== undefined && !next.startsWith("--")) {
				exportPath = next;
				i++;
			} else {
				exportPath = defaultExportPath(captureFile);
			}
		} else {
			throw new Error(`Unknown argument: ${arg}`);
		}
	}

	const filePath = resolve(process.cwd(), captureFile);
	const capture = readCaptureFile(filePath);
	const analysis = analyzeCapture(capture, options);
	const lines = formatReport(analysis, {
		source: filePath,
		timeUnit: timeUnit ?? { unit: capture.timeUnit ?? "samples", period: 1 },
	});

	for (const line of lines) console.log(line);

	if (exportPath) {
		const outPath = resolve(process.cwd(), exportPath);
		writeFileSync(outPath, `${lines.join("\n")}\n`);
		console.log(`\nSummary exported to: ${outPath}`);
	}
}

function runPolytest(argv: string[]): void {
	const captureFile = argv[0];
	if (!captureFile) {
		console.error("Error: missing capture file");
		printUsage();
		process.exit(1);
	}
	if (argv.length > 1) throw new Error(`Unknown argument: ${argv[1]}`);

	const analysis = analyzeCapture(readCaptureFile(resolve(process.cwd(), captureFile)));
	if (analysis.unavailable.length > 0) {
		throw new Error(`Data island signals not found: ${analysis.unavailable.join(", ")}`);
	}

	const sample = findPolynomialSample(analysis.packets);
	if (!sample) {
		throw new Error("No packet with a fully known header and ECC");
	}

	console.log(`Using packet at row ${sample.packet.start.index} (${sample.packet.header.label})`);
	for (const line of formatPolynomialReport(testPolynomials(sample.header, sample.received))) {
		console.log(line);
	}
}

function runSearch(argv: string[]): void {
	const [captureFile, signal, value] = argv;
	if (!captureFile || !signal || value === undefined) {
		console.error("Error: search needs <capture.csv> <signal> <value>");
		printUsage();
		process.exit(1);
	}

	let count = DEFAULT_SEARCH_COUNT;
	for (let i = 3; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === "--count") {
			i++;
			count = positiveInt("--count", argv[i]);
		} else {
			throw new Error(`Unknown argument: ${arg}`);
		}
	}

	const capture = readCaptureFile(resolve(process.cwd(), captureFile));
	const hits = searchValue(capture, signal, value, count);
	if (hits === null) throw new Error(`Signal not found: ${signal}`);

	if (hits.length === 0) {
		console.log(`No occurrences of ${signal} = ${value}`);
		return;
	}
	console.log(`First ${hits.length} occurrence(s) of ${signal} = ${value}:`);
	for (const hit of hits) {
		console.log(`${String(hit.time).padStart(10)} | ${hit.value}`);
	}
}

function main(): void {
	const args = process.argv.slice(2);
	const subcommand = args[0];
	const subArgs = args.slice(1);

	if (!subcommand || subcommand === "--help" || subcommand === "-h") {
		printUsage();
		process.exit(0);
	}

	try {
		if (subcommand === "analyze") {
			runAnalyze(subArgs);
		} else if (subcommand === "polytest") {
			runPolytest(subArgs);
		} else if (subcommand === "search") {
			runSearch(subArgs);
		} else {
			console.error(`Error: unknown subcommand '${subcommand}'`);
			printUsage();
			process.exit(1);
		}
	} catch (error) {
		const msg = error instanceof Error ? error.message : String(error);
		console.error(`Error: ${msg}`);
		printUsage();
		process.exit(1);
	}
}

main();
