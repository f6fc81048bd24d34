/// <reference types="node" />

import { resolve } from "node:path";
import { type Packet, analyzeCapture, readCaptureFile } from "../src/index.js";

function printUsage(): void {
	console.error("Usage: npx tsx example/decode-capture.ts <capture.csv> [--max-samples n]");
}

function parseArgs(argv: string[]): { captureFile: string; maxIslandSamples?: number } {
	const captureFile = argv[0];
	if (!captureFile) {
		printUsage();
		process.exit(1);
	}

	let maxIslandSamples: number | undefined;
	for (let i = 1; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === "--max-samples") {
			const value = argv[++i];
			maxIslandSamples = Number(value);
			if (!Number.isInteger(maxIslandSamples) || maxIslandSamples <= 0) {
				throw new Error(`Invalid --max-samples value: ${value ?? "(missing)"}`);
			}
		} else {
			throw new Error(`Unknown argument: ${arg}`);
		}
	}

	return { captureFile, maxIslandSamples };
}

function byte(value: number | null): string {
	return value === null ? "??" : value.toString(16).padStart(2, "0");
}

function formatPacket(p: Packet): string {
	const row = String(p.start.index).padStart(6);
	const h = String(p.start.hCount ?? "?").padStart(4);
	const header = `${byte(p.header.hb0)} ${byte(p.header.hb1)} ${byte(p.header.hb2)}`;
	const ecc = p.ecc.match === null ? "  ?" : p.ecc.match ? " ok" : "bad";
	return `${row}  ${h}  ${header}  ${byte(p.ecc.received)} ${ecc}  ${p.header.label}`;
}

function main(): void {
	try {
		const { captureFile, maxIslandSamples } = parseArgs(process.argv.slice(2));
		const filePath = resolve(process.cwd(), captureFile);
		console.log(`Reading ${filePath}...`);

		const capture = readCaptureFile(filePath);
		console.log(`Capture: ${capture.rows.length} rows, ${capture.columns.length} columns`);

		const analysis = analyzeCapture(capture, { segment: { maxIslandSamples } });
		if (analysis.unavailable.length > 0) {
			throw new Error(`Missing signals: ${analysis.unavailable.join(", ")}`);
		}

		console.log(`\nDecoded ${analysis.packets.length} packets:\n`);
		console.log("   row     h  header    ecc     type");
		console.log("  ----  ----  --------  ------  ----");
		for (const p of analysis.packets) {
			console.log(formatPacket(p));
		}
	} catch (error) {
		const msg = error instanceof Error ? error.message : String(error);
		console.error(`Error: ${msg}`);
		printUsage();
		process.exit(1);
	}
}

main();
