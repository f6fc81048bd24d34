import { describe, expect, test } from "vitest";
import { GUARD_CODE, PREAMBLE_CODE, TERC4_CODES } from "../src/island/constants.js";
import { decodeTerc4, encodeTerc4, isGuardSample, isPreambleSample } from "../src/island/terc4.js";

describe("TERC4", () => {
	test.each(TERC4_CODES.map((code, symbol): [number, number] => [symbol, code]))(
		"symbol %i <-> code %i",
		(symbol, code) => {
			expect(encodeTerc4(symbol)).toBe(code);
			expect(decodeTerc4(code)).toBe(symbol);
		},
	);

	test("all 16 codes are distinct", () => {
		expect(new Set(TERC4_CODES).size).toBe(16);
	});

	test("unknown and non-TERC4 codes decode to null", () => {
		expect(decodeTerc4(null)).toBeNull();
		expect(decodeTerc4(PREAMBLE_CODE)).toBeNull();
		expect(decodeTerc4(0)).toBeNull();
		expect(decodeTerc4(0x3ff)).toBeNull();
	});

	test("guard band code is the code for symbol 8", () => {
		expect(decodeTerc4(GUARD_CODE)).toBe(8);
	});

	test("encode rejects symbols outside 0..15", () => {
		expect(() => encodeTerc4(16)).toThrow(RangeError);
		expect(() => encodeTerc4(-1)).toThrow(RangeError);
		expect(() => encodeTerc4(1.5)).toThrow(RangeError);
	});
});

describe("control patterns", () => {
	test("guard sample needs the guard code on every channel", () => {
		expect(isGuardSample({ red: GUARD_CODE, green: GUARD_CODE, blue: GUARD_CODE })).toBe(true);
		expect(isGuardSample({ red: GUARD_CODE, green: GUARD_CODE, blue: null })).toBe(false);
		expect(isGuardSample({ red: GUARD_CODE, green: PREAMBLE_CODE, blue: GUARD_CODE })).toBe(false);
	});

	test("preamble sample needs the preamble code on every channel", () => {
		expect(isPreambleSample({ red: PREAMBLE_CODE, green: PREAMBLE_CODE, blue: PREAMBLE_CODE })).toBe(
			true,
		);
		expect(isPreambleSample({ red: PREAMBLE_CODE, green: GUARD_CODE, blue: PREAMBLE_CODE })).toBe(
			false,
		);
	});
});
