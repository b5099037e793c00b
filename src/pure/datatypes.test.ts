import { fitsScalar, integerRange, isDatatype } from "./datatypes.js";

describe("datatypes", () => {
	describe("isDatatype", () => {
		it("should accept the enumerated tags only", () => {
			expect(isDatatype("float32")).toBe(true);
			expect(isDatatype("uint32")).toBe(true);
			expect(isDatatype("float31")).toBe(false);
			expect(isDatatype(32)).toBe(false);
		});
	});

	describe("integerRange", () => {
		it("should compute signed and unsigned bounds", () => {
			expect(integerRange("uint8")).toEqual([0n, 255n]);
			expect(integerRange("int16")).toEqual([-32768n, 32767n]);
			expect(integerRange("uint64")).toEqual([0n, 18446744073709551615n]);
			expect(integerRange("float32")).toBeNull();
		});
	});

	describe("fitsScalar", () => {
		it("should check integer ranges", () => {
			expect(fitsScalar("uint32", 4294967295)).toBe(true);
			expect(fitsScalar("uint32", 4294967296)).toBe(false);
			expect(fitsScalar("uint32", -1)).toBe(false);
			expect(fitsScalar("int8", -128)).toBe(true);
			expect(fitsScalar("int64", 9007199254740993n)).toBe(true);
		});

		it("should reject fractional values for integer types", () => {
			expect(fitsScalar("int32", 1.5)).toBe(false);
		});

		it("should accept any number for floating types", () => {
			expect(fitsScalar("float32", 0)).toBe(true);
			expect(fitsScalar("float64", Number.NaN)).toBe(true);
			expect(fitsScalar("float32", "0.0")).toBe(false);
		});

		it("should accept booleans and 0/1 for bool8", () => {
			expect(fitsScalar("bool8", true)).toBe(true);
			expect(fitsScalar("bool8", 1)).toBe(true);
			expect(fitsScalar("bool8", 2)).toBe(false);
		});
	});
});
