import { describeType, describeValue, findNonConforming } from "./values.js";

describe("values", () => {
	describe("describeValue", () => {
		it("should describe scalars as rank 0", () => {
			expect(describeValue(0.5)).toEqual({ kind: "scalar", rank: 0, shape: [] });
			expect(describeValue("text")).toEqual({ kind: "scalar", rank: 0, shape: [] });
		});

		it("should derive rank and shape from nested arrays", () => {
			expect(
				describeValue([
					[1, 2, 3],
					[4, 5, 6],
				]),
			).toEqual({ kind: "array", rank: 2, shape: [2, 3], datatype: undefined });
		});

		it("should mark nested arrays with uneven siblings as ragged", () => {
			expect(describeValue([[1, 2], 3])).toEqual({
				kind: "ragged",
				rank: 0,
				shape: [],
			});
			expect(describeValue([[1, 2], [3]])).toEqual({
				kind: "ragged",
				rank: 0,
				shape: [],
			});
			expect(describeValue([[[1]], [[2], [3]]]).kind).toBe("ragged");
		});

		it("should describe empty nested arrays by their lengths", () => {
			expect(describeValue([[], []])).toEqual({
				kind: "array",
				rank: 2,
				shape: [2, 0],
				datatype: undefined,
			});
		});

		it("should take the element type from typed arrays", () => {
			expect(describeValue(new Uint32Array(5))).toEqual({
				kind: "array",
				rank: 1,
				shape: [5],
				datatype: "uint32",
			});
			expect(describeValue([new Float32Array(2), new Float32Array(2)])).toEqual({
				kind: "array",
				rank: 2,
				shape: [2, 2],
				datatype: "float32",
			});
		});

		it("should read array descriptors", () => {
			expect(describeValue({ shape: [3, 100, 100], dtype: "float32" })).toEqual({
				kind: "array",
				rank: 3,
				shape: [3, 100, 100],
				datatype: "float32",
			});
		});

		it("should treat other mappings as objects", () => {
			expect(describeValue({ shape: [3], dtype: "float31" })).toEqual({
				kind: "object",
				rank: 0,
				shape: [],
			});
		});
	});

	describe("findNonConforming", () => {
		it("should return the first element that does not fit", () => {
			expect(findNonConforming("uint8", [[1, 2], [300, 4]])).toEqual({ value: 300 });
		});

		it("should return undefined when every element fits", () => {
			expect(findNonConforming("float32", [[1.5], [2]])).toBeUndefined();
			expect(findNonConforming("int8", new Float64Array(3))).toBeUndefined();
		});
	});

	describe("describeType", () => {
		it("should label values", () => {
			expect(describeType(null)).toBe("null");
			expect(describeType([1])).toBe("array");
			expect(describeType(new Int16Array(1))).toBe("Int16Array");
			expect(describeType(1n)).toBe("bigint");
		});
	});
});
