/**
 * Pure functions describing runtime values held in a data object.
 * Used by the validator to compare a value against a field's rank and datatype.
 */
import { z } from "zod";
import { type Datatype, DatatypeSchema, fitsScalar } from "./datatypes.js";

/**
 * Array supplied by reference to its shape and element type, without data
 */
export const ArrayDescriptorSchema = z.object({
	shape: z.array(z.number().int().nonnegative()),
	dtype: DatatypeSchema,
});
export type ArrayDescriptor = z.infer<typeof ArrayDescriptorSchema>;

// `ragged`: nested plain array whose siblings differ in rank or length
export type ValueKind = "scalar" | "array" | "ragged" | "object";

export interface ValueShape {
	kind: ValueKind;
	rank: number;
	shape: number[];
	// Known only for typed arrays and descriptors
	datatype?: Datatype;
}

type TypedArray =
	| Int8Array
	| Uint8Array
	| Uint8ClampedArray
	| Int16Array
	| Uint16Array
	| Int32Array
	| Uint32Array
	| Float32Array
	| Float64Array
	| BigInt64Array
	| BigUint64Array;

function typedArrayDatatype(value: TypedArray): Datatype {
	if (value instanceof Int8Array) return "int8";
	if (value instanceof Uint8Array || value instanceof Uint8ClampedArray)
		return "uint8";
	if (value instanceof Int16Array) return "int16";
	if (value instanceof Uint16Array) return "uint16";
	if (value instanceof Int32Array) return "int32";
	if (value instanceof Uint32Array) return "uint32";
	if (value instanceof Float32Array) return "float32";
	if (value instanceof BigInt64Array) return "int64";
	if (value instanceof BigUint64Array) return "uint64";
	return "float64";
}

function isTypedArray(value: unknown): value is TypedArray {
	return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

export function isPlainObject(
	value: unknown,
): value is Record<string, unknown> {
	if (value === null || typeof value !== "object") {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
	return a.length === b.length && a.every((size, axis) => size === b[axis]);
}

/**
 * Shape of a nested plain array, undefined when it is not rectangular
 */
function nestedShape(value: unknown): number[] | undefined {
	if (isTypedArray(value)) {
		return [value.length];
	}
	if (!Array.isArray(value)) {
		return [];
	}

	let inner: number[] = [];
	for (const [index, item] of value.entries()) {
		const shape = nestedShape(item);
		if (shape === undefined) {
			return undefined;
		}
		if (index === 0) {
			inner = shape;
		} else if (!sameShape(inner, shape)) {
			return undefined;
		}
	}
	return [value.length, ...inner];
}

/**
 * Describe the rank, shape and (when known) element type of a value
 */
export function describeValue(value: unknown): ValueShape {
	if (isTypedArray(value)) {
		return {
			kind: "array",
			rank: 1,
			shape: [value.length],
			datatype: typedArrayDatatype(value),
		};
	}

	if (Array.isArray(value)) {
		const shape = nestedShape(value);
		if (shape === undefined) {
			return { kind: "ragged", rank: 0, shape: [] };
		}
		// Innermost typed array fixes the element type
		let innermost: unknown = value;
		while (Array.isArray(innermost) && innermost.length > 0) {
			innermost = innermost[0];
		}
		return {
			kind: "array",
			rank: shape.length,
			shape,
			datatype: isTypedArray(innermost)
				? typedArrayDatatype(innermost)
				: undefined,
		};
	}

	const descriptor = ArrayDescriptorSchema.safeParse(value);
	if (descriptor.success) {
		return {
			kind: "array",
			rank: descriptor.data.shape.length,
			shape: descriptor.data.shape,
			datatype: descriptor.data.dtype,
		};
	}

	if (isPlainObject(value)) {
		return { kind: "object", rank: 0, shape: [] };
	}

	return { kind: "scalar", rank: 0, shape: [] };
}

/**
 * Leaf values of a nested plain array (typed arrays are skipped, their type is known)
 */
export function* leafValues(value: unknown): Generator<unknown> {
	if (Array.isArray(value)) {
		for (const item of value) {
			yield* leafValues(item);
		}
		return;
	}
	if (!isTypedArray(value)) {
		yield value;
	}
}

/**
 * Find the first element of a value that cannot be stored as `datatype`.
 * Returns undefined when every element fits or the element type is already known.
 */
export function findNonConforming(
	datatype: Datatype,
	value: unknown,
): { value: unknown } | undefined {
	for (const leaf of leafValues(value)) {
		if (!fitsScalar(datatype, leaf)) {
			return { value: leaf };
		}
	}
	return undefined;
}

/**
 * Short human-readable label for a value's type
 */
export function describeType(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	if (isTypedArray(value)) return value.constructor.name;
	return typeof value;
}
