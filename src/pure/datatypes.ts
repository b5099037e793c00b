/**
 * Primitive element types a field may declare.
 */
import { z } from "zod";

export const DatatypeSchema = z.enum([
	"int8",
	"uint8",
	"int16",
	"uint16",
	"int32",
	"uint32",
	"int64",
	"uint64",
	"float16",
	"float32",
	"float64",
	"complex64",
	"complex128",
	"bool8",
]);
export type Datatype = z.infer<typeof DatatypeSchema>;

type DatatypeFamily = "int" | "uint" | "float" | "complex" | "bool";

const FAMILIES: Record<Datatype, { family: DatatypeFamily; bits: number }> = {
	int8: { family: "int", bits: 8 },
	uint8: { family: "uint", bits: 8 },
	int16: { family: "int", bits: 16 },
	uint16: { family: "uint", bits: 16 },
	int32: { family: "int", bits: 32 },
	uint32: { family: "uint", bits: 32 },
	int64: { family: "int", bits: 64 },
	uint64: { family: "uint", bits: 64 },
	float16: { family: "float", bits: 16 },
	float32: { family: "float", bits: 32 },
	float64: { family: "float", bits: 64 },
	complex64: { family: "complex", bits: 64 },
	complex128: { family: "complex", bits: 128 },
	bool8: { family: "bool", bits: 8 },
};

export function isDatatype(value: unknown): value is Datatype {
	return DatatypeSchema.safeParse(value).success;
}

/**
 * Inclusive value range of an integral type
 */
export function integerRange(datatype: Datatype): [bigint, bigint] | null {
	const { family, bits } = FAMILIES[datatype];
	if (family === "uint") {
		return [0n, (1n << BigInt(bits)) - 1n];
	}
	if (family === "int") {
		const half = 1n << BigInt(bits - 1);
		return [-half, half - 1n];
	}
	return null;
}

/**
 * Check whether a single scalar value can be stored as the given element type.
 *
 * Integral types take integers within range (numbers or bigints), floating and
 * complex types take any number, bool8 takes booleans or 0/1.
 */
export function fitsScalar(datatype: Datatype, value: unknown): boolean {
	const { family } = FAMILIES[datatype];

	if (family === "bool") {
		return typeof value === "boolean" || value === 0 || value === 1;
	}

	if (family === "float" || family === "complex") {
		return typeof value === "number";
	}

	let asBigInt: bigint;
	if (typeof value === "bigint") {
		asBigInt = value;
	} else if (typeof value === "number" && Number.isInteger(value)) {
		asBigInt = BigInt(value);
	} else {
		return false;
	}

	const range = integerRange(datatype);
	return range !== null && asBigInt >= range[0] && asBigInt <= range[1];
}
