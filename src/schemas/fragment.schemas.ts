import { z } from "zod";
import { DatatypeSchema } from "../pure/datatypes.js";

/**
 * Per-field attributes as written in a schema document.
 *
 * Nested `properties` and `allOf` members are checked to be a mapping and a list
 * here and walked by the loader.
 * Unrecognized keys (`type`, `description`, `enum`, ...) pass through untouched.
 */
export const FieldDocumentSchema = z
	.object({
		title: z.string().optional(),
		fits_hdu: z.string().min(1).optional(),
		fits_keyword: z.string().min(1).optional(),
		ndim: z
			.number()
			.int("ndim must be an integer")
			.nonnegative("ndim must not be negative")
			.optional(),
		datatype: DatatypeSchema.optional(),
		default: z.unknown().optional(),
		properties: z.record(z.string(), z.unknown()).optional(),
		required: z.array(z.string()).optional(),
		// Composition inside an object-valued field
		$ref: z.string().min(1).optional(),
		allOf: z.array(z.unknown()).optional(),
	})
	.passthrough();

export type FieldDocument = z.infer<typeof FieldDocumentSchema>;

/**
 * One field-set level: a `$ref`, an `allOf` list, and the level's own field-set.
 * Used for composition members, which may nest further `allOf` lists.
 */
export const FieldSetDocumentSchema = z
	.object({
		$ref: z.string().min(1).optional(),
		allOf: z.array(z.unknown()).optional(),
		properties: z.record(z.string(), z.unknown()).optional(),
		required: z.array(z.string()).optional(),
	})
	.passthrough();

export type FieldSetDocument = z.infer<typeof FieldSetDocumentSchema>;

/**
 * Top level of a fragment document
 */
export const FragmentDocumentSchema = z
	.object({
		$schema: z.string().optional(),
		$ref: z.string().min(1).optional(),
		allOf: z.array(z.unknown()).optional(),
		properties: z.record(z.string(), z.unknown()).optional(),
		required: z.array(z.string()).optional(),
	})
	.passthrough();

export type FragmentDocument = z.infer<typeof FragmentDocumentSchema>;
