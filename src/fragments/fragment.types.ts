import type { Datatype } from "../pure/datatypes.js";

/**
 * Attributes of a single schema field.
 *
 * Keys mirror the document vocabulary: `fits_hdu` becomes `storageSlot`,
 * `fits_keyword` becomes `storageKeyword` and `ndim` becomes `rank`.
 */
export interface FieldSpec {
	title?: string;
	storageSlot?: string;
	storageKeyword?: string;
	rank?: number;
	datatype?: Datatype;
	default?: unknown;
	// Object-valued fields carry their own field-set
	properties?: FieldMap;
	required?: string[];
	// `$ref`/`allOf` written under the field, as loaded
	compositionMembers?: readonly CompositionMember[];
	// The same members after reference expansion; merged ahead of `properties`
	fieldSets?: readonly ResolvedFieldSet[];
}

export type FieldMap = Readonly<Record<string, FieldSpec>>;

export interface InlineFieldSet {
	kind: "inline";
	fields: FieldMap;
	required: string[];
}

export interface Reference {
	kind: "reference";
	target: string;
}

export type CompositionMember = InlineFieldSet | Reference;

export interface SchemaFragment {
	id: string;
	schemaUri?: string;
	compositionMembers: readonly CompositionMember[];
	// Union of the fragment's own inline field-sets
	fields: FieldMap;
}

/**
 * One field-set after reference expansion, tagged with where it came from.
 */
export interface ResolvedFieldSet {
	source: string;
	// Reference chain from the root fragment to `source`
	chain: readonly string[];
	fields: FieldMap;
	required: readonly string[];
}

export interface ResolvedFragment {
	kind: "resolved";
	id: string;
	schemaUri?: string;
	fieldSets: readonly ResolvedFieldSet[];
	// Every fragment id the expansion visited, root first
	contributors: readonly string[];
}

/**
 * Read-only lookup used during resolution
 */
export interface FragmentSource {
	get(id: string): SchemaFragment | undefined;
}
