import type { FieldMap } from "../fragments/fragment.types.js";

export interface EffectiveSchema {
	model: string;
	schemaUri?: string;
	fields: FieldMap;
	// Top-level required field names, unioned across members
	required: readonly string[];
	// Fragment ids the schema was built from, root first
	contributors: readonly string[];
}

export type ValidationIssueKind =
	| "RankMismatch"
	| "DatatypeMismatch"
	| "MissingRequired"
	| "StructureMismatch";

export interface ValidationIssue {
	// Dotted path for nested fields
	field: string;
	kind: ValidationIssueKind;
	detail: string;
	expected?: string | number;
	actual?: string | number;
}

export interface ValidationReport {
	issues: ValidationIssue[];
}

export type DataObject = Readonly<Record<string, unknown>>;

export interface ValidatedDataObject {
	values: Record<string, unknown>;
	// Field paths whose value came from a declared default, not from the caller
	synthesized: ReadonlySet<string>;
}

export interface ValidationResult {
	object: ValidatedDataObject;
	report: ValidationReport;
}

export interface KeywordBinding {
	keyword: string;
	slot: string;
}
