import { Injectable } from "@nestjs/common";
import type { FieldMap, FieldSpec } from "../fragments/fragment.types.js";
import {
	describeType,
	describeValue,
	findNonConforming,
	isPlainObject,
} from "../pure/values.js";
import type {
	DataObject,
	EffectiveSchema,
	ValidationIssue,
	ValidationResult,
} from "./model.types.js";

interface WalkState {
	issues: ValidationIssue[];
	synthesized: Set<string>;
}

/**
 * Checks data objects against an effective schema.
 *
 * Every field is checked and every problem is reported in one pass. The caller's
 * object is never mutated: defaults are filled into a copy, unknown fields are
 * copied through as they are.
 */
@Injectable()
export class ValidatorService {
	validate(schema: EffectiveSchema, data: DataObject): ValidationResult {
		const state: WalkState = { issues: [], synthesized: new Set() };
		const values = this.walk(schema.fields, schema.required, data, "", state);

		return {
			object: { values, synthesized: state.synthesized },
			report: { issues: state.issues },
		};
	}

	private walk(
		fields: FieldMap,
		required: readonly string[],
		data: DataObject,
		prefix: string,
		state: WalkState,
	): Record<string, unknown> {
		const output: Record<string, unknown> = { ...data };

		for (const [name, spec] of Object.entries(fields)) {
			const path = `${prefix}${name}`;
			// null counts as absent, so a declared default replaces it
			const value = Object.hasOwn(data, name) ? data[name] : undefined;

			if (value === undefined || value === null) {
				if ("default" in spec) {
					output[name] = structuredClone(spec.default);
					state.synthesized.add(path);
					continue;
				}
				if (required.includes(name)) {
					state.issues.push({
						field: path,
						kind: "MissingRequired",
						detail: `Missing required field ${path}`,
					});
				}
				if (spec.properties !== undefined) {
					this.fillAbsent(name, spec.properties, output, `${path}.`, state);
				}
				continue;
			}

			this.checkRank(spec, value, path, state);
			this.checkDatatype(spec, value, path, state);

			if (spec.properties !== undefined) {
				if (isPlainObject(value)) {
					output[name] = this.walk(
						spec.properties,
						spec.required ?? [],
						value,
						`${path}.`,
						state,
					);
				} else {
					state.issues.push({
						field: path,
						kind: "StructureMismatch",
						detail: `Expected an object for ${path}, got ${describeType(value)}`,
						expected: "object",
						actual: describeType(value),
					});
				}
			}
		}

		// Required names the field-set does not describe
		for (const name of required) {
			if (!Object.hasOwn(fields, name) && output[name] == null) {
				state.issues.push({
					field: `${prefix}${name}`,
					kind: "MissingRequired",
					detail: `Missing required field ${prefix}${name}`,
				});
			}
		}

		return output;
	}

	/**
	 * Declared defaults below an absent object field. The field is added only when
	 * some descendant was filled in; its required lists do not apply while it is absent.
	 */
	private fillAbsent(
		name: string,
		fields: FieldMap,
		output: Record<string, unknown>,
		prefix: string,
		state: WalkState,
	): void {
		const before = state.synthesized.size;
		const filled = this.walk(fields, [], {}, prefix, state);
		if (state.synthesized.size > before) {
			output[name] = filled;
		}
	}

	private checkRank(
		spec: FieldSpec,
		value: unknown,
		path: string,
		state: WalkState,
	): void {
		if (spec.rank === undefined) {
			return;
		}
		const { kind, rank } = describeValue(value);
		if (kind === "ragged") {
			state.issues.push({
				field: path,
				kind: "RankMismatch",
				detail: `Expected ${path} to have rank ${spec.rank}, got an irregular nested array`,
				expected: spec.rank,
				actual: "irregular",
			});
		} else if (rank !== spec.rank) {
			state.issues.push({
				field: path,
				kind: "RankMismatch",
				detail: `Expected ${path} to have rank ${spec.rank}, got rank ${rank}`,
				expected: spec.rank,
				actual: rank,
			});
		}
	}

	private checkDatatype(
		spec: FieldSpec,
		value: unknown,
		path: string,
		state: WalkState,
	): void {
		const expected = spec.datatype;
		if (expected === undefined) {
			return;
		}

		const shape = describeValue(value);
		let actual: string | undefined;

		if (shape.kind === "object") {
			actual = "object";
		} else if (shape.datatype !== undefined) {
			if (shape.datatype !== expected) {
				actual = shape.datatype;
			}
		} else {
			// Plain values carry no element type: every element must fit
			const offending = findNonConforming(expected, value);
			if (offending) {
				actual = `${describeType(offending.value)} ${String(offending.value)}`;
			}
		}

		if (actual !== undefined) {
			state.issues.push({
				field: path,
				kind: "DatatypeMismatch",
				detail: `Expected ${path} to hold ${expected}, got ${actual}`,
				expected,
				actual,
			});
		}
	}
}
