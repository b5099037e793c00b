import { Injectable } from "@nestjs/common";
import { ConflictingDatatypeError } from "../fragments/errors.js";
import type {
	FieldMap,
	FieldSpec,
	ResolvedFragment,
} from "../fragments/fragment.types.js";
import { deepFreeze } from "../pure/freeze.js";
import type { EffectiveSchema } from "./model.types.js";

/**
 * Where each attribute of a merged field was last set, for conflict messages
 */
interface FieldOrigin {
	rank?: string;
	datatype?: string;
	children: Map<string, FieldOrigin>;
}

function appendUnique(target: string[], values: readonly string[]): void {
	for (const value of values) {
		if (!target.includes(value)) {
			target.push(value);
		}
	}
}

/**
 * Merges the ordered field-sets of a resolved fragment into one effective schema.
 *
 * Fields merge by name and attributes merge one by one: a later member overrides only
 * what it declares. Rank changes and datatype changes on array-valued fields are
 * rejected with ConflictingDatatypeError. The returned schema is frozen.
 */
@Injectable()
export class ComposerService {
	compose(resolved: ResolvedFragment, model = resolved.id): EffectiveSchema {
		const fields: Record<string, FieldSpec> = {};
		const origins = new Map<string, FieldOrigin>();
		const required: string[] = [];

		for (const fieldSet of resolved.fieldSets) {
			this.mergeFields(fields, origins, fieldSet.fields, fieldSet.source, "");
			appendUnique(required, fieldSet.required);
		}

		// Cached schemas are shared between callers
		return deepFreeze({
			model,
			schemaUri: resolved.schemaUri,
			fields,
			required,
			contributors: [...resolved.contributors],
		});
	}

	private mergeFields(
		target: Record<string, FieldSpec>,
		origins: Map<string, FieldOrigin>,
		incoming: FieldMap,
		source: string,
		prefix: string,
	): void {
		for (const [name, spec] of Object.entries(incoming)) {
			let origin = origins.get(name);
			if (!origin) {
				origin = { children: new Map() };
				origins.set(name, origin);
			}
			target[name] = this.mergeField(
				target[name],
				spec,
				origin,
				source,
				`${prefix}${name}`,
			);
		}
	}

	private mergeField(
		earlier: FieldSpec | undefined,
		later: FieldSpec,
		origin: FieldOrigin,
		source: string,
		path: string,
	): FieldSpec {
		const merged: FieldSpec = earlier ? { ...earlier } : {};

		if (later.rank !== undefined) {
			if (
				merged.rank !== undefined &&
				merged.rank !== later.rank &&
				origin.rank !== undefined
			) {
				throw new ConflictingDatatypeError(
					path,
					"rank",
					{ source: origin.rank, value: merged.rank },
					{ source, value: later.rank },
				);
			}
			merged.rank = later.rank;
			origin.rank = source;
		}

		if (later.datatype !== undefined) {
			// A scalar field may be retyped; an array field may not
			const isArray = merged.rank !== undefined;
			if (
				merged.datatype !== undefined &&
				merged.datatype !== later.datatype &&
				isArray &&
				origin.datatype !== undefined
			) {
				throw new ConflictingDatatypeError(
					path,
					"datatype",
					{ source: origin.datatype, value: merged.datatype },
					{ source, value: later.datatype },
				);
			}
			merged.datatype = later.datatype;
			origin.datatype = source;
		}

		if (later.title !== undefined) merged.title = later.title;
		if (later.storageSlot !== undefined) merged.storageSlot = later.storageSlot;
		if (later.storageKeyword !== undefined)
			merged.storageKeyword = later.storageKeyword;
		if ("default" in later) merged.default = later.default;

		const required = [...(merged.required ?? [])];
		for (const fieldSet of later.fieldSets ?? []) {
			appendUnique(required, fieldSet.required);
		}
		appendUnique(required, later.required ?? []);
		if (later.required !== undefined || required.length > 0) {
			merged.required = required;
		}

		// Members composed under the field come ahead of its own properties
		if (later.fieldSets !== undefined || later.properties !== undefined) {
			const children: Record<string, FieldSpec> = {
				...(merged.properties ?? {}),
			};
			for (const fieldSet of later.fieldSets ?? []) {
				this.mergeFields(
					children,
					origin.children,
					fieldSet.fields,
					fieldSet.source,
					`${path}.`,
				);
			}
			if (later.properties !== undefined) {
				this.mergeFields(
					children,
					origin.children,
					later.properties,
					source,
					`${path}.`,
				);
			}
			merged.properties = children;
		}

		return merged;
	}
}
