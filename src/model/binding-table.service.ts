import { Injectable } from "@nestjs/common";
import type { FieldMap } from "../fragments/fragment.types.js";
import type { EffectiveSchema, KeywordBinding } from "./model.types.js";

// Header keywords without an enclosing slot live in the primary header
export const PRIMARY_SLOT = "PRIMARY";

/**
 * Read-only projections of an effective schema onto storage locations,
 * for the binary container I/O layer.
 */
@Injectable()
export class BindingTableService {
	/**
	 * Field path → storage slot (extension name), for every field that declares one
	 */
	bindings(schema: EffectiveSchema): Record<string, string> {
		const table: Record<string, string> = {};
		this.walk(schema.fields, "", undefined, (path, spec) => {
			if (spec.storageSlot !== undefined) {
				table[path] = spec.storageSlot;
			}
		});
		return table;
	}

	/**
	 * Field path → header keyword, with the slot inherited from the nearest enclosing field
	 */
	keywordBindings(schema: EffectiveSchema): Record<string, KeywordBinding> {
		const table: Record<string, KeywordBinding> = {};
		this.walk(schema.fields, "", undefined, (path, spec, slot) => {
			if (spec.storageKeyword !== undefined) {
				table[path] = {
					keyword: spec.storageKeyword,
					slot: spec.storageSlot ?? slot ?? PRIMARY_SLOT,
				};
			}
		});
		return table;
	}

	private walk(
		fields: FieldMap,
		prefix: string,
		slot: string | undefined,
		visit: (
			path: string,
			spec: FieldMap[string],
			slot: string | undefined,
		) => void,
	): void {
		for (const [name, spec] of Object.entries(fields)) {
			const path = `${prefix}${name}`;
			visit(path, spec, slot);
			if (spec.properties !== undefined) {
				this.walk(spec.properties, `${path}.`, spec.storageSlot ?? slot, visit);
			}
		}
	}
}
