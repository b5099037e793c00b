import { Injectable } from "@nestjs/common";
import type { ZodError } from "zod";
import { deepFreeze } from "../pure/freeze.js";
import { isPlainObject } from "../pure/values.js";
import {
	FieldDocumentSchema,
	type FieldSetDocument,
	FieldSetDocumentSchema,
	FragmentDocumentSchema,
} from "../schemas/fragment.schemas.js";
import { MalformedSchemaError } from "./errors.js";
import type {
	CompositionMember,
	FieldMap,
	FieldSpec,
	InlineFieldSet,
	SchemaFragment,
} from "./fragment.types.js";

/**
 * Format zod issues as `field: message`
 */
function formatIssues(error: ZodError): string {
	return error.issues
		.map((issue) => {
			const field = issue.path.map(String).join(".");
			return `${field || "value"}: ${issue.message}`;
		})
		.join("; ");
}

function childPath(path: string, key: string): string {
	return path ? `${path}.${key}` : key;
}

/**
 * Parses decoded schema documents into immutable SchemaFragments.
 *
 * Performs no I/O: the caller decodes the document (see utils/documents.ts).
 */
@Injectable()
export class FragmentLoaderService {
	/**
	 * Parse one document.
	 *
	 * A top-level `$ref`, each `allOf` member and the top-level field-set become
	 * composition members, in that order. `allOf` lists nested inside members are
	 * flattened in place; those under a field stay on that field.
	 *
	 * @throws MalformedSchemaError for unknown datatypes, negative ranks or bad members
	 */
	load(id: string, document: unknown): SchemaFragment {
		if (!isPlainObject(document)) {
			throw new MalformedSchemaError(id, "", "document must be a mapping");
		}

		const parsed = FragmentDocumentSchema.safeParse(document);
		if (!parsed.success) {
			throw new MalformedSchemaError(id, "", formatIssues(parsed.error));
		}

		const members = this.parseFieldSet(id, parsed.data, "");

		const fields: Record<string, FieldSpec> = {};
		for (const member of members) {
			if (member.kind === "inline") {
				Object.assign(fields, member.fields);
			}
		}

		return deepFreeze({
			id,
			schemaUri: parsed.data.$schema,
			compositionMembers: members,
			fields,
		});
	}

	/**
	 * Members of one field-set level: `$ref`, then each `allOf` member, then the
	 * level's own `properties` and `required`
	 */
	private parseFieldSet(
		id: string,
		doc: FieldSetDocument,
		path: string,
	): CompositionMember[] {
		const members: CompositionMember[] = [];

		if (doc.$ref !== undefined) {
			members.push(this.parseReference(id, doc.$ref, childPath(path, "$ref")));
		}

		(doc.allOf ?? []).forEach((member, index) => {
			members.push(
				...this.parseMember(id, member, childPath(path, `allOf[${index}]`)),
			);
		});

		// A bare `required` list still constrains the composed model
		if (doc.properties !== undefined || doc.required !== undefined) {
			members.push(
				this.parseInline(
					id,
					doc.properties ?? {},
					doc.required ?? [],
					childPath(path, "properties"),
				),
			);
		}

		return members;
	}

	private parseMember(
		id: string,
		member: unknown,
		path: string,
	): CompositionMember[] {
		const parsed = FieldSetDocumentSchema.safeParse(member);
		if (!parsed.success) {
			throw new MalformedSchemaError(
				id,
				path,
				isPlainObject(member)
					? formatIssues(parsed.error)
					: "composition member must be a mapping",
			);
		}

		const { $ref, allOf, properties, required } = parsed.data;
		if (
			$ref === undefined &&
			allOf === undefined &&
			properties === undefined &&
			required === undefined
		) {
			throw new MalformedSchemaError(
				id,
				path,
				"composition member must be a $ref, an allOf or an inline object with properties",
			);
		}

		return this.parseFieldSet(id, parsed.data, path);
	}

	private parseReference(
		id: string,
		target: string,
		path: string,
	): CompositionMember {
		// Only whole-document references are supported
		if (target.includes("#") || /^[a-z][a-z0-9+.-]*:/i.test(target)) {
			throw new MalformedSchemaError(
				id,
				path,
				`unsupported reference "${target}" (expected a relative document name)`,
			);
		}
		return { kind: "reference", target };
	}

	private parseInline(
		id: string,
		properties: Record<string, unknown>,
		required: string[],
		path: string,
	): InlineFieldSet {
		return {
			kind: "inline",
			fields: this.parseFields(id, properties, path),
			required: [...required],
		};
	}

	private parseFields(
		id: string,
		properties: Record<string, unknown>,
		path: string,
	): FieldMap {
		const fields: Record<string, FieldSpec> = {};
		for (const [name, value] of Object.entries(properties)) {
			fields[name] = this.parseField(id, value, `${path}.${name}`);
		}
		return fields;
	}

	private parseField(id: string, value: unknown, path: string): FieldSpec {
		if (!isPlainObject(value)) {
			throw new MalformedSchemaError(id, path, "field must be a mapping");
		}

		const result = FieldDocumentSchema.safeParse(value);
		if (!result.success) {
			throw new MalformedSchemaError(id, path, formatIssues(result.error));
		}
		const doc = result.data;

		const spec: FieldSpec = {};
		if (doc.title !== undefined) spec.title = doc.title;
		if (doc.fits_hdu !== undefined) spec.storageSlot = doc.fits_hdu;
		if (doc.fits_keyword !== undefined) spec.storageKeyword = doc.fits_keyword;
		if (doc.ndim !== undefined) spec.rank = doc.ndim;
		if (doc.datatype !== undefined) spec.datatype = doc.datatype;
		// `default: null` is a declared default, so test for the key
		if ("default" in value) spec.default = doc.default;
		if (doc.properties !== undefined) {
			spec.properties = this.parseFields(
				id,
				doc.properties,
				`${path}.properties`,
			);
		}
		if (doc.required !== undefined) spec.required = [...doc.required];
		if (doc.$ref !== undefined || doc.allOf !== undefined) {
			spec.compositionMembers = this.parseFieldSet(
				id,
				{ $ref: doc.$ref, allOf: doc.allOf },
				path,
			);
		}
		return spec;
	}
}
