/**
 * Errors raised while loading, resolving or composing schema fragments.
 *
 * All of them indicate an authoring defect in the schema set and are never retried.
 */
export class SchemaError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class MalformedSchemaError extends SchemaError {
	constructor(
		readonly fragmentId: string,
		readonly path: string,
		readonly reason: string,
	) {
		super(
			path
				? `Malformed schema ${fragmentId} at ${path}: ${reason}`
				: `Malformed schema ${fragmentId}: ${reason}`,
		);
	}
}

export class UnresolvedReferenceError extends SchemaError {
	constructor(
		readonly target: string,
		readonly chain: readonly string[],
	) {
		super(
			`Unresolved reference "${target}" (via ${[...chain, target].join(" → ")})`,
		);
	}
}

export class CyclicReferenceError extends SchemaError {
	constructor(readonly cycle: readonly string[]) {
		super(`Cyclic reference: ${cycle.join(" → ")}`);
	}
}

export class ConflictingDatatypeError extends SchemaError {
	constructor(
		readonly field: string,
		readonly attribute: "rank" | "datatype",
		readonly earlier: { source: string; value: unknown },
		readonly later: { source: string; value: unknown },
	) {
		super(
			`Conflicting ${attribute} for field "${field}": ` +
				`${String(earlier.value)} in ${earlier.source}, ${String(later.value)} in ${later.source}`,
		);
	}
}
