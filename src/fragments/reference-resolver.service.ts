import { posix } from "node:path";
import { Injectable } from "@nestjs/common";
import { CyclicReferenceError, UnresolvedReferenceError } from "./errors.js";
import type {
	FieldMap,
	FieldSpec,
	FragmentSource,
	ResolvedFieldSet,
	ResolvedFragment,
	SchemaFragment,
} from "./fragment.types.js";

interface Frame {
	fragment: SchemaFragment;
	// Index of the next composition member to expand
	next: number;
	fieldSets: ResolvedFieldSet[];
	contributors: Set<string>;
}

interface Expansion {
	fieldSets: ResolvedFieldSet[];
	contributors: Set<string>;
}

export function isResolved(
	fragment: SchemaFragment | ResolvedFragment,
): fragment is ResolvedFragment {
	return "kind" in fragment && fragment.kind === "resolved";
}

/**
 * Resolve a `$ref` target relative to the directory of the referencing fragment
 */
export function resolveReferenceId(fromId: string, target: string): string {
	return posix.normalize(posix.join(posix.dirname(fromId), target));
}

/**
 * Expands `$ref` members depth-first into an ordered list of field-sets.
 *
 * The active chain is kept on an explicit stack, so a cycle is reported with its exact
 * path instead of surfacing as unbounded recursion. Composition written under a field
 * is expanded into that field's own `fieldSets`, with the enclosing chain still active.
 */
@Injectable()
export class ReferenceResolverService {
	resolve(
		fragment: SchemaFragment | ResolvedFragment,
		registry: FragmentSource,
	): ResolvedFragment {
		if (isResolved(fragment)) {
			return fragment;
		}

		const result = this.expand(fragment, registry, []);

		return {
			kind: "resolved",
			id: fragment.id,
			schemaUri: fragment.schemaUri,
			fieldSets: result.fieldSets,
			contributors: [...result.contributors],
		};
	}

	/**
	 * Expand one fragment. `outer` holds the fragments whose fields led here.
	 */
	private expand(
		fragment: SchemaFragment,
		registry: FragmentSource,
		outer: readonly string[],
	): Expansion {
		// Completed expansions, chains relative to the expanded fragment
		const completed = new Map<string, Expansion>();
		const stack: Frame[] = [];
		const active = (): string[] => [
			...outer,
			...stack.map((f) => f.fragment.id),
		];
		let result: Expansion | undefined;

		const push = (next: SchemaFragment) => {
			stack.push({
				fragment: next,
				next: 0,
				fieldSets: [],
				contributors: new Set([next.id]),
			});
		};

		push(fragment);

		while (stack.length > 0) {
			const frame = stack[stack.length - 1];
			const { fragment: current } = frame;

			if (frame.next >= current.compositionMembers.length) {
				stack.pop();
				const expansion = {
					fieldSets: frame.fieldSets,
					contributors: frame.contributors,
				};
				completed.set(current.id, expansion);

				const parent = stack[stack.length - 1];
				if (parent) {
					this.splice(parent.fragment.id, parent, expansion);
				} else {
					result = expansion;
				}
				continue;
			}

			const member = current.compositionMembers[frame.next];
			frame.next++;

			if (member.kind === "inline") {
				frame.fieldSets.push({
					source: current.id,
					chain: [current.id],
					fields: this.expandFields(
						member.fields,
						current.id,
						active(),
						registry,
						frame.contributors,
					),
					required: member.required,
				});
				continue;
			}

			const targetId = resolveReferenceId(current.id, member.target);
			const chain = active();

			const cycleStart = chain.indexOf(targetId);
			if (cycleStart !== -1) {
				throw new CyclicReferenceError([...chain.slice(cycleStart), targetId]);
			}

			const done = completed.get(targetId);
			if (done) {
				this.splice(current.id, frame, done);
				continue;
			}

			const target = registry.get(targetId);
			if (!target) {
				throw new UnresolvedReferenceError(targetId, chain);
			}
			push(target);
		}

		if (!result) {
			// The root frame always completes last
			throw new Error(`Resolution of ${fragment.id} produced no result`);
		}
		return result;
	}

	private expandFields(
		fields: FieldMap,
		owner: string,
		chain: readonly string[],
		registry: FragmentSource,
		contributors: Set<string>,
	): FieldMap {
		const expanded: Record<string, FieldSpec> = {};
		for (const [name, spec] of Object.entries(fields)) {
			expanded[name] = this.expandField(
				spec,
				owner,
				chain,
				registry,
				contributors,
			);
		}
		return expanded;
	}

	private expandField(
		spec: FieldSpec,
		owner: string,
		chain: readonly string[],
		registry: FragmentSource,
		contributors: Set<string>,
	): FieldSpec {
		const { compositionMembers, ...expanded } = spec;

		if (spec.properties !== undefined) {
			expanded.properties = this.expandFields(
				spec.properties,
				owner,
				chain,
				registry,
				contributors,
			);
		}

		if (compositionMembers === undefined) {
			return expanded;
		}

		const fieldSets: ResolvedFieldSet[] = [];
		for (const member of compositionMembers) {
			if (member.kind === "inline") {
				fieldSets.push({
					source: owner,
					chain: [owner],
					fields: this.expandFields(
						member.fields,
						owner,
						chain,
						registry,
						contributors,
					),
					required: member.required,
				});
				continue;
			}

			const targetId = resolveReferenceId(owner, member.target);
			const cycleStart = chain.indexOf(targetId);
			if (cycleStart !== -1) {
				throw new CyclicReferenceError([...chain.slice(cycleStart), targetId]);
			}
			const target = registry.get(targetId);
			if (!target) {
				throw new UnresolvedReferenceError(targetId, [...chain]);
			}

			const expansion = this.expand(target, registry, chain);
			this.splice(owner, { fieldSets, contributors }, expansion);
		}

		expanded.fieldSets = fieldSets;
		return expanded;
	}

	/**
	 * Append a completed expansion to the referencing field-sets, prefixing chains
	 */
	private splice(id: string, into: Expansion, expansion: Expansion): void {
		for (const fieldSet of expansion.fieldSets) {
			into.fieldSets.push({ ...fieldSet, chain: [id, ...fieldSet.chain] });
		}
		for (const contributor of expansion.contributors) {
			into.contributors.add(contributor);
		}
	}
}
