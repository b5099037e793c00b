import { Injectable, Logger } from "@nestjs/common";
import { SchemaError } from "../fragments/errors.js";
import {
	FragmentRegistryService,
	type RegistrySnapshot,
} from "../fragments/fragment-registry.service.js";
import { ReferenceResolverService } from "../fragments/reference-resolver.service.js";
import { BindingTableService } from "./binding-table.service.js";
import { ComposerService } from "./composer.service.js";
import type {
	DataObject,
	EffectiveSchema,
	KeywordBinding,
	ValidationResult,
} from "./model.types.js";
import { ValidatorService } from "./validator.service.js";

const MODEL_SUFFIXES = [".schema.yaml", ".yaml", ".yml", ".json"];

export class UnknownModelError extends SchemaError {
	constructor(readonly model: string) {
		super(`Unknown model "${model}": no schema fragment with that name`);
	}
}

interface CacheEntry {
	schema: EffectiveSchema;
	// Revision of every contributing fragment at composition time
	revisions: ReadonlyMap<string, number>;
}

/**
 * Effective schemas per top-level model, composed on demand from the registry.
 *
 * A cached schema is served only while every contributing fragment still has the
 * revision it was composed from; otherwise it is recomputed in full.
 */
@Injectable()
export class ModelCatalogService {
	private readonly logger = new Logger(ModelCatalogService.name);
	private readonly cache = new Map<string, CacheEntry>();

	constructor(
		private readonly registry: FragmentRegistryService,
		private readonly resolver: ReferenceResolverService,
		private readonly composer: ComposerService,
		private readonly validator: ValidatorService,
		private readonly bindingTable: BindingTableService,
	) {}

	/**
	 * Map a model name (`cube`) or fragment id (`cube.schema.yaml`) to a fragment id
	 */
	resolveModelId(model: string, snapshot = this.registry.snapshot()): string {
		if (snapshot.fragments.has(model)) {
			return model;
		}
		for (const suffix of MODEL_SUFFIXES) {
			if (snapshot.fragments.has(`${model}${suffix}`)) {
				return `${model}${suffix}`;
			}
		}
		throw new UnknownModelError(model);
	}

	effectiveSchema(model: string): EffectiveSchema {
		const snapshot = this.registry.snapshot();
		const id = this.resolveModelId(model, snapshot);

		const cached = this.cache.get(id);
		if (cached && this.isCurrent(cached, snapshot)) {
			this.logger.debug(`Cache hit for ${id}`);
			return cached.schema;
		}

		const fragment = snapshot.fragments.get(id);
		if (!fragment) {
			throw new UnknownModelError(model);
		}

		const resolved = this.resolver.resolve(fragment, snapshot);
		const schema = this.composer.compose(resolved, id);

		if (this.registry.getConfig().cacheEffectiveSchemas) {
			const revisions = new Map<string, number>();
			for (const contributor of schema.contributors) {
				const revision = snapshot.revisions.get(contributor);
				if (revision !== undefined) {
					revisions.set(contributor, revision);
				}
			}
			this.cache.set(id, { schema, revisions });
		}
		this.logger.debug(
			`Composed ${id} from ${schema.contributors.length} fragments`,
		);

		return schema;
	}

	validate(model: string, data: DataObject): ValidationResult {
		return this.validator.validate(this.effectiveSchema(model), data);
	}

	bindings(model: string): Record<string, string> {
		return this.bindingTable.bindings(this.effectiveSchema(model));
	}

	keywordBindings(model: string): Record<string, KeywordBinding> {
		return this.bindingTable.keywordBindings(this.effectiveSchema(model));
	}

	/**
	 * Cached models composed from the given fragment
	 */
	dependents(fragmentId: string): string[] {
		return [...this.cache.entries()]
			.filter(([, entry]) => entry.revisions.has(fragmentId))
			.map(([id]) => id)
			.sort();
	}

	clear(): void {
		this.cache.clear();
	}

	private isCurrent(entry: CacheEntry, snapshot: RegistrySnapshot): boolean {
		for (const contributor of entry.schema.contributors) {
			if (snapshot.revisions.get(contributor) !== entry.revisions.get(contributor)) {
				return false;
			}
		}
		return true;
	}
}
