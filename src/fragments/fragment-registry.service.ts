import { existsSync } from "node:fs";
import { join } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { glob } from "glob";
import {
	type EngineConfig,
	EngineConfigSchema,
} from "../schemas/config.schemas.js";
import { readDocument } from "../utils/documents.js";
import { getSchemasPath, toPosixPath } from "../utils/paths.js";
import type { FragmentSource, SchemaFragment } from "./fragment.types.js";
import { FragmentLoaderService } from "./fragment-loader.service.js";

/**
 * Immutable view of the registry at one point in time.
 * Every update builds a new snapshot and swaps it in with a single assignment.
 */
export interface RegistrySnapshot extends FragmentSource {
	readonly fragments: ReadonlyMap<string, SchemaFragment>;
	readonly revisions: ReadonlyMap<string, number>;
}

export interface InitResult {
	loaded: string[];
	failed: Array<{ id: string; error: string }>;
}

function createSnapshot(
	fragments: ReadonlyMap<string, SchemaFragment>,
	revisions: ReadonlyMap<string, number>,
): RegistrySnapshot {
	return {
		fragments,
		revisions,
		get: (id) => fragments.get(id),
	};
}

/**
 * Process-scoped store of loaded schema fragments.
 *
 * Fragments are loaded in an explicit init phase (bulk load from the schema directory)
 * and replaced one at a time through register/refresh. Fragment ids are posix paths
 * relative to the schema directory, e.g. `cube.schema.yaml`.
 */
@Injectable()
export class FragmentRegistryService implements FragmentSource {
	private readonly logger = new Logger(FragmentRegistryService.name);
	private readonly config: EngineConfig;
	private readonly schemaPath: string;
	private state: RegistrySnapshot = createSnapshot(new Map(), new Map());
	private nextRevision = 1;

	constructor(
		private readonly configService: ConfigService,
		private readonly loader: FragmentLoaderService,
	) {
		this.config = this.loadConfig();
		this.schemaPath = this.config.schemaPath ?? getSchemasPath();
	}

	private loadConfig(): EngineConfig {
		// Validate config with Zod schema (fail-fast on invalid config)
		return EngineConfigSchema.parse({
			schemaPath: this.configService.get<string>("ARRAYMODEL_SCHEMA_PATH"),
			schemaGlob: this.configService.get<string>("ARRAYMODEL_SCHEMA_GLOB"),
			strictLoad: this.configService.get<string>("ARRAYMODEL_STRICT_LOAD"),
			cacheEffectiveSchemas: this.configService.get<string>("ARRAYMODEL_CACHE"),
		});
	}

	getConfig(): EngineConfig {
		return this.config;
	}

	getSchemaPath(): string {
		return this.schemaPath;
	}

	/**
	 * Discover schema documents under the schema directory
	 */
	async discoverDocuments(): Promise<string[]> {
		if (!existsSync(this.schemaPath)) {
			return [];
		}
		const files = await glob(this.config.schemaGlob, {
			cwd: this.schemaPath,
			nodir: true,
			ignore: ["**/node_modules/**", "**/.git/**"],
		});
		return files.map(toPosixPath).sort();
	}

	/**
	 * Bulk-load every document under the schema directory, replacing the registry contents.
	 *
	 * In strict mode the first failure aborts init and the previous contents stay in place.
	 * Otherwise failing documents are logged, skipped and returned in `failed`.
	 * A register, refresh or remove that lands while init is reading documents is kept.
	 */
	async init(): Promise<InitResult> {
		const base = this.state;
		const ids = await this.discoverDocuments();
		const fragments = new Map<string, SchemaFragment>();
		const revisions = new Map<string, number>();
		const failed: InitResult["failed"] = [];

		for (const id of ids) {
			try {
				const document = await readDocument(join(this.schemaPath, id));
				fragments.set(id, this.loader.load(id, document));
				revisions.set(id, this.nextRevision++);
			} catch (error) {
				if (this.config.strictLoad) {
					throw error;
				}
				const errorMsg = error instanceof Error ? error.message : String(error);
				failed.push({ id, error: errorMsg });
				this.logger.warn(`Skipping ${id}: ${errorMsg}`);
			}
		}

		this.mergeUpdatesSince(base, fragments, revisions);
		this.state = createSnapshot(fragments, revisions);
		this.logger.log(
			`Loaded ${fragments.size} schema fragments from ${this.schemaPath}`,
		);

		return { loaded: [...fragments.keys()], failed };
	}

	/**
	 * Add or replace a fragment from an already decoded document
	 */
	register(id: string, document: unknown): SchemaFragment {
		const fragment = this.loader.load(id, document);
		this.replace(id, fragment);
		return fragment;
	}

	/**
	 * Reload one document from disk. A document that no longer exists is removed.
	 */
	async refresh(id: string): Promise<SchemaFragment | undefined> {
		const filePath = join(this.schemaPath, id);
		if (!existsSync(filePath)) {
			this.remove(id);
			return undefined;
		}
		const fragment = this.loader.load(id, await readDocument(filePath));
		this.replace(id, fragment);
		this.logger.log(`Refreshed ${id}`);
		return fragment;
	}

	remove(id: string): boolean {
		if (!this.state.fragments.has(id)) {
			return false;
		}
		const fragments = new Map(this.state.fragments);
		const revisions = new Map(this.state.revisions);
		fragments.delete(id);
		revisions.delete(id);
		this.state = createSnapshot(fragments, revisions);
		return true;
	}

	get(id: string): SchemaFragment | undefined {
		return this.state.fragments.get(id);
	}

	has(id: string): boolean {
		return this.state.fragments.has(id);
	}

	list(): string[] {
		return [...this.state.fragments.keys()].sort();
	}

	/**
	 * Revision number of a fragment; changes every time the fragment is replaced
	 */
	revision(id: string): number | undefined {
		return this.state.revisions.get(id);
	}

	/**
	 * Current snapshot, for reads that must see a single consistent registry state
	 */
	snapshot(): RegistrySnapshot {
		return this.state;
	}

	/**
	 * Carry updates made after `base` into a bulk-loaded fragment set
	 */
	private mergeUpdatesSince(
		base: RegistrySnapshot,
		fragments: Map<string, SchemaFragment>,
		revisions: Map<string, number>,
	): void {
		const current = this.state;
		if (current === base) {
			return;
		}
		for (const [id, fragment] of current.fragments) {
			const revision = current.revisions.get(id);
			if (revision !== undefined && revision !== base.revisions.get(id)) {
				fragments.set(id, fragment);
				revisions.set(id, revision);
			}
		}
		for (const id of base.fragments.keys()) {
			if (!current.fragments.has(id)) {
				fragments.delete(id);
				revisions.delete(id);
			}
		}
	}

	private replace(id: string, fragment: SchemaFragment): void {
		const fragments = new Map(this.state.fragments);
		const revisions = new Map(this.state.revisions);
		fragments.set(id, fragment);
		revisions.set(id, this.nextRevision++);
		this.state = createSnapshot(fragments, revisions);
	}
}
