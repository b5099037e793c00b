import { mkdtempSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createEngine, FIXTURE_SCHEMAS_PATH } from "../testing/fixtures.js";
import { MalformedSchemaError } from "./errors.js";

describe("FragmentRegistryService", () => {
	describe("init", () => {
		it("should load every fixture document", async () => {
			const { registry } = createEngine();

			const result = await registry.init();

			expect(registry.getSchemaPath()).toBe(FIXTURE_SCHEMAS_PATH);
			expect(result.failed).toEqual([]);
			expect(registry.list()).toEqual([
				"bunit.schema.yaml",
				"core.schema.yaml",
				"cube.schema.yaml",
				"int_times.schema.yaml",
				"photometry.schema.yaml",
				"variance.schema.yaml",
				"wcsinfo.schema.yaml",
			]);
			expect(registry.get("cube.schema.yaml")?.compositionMembers).toHaveLength(7);
		});

		it("should keep fragments registered while init is running", async () => {
			const { registry } = createEngine();

			const pending = registry.init();
			registry.register("extra.yaml", { properties: { extra: {} } });
			registry.register("variance.schema.yaml", {
				properties: { var_flat: {} },
			});
			await pending;

			expect(registry.has("extra.yaml")).toBe(true);
			expect(registry.has("cube.schema.yaml")).toBe(true);
			expect(
				Object.keys(registry.get("variance.schema.yaml")?.fields ?? {}),
			).toEqual(["var_flat"]);
		});

		it("should load nothing when the schema directory is missing", async () => {
			const { registry } = createEngine({
				ARRAYMODEL_SCHEMA_PATH: join(tmpdir(), "arraymodel-missing-dir"),
			});

			const result = await registry.init();

			expect(result).toEqual({ loaded: [], failed: [] });
			expect(registry.list()).toEqual([]);
		});
	});

	describe("with a writable schema directory", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "arraymodel-registry-"));
			writeFileSync(
				join(dir, "good.yaml"),
				"properties:\n  data:\n    ndim: 2\n    datatype: float32\n",
			);
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("should abort init on a malformed document in strict mode", async () => {
			writeFileSync(
				join(dir, "bad.yaml"),
				"properties:\n  data:\n    datatype: float31\n",
			);
			const { registry } = createEngine({ ARRAYMODEL_SCHEMA_PATH: dir });

			await expect(registry.init()).rejects.toThrow(MalformedSchemaError);
			expect(registry.list()).toEqual([]);
		});

		it("should skip malformed documents in lenient mode", async () => {
			writeFileSync(join(dir, "bad.yaml"), "properties:\n  data:\n    ndim: -2\n");
			const { registry } = createEngine({
				ARRAYMODEL_SCHEMA_PATH: dir,
				ARRAYMODEL_STRICT_LOAD: "false",
			});

			const result = await registry.init();

			expect(result.loaded).toEqual(["good.yaml"]);
			expect(result.failed).toEqual([
				{
					id: "bad.yaml",
					error:
						"Malformed schema bad.yaml at properties.data: ndim: ndim must not be negative",
				},
			]);
		});

		it("should reload a changed document and bump its revision", async () => {
			const { registry } = createEngine({ ARRAYMODEL_SCHEMA_PATH: dir });
			await registry.init();
			const before = registry.revision("good.yaml");

			writeFileSync(
				join(dir, "good.yaml"),
				"properties:\n  data:\n    ndim: 3\n",
			);
			const fragment = await registry.refresh("good.yaml");

			expect(fragment?.fields.data).toEqual({ rank: 3 });
			expect(registry.revision("good.yaml")).toBeGreaterThan(before ?? 0);
		});

		it("should remove a document that no longer exists on refresh", async () => {
			const { registry } = createEngine({ ARRAYMODEL_SCHEMA_PATH: dir });
			await registry.init();

			unlinkSync(join(dir, "good.yaml"));

			expect(await registry.refresh("good.yaml")).toBeUndefined();
			expect(registry.has("good.yaml")).toBe(false);
			expect(registry.revision("good.yaml")).toBeUndefined();
		});
	});

	describe("register", () => {
		it("should replace the snapshot instead of mutating it", () => {
			const { registry } = createEngine();
			registry.register("a.yaml", { properties: { x: {} } });
			const before = registry.snapshot();

			registry.register("b.yaml", { properties: { y: {} } });

			expect(before.fragments.has("b.yaml")).toBe(false);
			expect(registry.snapshot().fragments.has("b.yaml")).toBe(true);
			expect(registry.snapshot().get("a.yaml")).toBe(before.get("a.yaml"));
		});

		it("should leave the registry unchanged when the document is malformed", () => {
			const { registry } = createEngine();
			registry.register("a.yaml", { properties: { x: {} } });

			expect(() =>
				registry.register("a.yaml", { properties: { x: { ndim: -1 } } }),
			).toThrow(MalformedSchemaError);
			expect(registry.get("a.yaml")?.fields.x).toEqual({});
		});

		it("should remove fragments", () => {
			const { registry } = createEngine();
			registry.register("a.yaml", { properties: { x: {} } });

			expect(registry.remove("a.yaml")).toBe(true);
			expect(registry.remove("a.yaml")).toBe(false);
		});
	});

	describe("configuration", () => {
		it("should reject invalid flag values", () => {
			expect(() => createEngine({ ARRAYMODEL_STRICT_LOAD: "maybe" })).toThrow();
		});

		it("should apply defaults", () => {
			const { registry } = createEngine();

			expect(registry.getConfig()).toEqual({
				schemaPath: FIXTURE_SCHEMAS_PATH,
				schemaGlob: "**/*.{yaml,yml,json}",
				strictLoad: true,
				cacheEffectiveSchemas: true,
			});
		});
	});
});
