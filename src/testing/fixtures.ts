import { join } from "node:path";
import { ConfigService } from "@nestjs/config";
import { FragmentLoaderService } from "../fragments/fragment-loader.service.js";
import { FragmentRegistryService } from "../fragments/fragment-registry.service.js";
import { ReferenceResolverService } from "../fragments/reference-resolver.service.js";
import { BindingTableService } from "../model/binding-table.service.js";
import { ComposerService } from "../model/composer.service.js";
import { ModelCatalogService } from "../model/model-catalog.service.js";
import { ValidatorService } from "../model/validator.service.js";

/**
 * Schema documents for a data cube: cube.schema.yaml composed from six fragments
 */
export const FIXTURE_SCHEMAS_PATH = join(__dirname, "fixtures", "schemas");

/**
 * Wire the engine services by hand, without a Nest application context
 */
export function createEngine(env: Record<string, string> = {}) {
	const loader = new FragmentLoaderService();
	const registry = new FragmentRegistryService(
		new ConfigService({ ARRAYMODEL_SCHEMA_PATH: FIXTURE_SCHEMAS_PATH, ...env }),
		loader,
	);
	const resolver = new ReferenceResolverService();
	const composer = new ComposerService();
	const validator = new ValidatorService();
	const bindingTable = new BindingTableService();
	const catalog = new ModelCatalogService(
		registry,
		resolver,
		composer,
		validator,
		bindingTable,
	);
	return { loader, registry, resolver, composer, validator, bindingTable, catalog };
}
