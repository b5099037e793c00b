import { Injectable } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import type { FieldMap } from "../fragments/fragment.types.js";
import { FragmentRegistryService } from "../fragments/fragment-registry.service.js";
import { ModelCatalogService } from "../model/model-catalog.service.js";

interface ComposeCommandOptions {
	json?: boolean;
}

function describeField(spec: FieldMap[string]): string {
	const parts: string[] = [];
	if (spec.datatype) parts.push(spec.datatype);
	if (spec.rank !== undefined) parts.push(`ndim=${spec.rank}`);
	if (spec.storageSlot) parts.push(`hdu=${spec.storageSlot}`);
	if (spec.storageKeyword) parts.push(`keyword=${spec.storageKeyword}`);
	if ("default" in spec) parts.push(`default=${JSON.stringify(spec.default)}`);
	return parts.join(" ");
}

@Injectable()
@Command({
	name: "compose",
	arguments: "<model>",
	description: "Resolve and compose the effective schema of a model",
})
export class ComposeCommand extends CommandRunner {
	constructor(
		private readonly registry: FragmentRegistryService,
		private readonly catalog: ModelCatalogService,
	) {
		super();
	}

	async run(inputs: string[], options: ComposeCommandOptions): Promise<void> {
		const [model] = inputs;
		try {
			await this.registry.init();
			const schema = this.catalog.effectiveSchema(model);

			if (options.json) {
				console.log(JSON.stringify(schema, null, 2));
				process.exit(0);
			}

			console.log(`\n=== Effective schema: ${schema.model} ===\n`);
			console.log(`Composed from: ${schema.contributors.join(", ")}\n`);
			this.printFields(schema.fields, "  ");
			if (schema.required.length > 0) {
				console.log(`\nRequired: ${schema.required.join(", ")}`);
			}
			process.exit(0);
		} catch (error) {
			console.error(
				"\n❌ Composition failed:",
				error instanceof Error ? error.message : String(error),
			);
			process.exit(1);
		}
	}

	private printFields(fields: FieldMap, indent: string): void {
		for (const [name, spec] of Object.entries(fields)) {
			const details = describeField(spec);
			console.log(`${indent}${name}${details ? `: ${details}` : ""}`);
			if (spec.properties) {
				this.printFields(spec.properties, `${indent}  `);
			}
		}
	}

	@Option({
		flags: "--json",
		description: "Print the effective schema as JSON",
	})
	parseJson(): boolean {
		return true;
	}
}
