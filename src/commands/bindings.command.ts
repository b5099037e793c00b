import { Injectable } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import { FragmentRegistryService } from "../fragments/fragment-registry.service.js";
import { ModelCatalogService } from "../model/model-catalog.service.js";

interface BindingsCommandOptions {
	keywords?: boolean;
}

@Injectable()
@Command({
	name: "bindings",
	arguments: "<model>",
	description: "Show the storage slot of every field in a model",
})
export class BindingsCommand extends CommandRunner {
	constructor(
		private readonly registry: FragmentRegistryService,
		private readonly catalog: ModelCatalogService,
	) {
		super();
	}

	async run(inputs: string[], options: BindingsCommandOptions): Promise<void> {
		const [model] = inputs;
		try {
			await this.registry.init();

			const slots = Object.entries(this.catalog.bindings(model));
			console.log(`\nStorage slots (${slots.length}):`);
			for (const [field, slot] of slots) {
				console.log(`  ${field} → ${slot}`);
			}

			if (options.keywords) {
				const keywords = Object.entries(this.catalog.keywordBindings(model));
				console.log(`\nHeader keywords (${keywords.length}):`);
				for (const [field, { keyword, slot }] of keywords) {
					console.log(`  ${field} → ${slot}:${keyword}`);
				}
			}

			process.exit(0);
		} catch (error) {
			console.error(
				"\n❌ Binding lookup failed:",
				error instanceof Error ? error.message : String(error),
			);
			process.exit(1);
		}
	}

	@Option({
		flags: "--keywords",
		description: "Also show header keyword bindings",
	})
	parseKeywords(): boolean {
		return true;
	}
}
