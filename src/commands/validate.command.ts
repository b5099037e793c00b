import { resolve } from "node:path";
import { Injectable } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import { FragmentRegistryService } from "../fragments/fragment-registry.service.js";
import { ModelCatalogService } from "../model/model-catalog.service.js";
import { DataFileSchema } from "../schemas/data.schemas.js";
import { readDocument } from "../utils/documents.js";

interface ValidateCommandOptions {
	allowIssues?: boolean;
}

@Injectable()
@Command({
	name: "validate",
	arguments: "<model> <data>",
	description: "Validate a data object file against a model's effective schema",
})
export class ValidateCommand extends CommandRunner {
	constructor(
		private readonly registry: FragmentRegistryService,
		private readonly catalog: ModelCatalogService,
	) {
		super();
	}

	async run(inputs: string[], options: ValidateCommandOptions): Promise<void> {
		const [model, dataPath] = inputs;
		try {
			console.log("=== Data Object Validation ===\n");

			await this.registry.init();
			const data = DataFileSchema.parse(
				await readDocument(resolve(dataPath)),
			);
			const { object, report } = this.catalog.validate(model, data);

			console.log(`Model: ${model}`);
			console.log(`Fields supplied: ${Object.keys(data).length}`);
			if (object.synthesized.size > 0) {
				console.log(
					`Defaults applied: ${[...object.synthesized].join(", ")}`,
				);
			}
			console.log("");

			if (report.issues.length > 0) {
				console.log(`Issues (${report.issues.length}):\n`);
				for (const issue of report.issues) {
					console.log(`  [${issue.kind}] ${issue.field}`);
					console.log(`    ${issue.detail}`);
				}
				console.log("");
			} else {
				console.log("✓ Data object matches the schema\n");
			}

			const failed = report.issues.length > 0 && !options.allowIssues;
			console.log(`Overall: ${failed ? "✗ FAILED" : "✓ PASSED"}`);
			process.exit(failed ? 1 : 0);
		} catch (error) {
			console.error(
				"Validation failed:",
				error instanceof Error ? error.message : String(error),
			);
			process.exit(1);
		}
	}

	@Option({
		flags: "--allow-issues",
		description: "Exit successfully even when issues are reported",
	})
	parseAllowIssues(): boolean {
		return true;
	}
}
