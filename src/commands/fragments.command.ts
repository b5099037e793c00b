import { Injectable } from "@nestjs/common";
import { Command, CommandRunner } from "nest-commander";
import { FragmentRegistryService } from "../fragments/fragment-registry.service.js";

@Injectable()
@Command({
	name: "fragments",
	description: "List schema fragments loaded from the schema directory",
})
export class FragmentsCommand extends CommandRunner {
	constructor(private readonly registry: FragmentRegistryService) {
		super();
	}

	async run(): Promise<void> {
		try {
			const { failed } = await this.registry.init();
			const ids = this.registry.list();

			console.log(`\nSchema fragments in ${this.registry.getSchemaPath()}\n`);

			for (const id of ids) {
				const fragment = this.registry.get(id);
				if (!fragment) continue;
				const references = fragment.compositionMembers.filter(
					(m) => m.kind === "reference",
				).length;
				const fieldCount = Object.keys(fragment.fields).length;
				console.log(
					`  ${id}: ${fieldCount} fields, ${references} references`,
				);
			}

			console.log(`\nTotal: ${ids.length} fragments`);

			if (failed.length > 0) {
				console.log(`\nSkipped (${failed.length}):`);
				for (const { id, error } of failed) {
					console.log(`  ${id}: ${error}`);
				}
			}

			process.exit(failed.length > 0 ? 1 : 0);
		} catch (error) {
			console.error(
				"\n❌ Loading fragments failed:",
				error instanceof Error ? error.message : String(error),
			);
			process.exit(1);
		}
	}
}
