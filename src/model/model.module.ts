import { Module } from "@nestjs/common";
import { FragmentsModule } from "../fragments/fragments.module.js";
import { BindingTableService } from "./binding-table.service.js";
import { ComposerService } from "./composer.service.js";
import { ModelCatalogService } from "./model-catalog.service.js";
import { ValidatorService } from "./validator.service.js";

@Module({
	imports: [FragmentsModule],
	providers: [
		ComposerService,
		ValidatorService,
		BindingTableService,
		ModelCatalogService,
	],
	exports: [
		ComposerService,
		ValidatorService,
		BindingTableService,
		ModelCatalogService,
	],
})
export class ModelModule {}
