import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import {
	BindingsCommand,
	ComposeCommand,
	FragmentsCommand,
	ValidateCommand,
} from "./commands/index.js";
import { FragmentsModule } from "./fragments/fragments.module.js";
import { ModelModule } from "./model/model.module.js";
import { getEnvPath } from "./utils/paths.js";

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			envFilePath: getEnvPath(),
		}),
		FragmentsModule,
		ModelModule,
	],
	providers: [
		// CLI Commands
		FragmentsCommand,
		ComposeCommand,
		ValidateCommand,
		BindingsCommand,
	],
})
export class AppModule {}
