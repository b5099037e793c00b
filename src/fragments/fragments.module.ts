import { Module } from "@nestjs/common";
import { FragmentLoaderService } from "./fragment-loader.service.js";
import { FragmentRegistryService } from "./fragment-registry.service.js";
import { ReferenceResolverService } from "./reference-resolver.service.js";

@Module({
	providers: [
		FragmentLoaderService,
		FragmentRegistryService,
		ReferenceResolverService,
	],
	exports: [
		FragmentLoaderService,
		FragmentRegistryService,
		ReferenceResolverService,
	],
})
export class FragmentsModule {}
