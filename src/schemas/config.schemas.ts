import { z } from "zod";

const BooleanFlagSchema = z
	.union([z.boolean(), z.enum(["true", "false", "1", "0"])])
	.transform((value) => value === true || value === "true" || value === "1");

/**
 * Engine configuration schema
 *
 * Note: the schema path default (~/.arraymodel/schemas) is applied by the registry,
 * see src/utils/paths.ts.
 */
export const EngineConfigSchema = z.object({
	schemaPath: z.string().min(1).optional(),
	schemaGlob: z.string().min(1).default("**/*.{yaml,yml,json}"),
	// Abort init on the first malformed document, otherwise skip and report it
	strictLoad: BooleanFlagSchema.default(true),
	cacheEffectiveSchemas: BooleanFlagSchema.default(true),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
