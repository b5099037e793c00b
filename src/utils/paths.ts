/**
 * @fileoverview Centralized path utilities for arraymodel
 *
 * All arraymodel data is stored in ~/.arraymodel/:
 * - schemas/   Schema fragment documents (YAML or JSON)
 * - .env       Engine configuration overrides
 */

import { homedir } from "node:os";
import { join } from "node:path";

// Default home directory, can be overridden for testing
let homeOverride: string | null = null;

/**
 * Override the arraymodel home path (for testing only)
 */
export function setArraymodelHomeForTesting(path: string | null): void {
	homeOverride = path;
}

/**
 * Get the root arraymodel directory path (~/.arraymodel)
 */
export function getArraymodelHome(): string {
	if (homeOverride) {
		return homeOverride;
	}
	return join(homedir(), ".arraymodel");
}

/**
 * Get the default schema directory path (~/.arraymodel/schemas)
 */
export function getSchemasPath(): string {
	return join(getArraymodelHome(), "schemas");
}

/**
 * Get the environment file path (~/.arraymodel/.env)
 */
export function getEnvPath(): string {
	return join(getArraymodelHome(), ".env");
}

/**
 * Normalize a path to forward slashes so fragment ids are stable across platforms
 */
export function toPosixPath(path: string): string {
	return path.split("\\").join("/");
}
