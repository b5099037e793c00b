/**
 * Reading schema and data documents from disk.
 *
 * YAML is decoded with js-yaml (core schema, so `0.0` stays a number and dates stay strings);
 * `.json` files are decoded with JSON.parse.
 */
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import yaml from "js-yaml";

export function parseDocument(content: string, filePath: string): unknown {
	try {
		if (extname(filePath).toLowerCase() === ".json") {
			return JSON.parse(content);
		}
		return yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath });
	} catch (error) {
		// Parse errors are authoring defects; surface them with the file path
		const errorMessage = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to parse ${filePath}: ${errorMessage}`);
	}
}

export async function readDocument(filePath: string): Promise<unknown> {
	const content = await readFile(filePath, "utf-8");
	return parseDocument(content, filePath);
}
