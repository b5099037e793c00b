import { z } from "zod";

/**
 * Data object file read by the `validate` command.
 *
 * A JSON mapping of field name to value; arrays are either nested JSON arrays or
 * `{ "shape": [...], "dtype": "..." }` descriptors.
 */
export const DataFileSchema = z.record(z.string(), z.unknown());

export type DataFile = z.infer<typeof DataFileSchema>;
