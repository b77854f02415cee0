import { z } from "zod";
import { ConfigError } from "./errors.js";

export const detectionConfigSchema = z
	.object({
		/** Minimum columns for a region to count as a table */
		minColumns: z.number().int().min(1).default(2),
		/** Minimum rows for a region to count as a table */
		minRows: z.number().int().min(1).default(2),
		/** Consecutive empty rows tolerated while extending a table downward */
		maxEmptyRows: z.number().int().min(0).default(2),
		/** Minimum non-empty ratio for a window to count as dense */
		headerDensity: z.number().min(0).max(1).default(0.5),
		/** Minimum share of the dominant type for a column to count as consistent */
		columnConsistency: z.number().min(0).max(1).default(0.7),
		/** Copy the origin value of a merged region into every cell of the region */
		expandMergedCells: z.boolean().default(true),
		/** Attach merge metadata to every cell of a merged region */
		trackMergeMetadata: z.boolean().default(true),
	})
	.strict();

export type DetectionConfig = Readonly<z.output<typeof detectionConfigSchema>>;
export type DetectionConfigInput = z.input<typeof detectionConfigSchema>;

/**
 * Validate a partial detection configuration and fill in defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(input: DetectionConfigInput = {}): DetectionConfig {
	const result = detectionConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
		throw new ConfigError(`Detection config validation failed:\n  ${issues.join("\n  ")}`, issues);
	}
	return Object.freeze(result.data);
}

export const DEFAULT_CONFIG: DetectionConfig = resolveConfig();
