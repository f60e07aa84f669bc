import { z } from "zod";
import { logger } from "./logger.js";
import { DEFAULT_MAX_RANGE_SIZE } from "./parser/types.js";

export const ConfigSchema = z.object({
	PORT: z.coerce.number().default(3000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	MAX_RANGE_SIZE: z.coerce.number().int().positive().default(DEFAULT_MAX_RANGE_SIZE),
	PASSAGE_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
	METADATA_PATH: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(): Config {
	const result = ConfigSchema.safeParse(process.env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}
