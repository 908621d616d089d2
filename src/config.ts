import { z } from "zod";
import { DEFAULT_SUFFIXES } from "./convert/naming";
import { DEFAULT_ZIP_LEVEL } from "./web/constants";
import type { ZipLevel } from "./web/types";

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

const ZIP_LEVELS: readonly ZipLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

export const converterConfigSchema = z.object({
	inputDir: z.string().min(1).default("."),
	outputDir: z.string().min(1).optional(),
	stagingDir: z.string().min(1).optional(),
	overwrite: z.boolean().default(false),
	concurrency: z.number().int().positive().default(1),
	suffixes: z
		.array(z.string().startsWith(".", "Suffixes must start with a dot"))
		.min(1)
		.default([...DEFAULT_SUFFIXES]),
	level: z
		.number()
		.int()
		.min(0)
		.max(9)
		.transform((level) => ZIP_LEVELS[level])
		.default(DEFAULT_ZIP_LEVEL),
	timeout: z.number().int().positive().optional(),
	failFast: z.boolean().default(false),
	logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type ConverterConfig = z.output<typeof converterConfigSchema>;
export type ConverterConfigInput = z.input<typeof converterConfigSchema>;

/**
 * Validates raw settings and fills in defaults. Throws a `ZodError` listing
 * every invalid field.
 */
export function resolveConfig(input: unknown): ConverterConfig {
	return converterConfigSchema.parse(input);
}
