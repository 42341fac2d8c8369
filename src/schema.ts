import { z } from "zod";

const pathSchema = z.string().trim().min(1);

export const concurrencySchema = z.union([z.number(), z.string().trim()]).pipe(
	z.coerce
		.number({ invalid_type_error: "concurrency must be a number" })
		.int("concurrency must be a whole number")
		.min(1, "concurrency must be at least 1"),
);

export const fileConfigSchema = z
	.object({
		toolPath: pathSchema.optional(),
		outputDir: pathSchema.optional(),
		concurrency: z.number().int().min(1).optional(),
	})
	.strict();

export const runOptionsSchema = z.object({
	toolPath: pathSchema,
	imagePath: pathSchema,
	modulesPath: pathSchema,
	outputDir: pathSchema,
	concurrency: concurrencySchema.optional(),
});

export type RunOptions = z.output<typeof runOptionsSchema>;

export function formatSchemaIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
		)
		.join("; ");
}
