import * as z from "zod";

const MAX_JOB_ID_LENGTH = 100;
// The id names the working copy directory `repo-<id>`
const JOB_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const LogLevelSchema = z.enum([
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
]);

export const JobSchema = z
	.object({
		id: z
			.string()
			.min(1, { message: "id must not be empty" })
			.max(MAX_JOB_ID_LENGTH, {
				message: `id must be at most ${MAX_JOB_ID_LENGTH} characters`,
			})
			.regex(JOB_ID_PATTERN, {
				message:
					"id must start with a letter or digit and contain only letters, digits, '.', '_' and '-'",
			})
			.refine((value) => !value.includes(".."), {
				message: "id must not contain '..'",
			}),
		from: z.string().min(1, { message: "from must not be empty" }),
		to: z.string().min(1, { message: "to must not be empty" }),
		httpCookie: z.string().min(1).optional(),
		branch: z.string().min(1).optional(),
	})
	.strict();

export const JobListSchema = z
	.array(JobSchema)
	.min(1, { message: "at least one job must be configured" })
	.superRefine((jobs, ctx) => {
		const seen = new Set<string>();
		const duplicates = new Set<string>();
		for (const job of jobs) {
			if (seen.has(job.id)) {
				duplicates.add(job.id);
			} else {
				seen.add(job.id);
			}
		}
		if (duplicates.size > 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Duplicate job IDs found: ${Array.from(duplicates).join(", ")}.`,
			});
		}
	});

const positiveInt = z.number().int().positive();

export const SettingsSchema = z
	.object({
		port: positiveInt.max(65535),
		workDir: z.string().min(1),
		syncIntervalMs: positiveInt,
		staleAfterMs: positiveInt,
		gitTimeoutMs: positiveInt,
		logLevel: LogLevelSchema,
	})
	.strict();

export type MirrorJob = z.infer<typeof JobSchema>;
export type MirrorSettings = z.infer<typeof SettingsSchema>;
