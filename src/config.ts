import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { granularitySchema } from "./windows/time-windows.js";

export const DEFAULT_OUTPUT = "reddit_data.csv";

const dayStringSchema = z
	.string()
	.regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date")
	.transform((value, ctx) => {
		const date = new Date(`${value}T00:00:00.000Z`);
		if (
			Number.isNaN(date.getTime()) ||
			date.toISOString().slice(0, 10) !== value
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Invalid date '${value}'`,
			});
			return z.NEVER;
		}
		return date;
	});

/** `YYYY-MM-DD`, read as midnight UTC. */
export const daySchema = z.union([z.date(), dayStringSchema]);

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const subredditSchema = z
	.string()
	.trim()
	.transform((value) => value.replace(/^\/?r\//i, ""))
	.pipe(z.string().min(1, "subreddit is required"));

const settingsFields = z.object({
	subreddit: subredditSchema,
	query: z.string().default("*"),
	startDate: daySchema.optional(),
	endDate: daySchema.optional(),
	granularity: granularitySchema.default("monthly"),
	output: z.string().min(1).default(DEFAULT_OUTPUT),
	workspace: z.string().min(1).default("."),
	baseDelayMs: z.coerce.number().positive().default(2000),
	maxDelayMs: z.coerce.number().positive().default(300_000),
	/** Sleep `baseDelayMs` before every Nth remote call. */
	politeEvery: positiveInt.default(1),
	batchSize: positiveInt.default(10),
	/** Reddit never returns more than 1000 results for one search. */
	pageCap: positiveInt.max(1000).default(1000),
	maxItemsPerWindow: positiveInt.default(10_000),
	maxTransientRetries: nonNegativeInt.default(3),
	maxRateLimitRetries: nonNegativeInt.default(8),
	requestTimeoutMs: positiveInt.default(10_000),
	sleepBetweenRequestsMs: nonNegativeInt.default(1000),
});

export const settingsSchema = settingsFields.superRefine((settings, ctx) => {
	if (settings.maxDelayMs < settings.baseDelayMs) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ["maxDelayMs"],
			message: `maxDelayMs (${settings.maxDelayMs}) must be >= baseDelayMs (${settings.baseDelayMs})`,
		});
	}
	if (
		settings.startDate &&
		settings.endDate &&
		settings.startDate.getTime() >= settings.endDate.getTime()
	) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ["endDate"],
			message: "endDate must be after startDate",
		});
	}
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsFields>;

/** Flags that pick saved jobs for `status` and `reset`. */
export const jobFilterSchema = z.object({
	subreddit: subredditSchema.optional(),
	query: z.string().optional(),
	granularity: granularitySchema.optional(),
	startDate: daySchema.optional(),
	endDate: daySchema.optional(),
	workspace: z.string().min(1).default("."),
});

const credentialsSchema = z.object({
	clientId: z.string().min(1),
	clientSecret: z.string().min(1),
	userAgent: z.string().min(1),
});

export type Credentials = z.infer<typeof credentialsSchema>;
export type CredentialsInput = Partial<Credentials>;

const configFileSchema = settingsFields.partial().extend({
	clientId: z.string().optional(),
	clientSecret: z.string().optional(),
	userAgent: z.string().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

const credentialKeys = ["clientId", "clientSecret", "userAgent"] as const;

const credentialSources: Record<
	keyof Credentials,
	{ env: string; flag: string }
> = {
	clientId: { env: "REDDIT_CLIENT_ID", flag: "--client-id" },
	clientSecret: { env: "REDDIT_CLIENT_SECRET", flag: "--client-secret" },
	userAgent: { env: "REDDIT_USER_AGENT", flag: "--user-agent" },
};

function withoutUndefined(
	value: Record<string, unknown>,
): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(value).filter(([, entry]) => entry !== undefined),
	);
}

/** Built-in defaults, then the config file, then flags. */
export function resolveSettings(layers: {
	file?: Partial<SettingsInput>;
	flags?: Partial<SettingsInput>;
}): Settings {
	return settingsSchema.parse({
		...withoutUndefined(layers.file ?? {}),
		...withoutUndefined(layers.flags ?? {}),
	});
}

export function resolveCredentials(
	input: CredentialsInput,
	env: NodeJS.ProcessEnv = process.env,
): Credentials {
	const merged = {
		clientId: input.clientId || env.REDDIT_CLIENT_ID,
		clientSecret: input.clientSecret || env.REDDIT_CLIENT_SECRET,
		userAgent: input.userAgent || env.REDDIT_USER_AGENT,
	};

	const missing = credentialKeys
		.filter((key) => !merged[key]?.trim())
		.map((key) => {
			const { env: envVar, flag } = credentialSources[key];
			return `${key} (use ${flag} or ${envVar})`;
		});

	if (missing.length > 0) {
		throw new Error(
			`Missing required Reddit credentials: ${missing.join(", ")}`,
		);
	}

	return credentialsSchema.parse(merged);
}

export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
	const rawText = await readFile(configPath, "utf8");
	const clean = rawText.replace(/^\uFEFF/, "");
	const parsed: unknown = parse(clean) ?? {};

	return configFileSchema.parse(parsed);
}
