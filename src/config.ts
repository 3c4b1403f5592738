import { z } from "zod";
import { ConfigError } from "./pipeline/errors.js";

const flag = z
	.enum(["true", "false", "1", "0", ""])
	.optional()
	.transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
	DESCRIPTOR: z.string().min(1).default("Containerfile"),
	IMAGE_NAME: z.string().min(1).optional(),
	VERSION: z.string().min(1).default("latest"),
	PUBLISH: flag,
	STRICT_IDENTITY: flag,
	REUSE_EXISTING: flag,
});

export type BuildConfig = {
	readonly descriptor: string;
	readonly imageName: string | null;
	readonly version: string;
	readonly tags: ReadonlySet<string>;
	readonly publish: boolean;
	readonly strictIdentity: boolean;
	/** Skip the build when `imageName:version` already resolves. */
	readonly reuseExisting: boolean;
};

export type ConfigOverrides = {
	readonly descriptor?: string;
	readonly imageName?: string;
	readonly tag?: string;
	readonly publish?: boolean;
	readonly strictIdentity?: boolean;
	readonly reuseExisting?: boolean;
};

type Env = Record<string, string | undefined>;

const parse = <T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> => {
	const parsed = schema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`
			)
		);
	}
	return parsed.data;
};

/** Path of the descriptor to read, without the rest of the build settings. */
export const descriptorPath = (env: Env, override?: string): string =>
	override ?? parse(EnvSchema.pick({ DESCRIPTOR: true }), env).DESCRIPTOR;

/**
 * Reads build settings from the environment; explicit overrides (CLI
 * flags) win. Publishing and reuse need an image name.
 */
export const loadConfig = (
	env: Env,
	overrides: ConfigOverrides = {}
): BuildConfig => {
	const settings = parse(EnvSchema, env);

	const version = overrides.tag ?? settings.VERSION;
	const config: BuildConfig = {
		descriptor: overrides.descriptor ?? settings.DESCRIPTOR,
		imageName: overrides.imageName ?? settings.IMAGE_NAME ?? null,
		version,
		tags: new Set([version, "latest"]),
		publish: overrides.publish ?? settings.PUBLISH,
		strictIdentity: overrides.strictIdentity ?? settings.STRICT_IDENTITY,
		reuseExisting: overrides.reuseExisting ?? settings.REUSE_EXISTING,
	};

	if (config.imageName === null) {
		const issues = [
			...(config.publish ? ["IMAGE_NAME: required when publishing"] : []),
			...(config.reuseExisting
				? ["IMAGE_NAME: required to reuse an existing image"]
				: []),
		];
		if (issues.length > 0) throw new ConfigError(issues);
	}

	return config;
};
