import { connect } from "@dagger.io/dagger";
import { Command } from "commander";
import { daggerBackend, publishImage } from "./backends/dagger.js";
import { descriptorPath, loadConfig, type BuildConfig } from "./config.js";
import {
	formatImageReference,
	parseImageReference,
} from "./descriptor/image-ref.js";
import { parseDescriptor } from "./descriptor/parse.js";
import {
	BuildError,
	ConfigError,
	DescriptorError,
} from "./pipeline/errors.js";
import { buildOrReuse } from "./pipeline/pipeline.js";
import { consoleReporter, describeStep } from "./pipeline/reporter.js";
import type { BuildPlan, ImageReference } from "./pipeline/types.js";

export type Build = (
	plan: BuildPlan,
	config: BuildConfig,
	log: (line: string) => void
) => Promise<void>;

export type CliDependencies = {
	readonly env: Record<string, string | undefined>;
	readonly readFile: (path: string) => Promise<string>;
	readonly log: (line: string) => void;
	readonly build: Build;
};

/** The `name:version` reference a build may reuse, when reuse is on. */
export const reuseTarget = (config: BuildConfig): ImageReference | null => {
	if (!config.reuseExisting || config.imageName === null) return null;

	const address = `${config.imageName}:${config.version}`;
	const reference = parseImageReference(address);
	if (!reference) {
		throw new ConfigError([`IMAGE_NAME: invalid image reference ${address}`]);
	}
	return reference;
};

export const buildWithDagger: Build = async (plan, config, log) => {
	await connect(
		async (client) => {
			const outcome = await buildOrReuse(daggerBackend(client), plan, {
				strictIdentity: config.strictIdentity,
				reporter: consoleReporter(log),
				reuse: reuseTarget(config),
			});

			if (outcome.status === "reused") {
				log(`Reusing ${formatImageReference(outcome.reference)}`);
				return;
			}

			const { image } = outcome;
			if (config.publish && config.imageName !== null) {
				await publishImage(image.state, config.imageName, config.tags, log);
			} else {
				log(`Skipping publish as $PUBLISH is not set to true`);
				await image.state.sync();
			}
		},
		{ LogOutput: process.stderr }
	);
};

export const formatPlan = (plan: BuildPlan): string[] => [
	`${plan.fromLine}: FROM ${formatImageReference(plan.from)}`,
	...plan.steps.map((step) => `${step.line}: ${describeStep(step)}`),
];

/** Prints a failure and returns the exit status for it. */
export const reportFailure = (
	error: unknown,
	log: (line: string) => void = console.error
): number => {
	if (error instanceof BuildError) {
		log(error.message);
		if (error.output.length > 0) log(error.output.trimEnd());
		return error.exitCode;
	}
	if (error instanceof DescriptorError || error instanceof ConfigError) {
		log(error.message);
		return 1;
	}
	throw error;
};

type BuildFlags = {
	name?: string;
	tag?: string;
	publish?: boolean;
	strictIdentity?: boolean;
	ifMissing?: boolean;
};

const FILE_HELP = "descriptor to read (default: $DESCRIPTOR or Containerfile)";

export const createProgram = (deps: CliDependencies): Command => {
	const program = new Command("provision").description(
		"Replay a container descriptor as an ordered provisioning pipeline"
	);

	program
		.command("plan")
		.description("Print the parsed build plan")
		.argument("[file]", FILE_HELP)
		.action(async (file: string | undefined) => {
			const text = await deps.readFile(descriptorPath(deps.env, file));
			for (const line of formatPlan(parseDescriptor(text))) deps.log(line);
		});

	program
		.command("build")
		.description("Build the image described by the descriptor")
		.argument("[file]", FILE_HELP)
		.option("-n, --name <name>", "image name to publish as")
		.option("-t, --tag <tag>", "image tag, published next to latest")
		.option("--publish", "push the result to the registry")
		.option(
			"--strict-identity",
			"fail a USER step whose principal does not exist"
		)
		.option("--if-missing", "reuse <name>:<tag> when it already exists")
		.action(async (file: string | undefined, options: BuildFlags) => {
			const config = loadConfig(deps.env, {
				descriptor: file,
				imageName: options.name,
				tag: options.tag,
				publish: options.publish,
				strictIdentity: options.strictIdentity,
				reuseExisting: options.ifMissing,
			});
			const plan = parseDescriptor(await deps.readFile(config.descriptor));
			await deps.build(plan, config, deps.log);
		});

	return program;
};
