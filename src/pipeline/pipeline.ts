import { createHash, randomUUID } from "node:crypto";
import { formatImageReference } from "../descriptor/image-ref.js";
import { BuildError } from "./errors.js";
import { describeStep, silentReporter, type Reporter } from "./reporter.js";
import type {
	BaseImage,
	BuildContext,
	BuildPlan,
	ImageBackend,
	ImageReference,
	ResultingImage,
	RunStep,
	SetUserStep,
	Step,
} from "./types.js";

export type PipelineOptions = {
	/** Check that a principal exists when a USER step names it. */
	readonly strictIdentity?: boolean;
	readonly reporter?: Reporter;
	readonly signal?: AbortSignal;
	readonly buildId?: string;
};

type StepOptions = {
	readonly strictIdentity: boolean;
	readonly reporter: Reporter;
};

const layerId = (buildId: string, index: number, instruction: string) =>
	createHash("sha256")
		.update(`${buildId}\0${index}\0${instruction}`)
		.digest("hex");

const fail = (error: BuildError, index: number, reporter: Reporter): never => {
	reporter({ type: "step-failed", index, error });
	throw error;
};

const setUser = async <S>(
	backend: ImageBackend<S>,
	context: BuildContext<S>,
	index: number,
	step: SetUserStep,
	options: StepOptions
): Promise<BuildContext<S>> => {
	if (options.strictIdentity) {
		const exists = await backend.hasPrincipal(context.state, step.identity);
		if (!exists) {
			fail(
				new BuildError(
					"unknown-identity",
					`user ${step.identity} does not exist in the image`,
					{ step: { index, step }, identity: context.identity }
				),
				index,
				options.reporter
			);
		}
	}

	options.reporter({
		type: "identity-changed",
		from: context.identity,
		to: step.identity,
	});
	return { ...context, identity: step.identity };
};

const run = async <S>(
	backend: ImageBackend<S>,
	context: BuildContext<S>,
	index: number,
	step: RunStep,
	options: StepOptions
): Promise<BuildContext<S>> => {
	// the committed state stays untouched unless every sub-action passes
	const outcome = await backend.run(
		context.state,
		context.identity,
		step.actions
	);
	const details = {
		step: { index, step },
		identity: context.identity,
		output: outcome.output,
	};

	switch (outcome.status) {
		case "unknown-identity":
			return fail(
				new BuildError(
					"unknown-identity",
					`cannot run as ${context.identity}: no such user in the image`,
					details
				),
				index,
				options.reporter
			);
		case "failed": {
			const failed = outcome.subActionIndex;
			const count = step.actions.length;
			const which =
				failed === null ? "command" : `sub-command ${failed + 1} of ${count}`;
			return fail(
				new BuildError(
					"command-failed",
					`line ${step.line}: ${which} exited with code ${outcome.exitCode}`,
					{
						...details,
						exitCode: outcome.exitCode,
						subActionIndex: outcome.subActionIndex ?? undefined,
					}
				),
				index,
				options.reporter
			);
		}
	}

	options.reporter({ type: "run-completed", index, output: outcome.output });

	const instruction = describeStep(step);
	const layer = {
		id: layerId(context.buildId, index, instruction),
		stepIndex: index,
		line: step.line,
		instruction,
	};
	options.reporter({ type: "layer-committed", layer });

	return {
		...context,
		state: outcome.state,
		layers: [...context.layers, layer],
	};
};

/**
 * Applies one step to a build context and returns the next context. The
 * input context is never modified.
 */
export const applyStep = async <S>(
	backend: ImageBackend<S>,
	context: BuildContext<S>,
	index: number,
	step: Step,
	options: PipelineOptions = {}
): Promise<BuildContext<S>> => {
	const stepOptions: StepOptions = {
		strictIdentity: options.strictIdentity ?? false,
		reporter: options.reporter ?? silentReporter,
	};
	stepOptions.reporter({ type: "step-started", index, step });

	switch (step.kind) {
		case "COMMENT":
			stepOptions.reporter({ type: "comment", text: step.text });
			return context;
		case "SET_USER":
			return setUser(backend, context, index, step, stepOptions);
		case "RUN":
			return run(backend, context, index, step, stepOptions);
	}
};

const resolveBase = async <S>(
	backend: ImageBackend<S>,
	plan: BuildPlan
): Promise<BaseImage<S>> => {
	try {
		return await backend.resolve(plan.from);
	} catch (cause) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		const reference = formatImageReference(plan.from);
		throw new BuildError(
			"unresolvable-base",
			`cannot resolve base image ${reference}: ${reason}`,
			{ cause, output: reason }
		);
	}
};

export const runPipeline = async <S>(
	backend: ImageBackend<S>,
	plan: BuildPlan,
	options: PipelineOptions = {}
): Promise<ResultingImage<S>> => {
	const reporter = options.reporter ?? silentReporter;
	const buildId = options.buildId ?? randomUUID();

	const cancelled = (index: number | null) =>
		new BuildError("cancelled", "build cancelled", {
			cause: options.signal?.reason,
			step: index === null ? undefined : { index, step: plan.steps[index] },
		});

	if (options.signal?.aborted) throw cancelled(null);

	const base = await resolveBase(backend, plan);
	reporter({
		type: "base-resolved",
		reference: base.reference,
		user: base.defaultUser,
	});

	let context: BuildContext<S> = {
		buildId,
		identity: base.defaultUser,
		state: base.state,
		layers: [],
	};

	for (const [index, step] of plan.steps.entries()) {
		if (options.signal?.aborted) throw cancelled(index);
		context = await applyStep(backend, context, index, step, options);
	}

	if (options.signal?.aborted) throw cancelled(null);

	const state = await backend.finalize(context.state, context.identity);
	reporter({ type: "build-completed", buildId, user: context.identity });

	return {
		buildId,
		base: plan.from,
		user: context.identity,
		layers: context.layers,
		state,
	};
};

export type BuildOutcome<S> =
	| { readonly status: "reused"; readonly reference: ImageReference }
	| { readonly status: "built"; readonly image: ResultingImage<S> };

/**
 * Runs the pipeline unless `reuse` names an image the backend already
 * has, in which case nothing is built.
 */
export const buildOrReuse = async <S>(
	backend: ImageBackend<S>,
	plan: BuildPlan,
	options: PipelineOptions & { readonly reuse?: ImageReference | null } = {}
): Promise<BuildOutcome<S>> => {
	const { reuse, ...pipelineOptions } = options;
	if (reuse && (await backend.exists(reuse))) {
		return { status: "reused", reference: reuse };
	}

	const image = await runPipeline(backend, plan, pipelineOptions);
	return { status: "built", image };
};
