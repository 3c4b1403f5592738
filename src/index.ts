export {
	daggerBackend,
	publishImage,
	type EngineClient,
	type EngineContainer,
} from "./backends/dagger.js";
export {
	descriptorPath,
	loadConfig,
	type BuildConfig,
	type ConfigOverrides,
} from "./config.js";
export {
	parseRunPayload,
	splitConjunction,
	toShellScript,
} from "./descriptor/command.js";
export {
	formatImageReference,
	parseImageReference,
} from "./descriptor/image-ref.js";
export { parseDescriptor } from "./descriptor/parse.js";
export {
	BuildError,
	ConfigError,
	DescriptorError,
	type BuildErrorKind,
} from "./pipeline/errors.js";
export {
	applyStep,
	buildOrReuse,
	runPipeline,
	type BuildOutcome,
	type PipelineOptions,
} from "./pipeline/pipeline.js";
export {
	consoleReporter,
	describeStep,
	formatEvent,
	silentReporter,
	type BuildEvent,
	type Reporter,
} from "./pipeline/reporter.js";
export type * from "./pipeline/types.js";
