import { describeSubAction } from "../descriptor/command.js";
import { formatImageReference } from "../descriptor/image-ref.js";
import type { BuildError } from "./errors.js";
import type { ImageReference, Layer, Step } from "./types.js";

export type BuildEvent =
	| {
			readonly type: "base-resolved";
			readonly reference: ImageReference;
			readonly user: string;
	  }
	| {
			readonly type: "step-started";
			readonly index: number;
			readonly step: Step;
	  }
	| {
			readonly type: "identity-changed";
			readonly from: string;
			readonly to: string;
	  }
	| { readonly type: "comment"; readonly text: string }
	| {
			readonly type: "run-completed";
			readonly index: number;
			readonly output: string;
	  }
	| { readonly type: "layer-committed"; readonly layer: Layer }
	| {
			readonly type: "step-failed";
			readonly index: number;
			readonly error: BuildError;
	  }
	| {
			readonly type: "build-completed";
			readonly buildId: string;
			readonly user: string;
	  };

export type Reporter = (event: BuildEvent) => void;

export const silentReporter: Reporter = () => {};

export const describeStep = (step: Step): string => {
	switch (step.kind) {
		case "SET_USER":
			return `USER ${step.identity}`;
		case "COMMENT":
			return `# ${step.text}`;
		case "RUN":
			return `RUN ${step.actions.map(describeSubAction).join(" && ")}`;
	}
};

export const formatEvent = (event: BuildEvent): string | null => {
	switch (event.type) {
		case "base-resolved": {
			const reference = formatImageReference(event.reference);
			return `FROM ${reference} (user ${event.user})`;
		}
		case "step-started": {
			const { step } = event;
			if (step.kind === "COMMENT") return null;
			return `[${event.index}] line ${step.line}: ${describeStep(step)}`;
		}
		case "identity-changed":
			return `identity ${event.from} -> ${event.to}`;
		case "comment":
			return `# ${event.text}`;
		case "run-completed":
			return "  ok";
		case "layer-committed":
			return `  layer ${event.layer.id.slice(0, 12)}`;
		case "step-failed":
			return `[${event.index}] failed: ${event.error.message}`;
		case "build-completed":
			return `Built ${event.buildId} (user ${event.user})`;
	}
};

export const consoleReporter =
	(log: (line: string) => void = console.log): Reporter =>
	(event) => {
		const line = formatEvent(event);
		if (line !== null) log(line);
	};
