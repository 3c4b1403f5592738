import type { Step } from "./types.js";

export type BuildErrorKind =
	| "unresolvable-base"
	| "unknown-identity"
	| "command-failed"
	| "cancelled";

export type BuildErrorDetails = {
	readonly step?: { readonly index: number; readonly step: Step };
	readonly identity?: string;
	readonly subActionIndex?: number;
	readonly exitCode?: number;
	readonly output?: string;
	readonly cause?: unknown;
};

export class BuildError extends Error {
	readonly kind: BuildErrorKind;
	readonly step: { readonly index: number; readonly step: Step } | null;
	readonly identity: string | null;
	readonly subActionIndex: number | null;
	readonly output: string;
	/** Process exit status for this failure; never zero. */
	readonly exitCode: number;

	constructor(
		kind: BuildErrorKind,
		message: string,
		details: BuildErrorDetails = {}
	) {
		super(message, { cause: details.cause });
		this.name = "BuildError";
		this.kind = kind;
		this.step = details.step ?? null;
		this.identity = details.identity ?? null;
		this.subActionIndex = details.subActionIndex ?? null;
		this.output = details.output ?? "";
		this.exitCode = details.exitCode ? details.exitCode : 1;
	}
}

export class DescriptorError extends Error {
	readonly line: number;

	constructor(line: number, message: string) {
		super(`line ${line}: ${message}`);
		this.name = "DescriptorError";
		this.line = line;
	}
}

export class ConfigError extends Error {
	readonly issues: readonly string[];

	constructor(issues: readonly string[]) {
		super(`invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}
