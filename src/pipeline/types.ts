export type ImageReference = {
	readonly repository: string;
	readonly tag: string;
	readonly digest: string | null;
};

export type SubAction =
	| { readonly kind: "shell"; readonly command: string }
	| { readonly kind: "exec"; readonly argv: readonly string[] };

export type SetUserStep = {
	readonly kind: "SET_USER";
	readonly line: number;
	readonly identity: string;
};

/**
 * A transactional step: the sub-actions share one atomicity boundary and
 * either all succeed, producing one layer, or the step fails as a whole.
 */
export type RunStep = {
	readonly kind: "RUN";
	readonly line: number;
	readonly actions: readonly SubAction[];
};

export type CommentStep = {
	readonly kind: "COMMENT";
	readonly line: number;
	readonly text: string;
};

export type Step = SetUserStep | RunStep | CommentStep;

export type BuildPlan = {
	readonly from: ImageReference;
	readonly fromLine: number;
	readonly steps: readonly Step[];
};

export type BaseImage<S> = {
	readonly reference: ImageReference;
	readonly defaultUser: string;
	readonly state: S;
};

export type Layer = {
	readonly id: string;
	readonly stepIndex: number;
	readonly line: number;
	readonly instruction: string;
};

export type BuildContext<S> = {
	readonly buildId: string;
	readonly identity: string;
	readonly state: S;
	readonly layers: readonly Layer[];
};

export type ResultingImage<S> = {
	readonly buildId: string;
	readonly base: ImageReference;
	readonly user: string;
	readonly layers: readonly Layer[];
	readonly state: S;
};

export type RunOutcome<S> =
	| { readonly status: "ok"; readonly state: S; readonly output: string }
	| {
			readonly status: "failed";
			readonly exitCode: number;
			readonly output: string;
			/** Index of the sub-action that failed, when it can be told. */
			readonly subActionIndex: number | null;
	  }
	| { readonly status: "unknown-identity"; readonly output: string };

export interface ImageBackend<S> {
	resolve(reference: ImageReference): Promise<BaseImage<S>>;
	/** Whether an image is already available under this reference. */
	exists(reference: ImageReference): Promise<boolean>;
	hasPrincipal(state: S, name: string): Promise<boolean>;
	/**
	 * Runs the sub-actions of one RUN step in a single shell invocation:
	 * later sub-actions see the working directory and variables left by
	 * earlier ones, and the first failure stops the rest.
	 */
	run(
		state: S,
		identity: string,
		actions: readonly SubAction[]
	): Promise<RunOutcome<S>>;
	finalize(state: S, identity: string): Promise<S>;
}
