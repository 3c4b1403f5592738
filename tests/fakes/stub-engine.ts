import type {
	EngineClient,
	EngineContainer,
} from "../../src/backends/dagger.js";

export type Evaluation = {
	readonly from: string | null;
	readonly user: string | null;
	readonly args: readonly string[];
	readonly skipEntrypoint: boolean;
};

export type StubBehaviour = {
	/** What `user()` reports for the pulled image. */
	readonly imageUser?: string;
	/** Thrown when a container pulled from this address is synced. */
	readonly pullError?: (address: string) => Error | undefined;
	/** Thrown when an exec is evaluated. */
	readonly execError?: (evaluation: Evaluation) => Error | undefined;
	readonly stdout?: string;
};

type Layer = {
	readonly from: string | null;
	readonly user: string | null;
	readonly exec: { args: string[]; skipEntrypoint: boolean } | null;
};

/** Records what a Dagger container chain would evaluate. */
export class StubEngine implements EngineClient {
	readonly pipelines: string[] = [];
	readonly evaluations: Evaluation[] = [];
	readonly published: string[] = [];

	constructor(readonly behaviour: StubBehaviour = {}) {}

	pipeline(name: string): EngineClient {
		this.pipelines.push(name);
		return this;
	}

	container(): EngineContainer {
		return new StubContainer(this, { from: null, user: null, exec: null });
	}
}

export class StubContainer implements EngineContainer {
	constructor(
		private readonly engine: StubEngine,
		readonly layer: Layer
	) {}

	from(address: string): EngineContainer {
		return new StubContainer(this.engine, { ...this.layer, from: address });
	}

	async sync(): Promise<EngineContainer> {
		const { from } = this.layer;
		const error =
			from === null ? undefined : this.engine.behaviour.pullError?.(from);
		if (error) throw error;
		return this;
	}

	async user(): Promise<string> {
		return this.layer.user ?? this.engine.behaviour.imageUser ?? "";
	}

	withUser(name: string): EngineContainer {
		return new StubContainer(this.engine, { ...this.layer, user: name });
	}

	withExec(
		args: string[],
		opts: { skipEntrypoint?: boolean } = {}
	): EngineContainer {
		return new StubContainer(this.engine, {
			...this.layer,
			exec: { args, skipEntrypoint: opts.skipEntrypoint ?? false },
		});
	}

	async stdout(): Promise<string> {
		const { exec } = this.layer;
		if (exec === null) return "";

		const evaluation: Evaluation = {
			from: this.layer.from,
			user: this.layer.user,
			args: exec.args,
			skipEntrypoint: exec.skipEntrypoint,
		};
		this.engine.evaluations.push(evaluation);

		const error = this.engine.behaviour.execError?.(evaluation);
		if (error) throw error;
		return this.engine.behaviour.stdout ?? "";
	}

	async publish(address: string): Promise<string> {
		this.engine.published.push(address);
		return `${address}@sha256:${"0".repeat(64)}`;
	}
}
