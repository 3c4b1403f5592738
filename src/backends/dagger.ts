import { DaggerSDKError, ExecError } from "@dagger.io/dagger";
import { failedSubAction, toShellScript } from "../descriptor/command.js";
import { formatImageReference } from "../descriptor/image-ref.js";
import type { ImageBackend, SubAction } from "../pipeline/types.js";

/** The part of a Dagger `Container` the backend drives. */
export interface EngineContainer {
	from(address: string): EngineContainer;
	sync(): Promise<EngineContainer>;
	user(): Promise<string>;
	withUser(name: string): EngineContainer;
	withExec(
		args: string[],
		opts?: { skipEntrypoint?: boolean }
	): EngineContainer;
	stdout(): Promise<string>;
	publish(address: string): Promise<string>;
}

/** The part of a Dagger `Client` the backend drives. */
export interface EngineClient {
	pipeline(name: string): EngineClient;
	container(): EngineContainer;
}

const UNKNOWN_USER = /unable to find user|no matching entries in passwd file/i;

// exec form runs without a shell, like Docker's RUN ["cmd", "arg"]
const argv = (actions: readonly SubAction[]): string[] => {
	const [first] = actions;
	if (actions.length === 1 && first.kind === "exec") return [...first.argv];
	return ["sh", "-c", toShellScript(actions)];
};

/**
 * Runs build steps on a Dagger engine. A RUN step is one `withExec`, so
 * its sub-actions share a shell and nothing is kept unless all pass.
 */
export const daggerBackend = (
	client: EngineClient
): ImageBackend<EngineContainer> => {
	const pipeline = client.pipeline("provision");

	const backend: ImageBackend<EngineContainer> = {
		resolve: async (reference) => {
			const container = await pipeline
				.container()
				.from(formatImageReference(reference))
				.sync();
			const user = await container.user();

			return {
				reference,
				defaultUser: user.length > 0 ? user : "root",
				state: container,
			};
		},

		exists: async (reference) => {
			try {
				await pipeline
					.container()
					.from(formatImageReference(reference))
					.sync();
				return true;
			} catch (error) {
				if (error instanceof DaggerSDKError) return false;
				throw error;
			}
		},

		hasPrincipal: async (container, name) => {
			try {
				await container
					.withUser("root")
					.withExec(["getent", "passwd", name], { skipEntrypoint: true })
					.stdout();
				return true;
			} catch (error) {
				if (error instanceof ExecError) return false;
				throw error;
			}
		},

		run: async (container, identity, actions) => {
			const next = container
				.withUser(identity)
				.withExec(argv(actions), { skipEntrypoint: true });

			try {
				const output = await next.stdout();
				return { status: "ok", state: next, output };
			} catch (error) {
				if (error instanceof ExecError) {
					const output = `${error.stdout}${error.stderr}`;
					return {
						status: "failed",
						exitCode: error.exitCode,
						output,
						subActionIndex:
							actions.length === 1 ? 0 : failedSubAction(error.stderr),
					};
				}
				if (error instanceof Error && UNKNOWN_USER.test(error.message)) {
					return { status: "unknown-identity", output: error.message };
				}
				throw error;
			}
		},

		finalize: async (container, identity) => container.withUser(identity),
	};

	return Object.freeze(backend);
};

export const publishImage = async (
	container: EngineContainer,
	name: string,
	tags: Iterable<string>,
	log: (line: string) => void = console.log
): Promise<string[]> => {
	const published: string[] = [];
	for (const tag of tags) {
		const address = await container.publish(`${name}:${tag}`);
		log(`Published ${address}`);
		published.push(address);
	}

	return published;
};
