#!/usr/bin/env node
import { resolveConfig } from "./config.js";
import { toStructuredError } from "./errors.js";
import { createToolkit } from "./index.js";
import { startStdioServer } from "./server.js";

async function main(): Promise<void> {
	const toolkit = await createToolkit(resolveConfig(process.env));
	const server = await startStdioServer(toolkit);

	let stopping = false;
	const stop = async (signal: string): Promise<void> => {
		if (stopping) {
			return;
		}
		stopping = true;
		toolkit.context.logger.info({ signal }, "stopping");
		await server.close();
		await toolkit.shutdown();
		process.exit(0);
	};
	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			stop(signal).catch((err: unknown) => {
				process.stderr.write(`shutdown failed: ${JSON.stringify(toStructuredError(err))}\n`);
				process.exit(1);
			});
		});
	}
}

main().catch((err: unknown) => {
	process.stderr.write(`search-console-bridge failed to start: ${JSON.stringify(toStructuredError(err))}\n`);
	process.exit(1);
});
