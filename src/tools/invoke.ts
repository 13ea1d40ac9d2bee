import { Value } from "@sinclair/typebox/value";
import { nanoid } from "nanoid";
import type { StructuredError } from "../errors.js";
import { InvalidArgumentError, SearchConsoleError, toStructuredError } from "../errors.js";
import type { Logger } from "../observe/logger.js";
import type { ToolDefinition, ToolResult } from "./session-tools.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorResult(error: StructuredError): ToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify({ error }, null, 2) }],
		details: { error },
		isError: true,
	};
}

/**
 * Validates `params` against the tool's schema and runs it. Failures come
 * back as an `isError` result carrying `{code, message, recoveryHint}`.
 */
export async function invokeTool(
	tools: readonly ToolDefinition[],
	name: string,
	params: unknown,
	logger?: Logger,
): Promise<ToolResult> {
	const callId = nanoid(10);
	const log = logger?.child({ component: "tools", tool: name, callId });

	try {
		const tool = tools.find((candidate) => candidate.name === name);
		if (!tool) {
			throw new InvalidArgumentError(
				`unknown tool "${name}"`,
				`Use one of: ${tools.map((t) => t.name).join(", ")}.`,
			);
		}

		const args = params ?? {};
		if (!isRecord(args) || !Value.Check(tool.parameters, args)) {
			const first = Value.Errors(tool.parameters, args).First();
			const where = first ? `${first.path || "/"}: ${first.message}` : "arguments must be an object";
			throw new InvalidArgumentError(`invalid arguments for ${name} (${where})`);
		}

		const startedAt = performance.now();
		const result = await tool.execute(args);
		log?.info({ durationMs: Math.round(performance.now() - startedAt) }, "tool completed");
		return result;
	} catch (err) {
		if (err instanceof SearchConsoleError) {
			log?.warn({ code: err.code, error: err.message }, "tool failed");
			return errorResult({ code: err.code, message: err.message, recoveryHint: err.recoveryHint });
		}
		log?.error({ err }, "tool failed unexpectedly");
		const structured = toStructuredError(err);
		return errorResult(
			typeof structured === "string"
				? { code: "INTERNAL", message: structured, recoveryHint: "Check the server log and retry." }
				: structured,
		);
	}
}
