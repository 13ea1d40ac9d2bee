import { RpcTransportError } from "../errors.js";

/** Per-request abort signal: fires on timeout or when the caller's signal aborts. */
export interface Deadline {
	signal: AbortSignal;
	timedOut: () => boolean;
	dispose: () => void;
}

export function createDeadline(timeoutMs: number, outer: AbortSignal | undefined): Deadline {
	const controller = new AbortController();
	let expired = false;
	const timer = setTimeout(() => {
		expired = true;
		controller.abort(new Error(`timed out after ${timeoutMs}ms`));
	}, timeoutMs);

	const onOuterAbort = (): void => controller.abort(outer?.reason);
	if (outer?.aborted) {
		controller.abort(outer.reason);
	} else {
		outer?.addEventListener("abort", onOuterAbort, { once: true });
	}

	return {
		signal: controller.signal,
		timedOut: () => expired,
		dispose: () => {
			clearTimeout(timer);
			outer?.removeEventListener("abort", onOuterAbort);
		},
	};
}

function timedOutError(label: string, timeoutMs: number, cause: unknown): RpcTransportError {
	return new RpcTransportError(`${label} timed out after ${timeoutMs}ms`, { cause });
}

function cancelledError(label: string, cause: unknown): RpcTransportError {
	return new RpcTransportError(`${label} was cancelled`, {
		cause,
		recoveryHint: "The call was cancelled by the caller; retry if it is still needed.",
	});
}

export interface TimedRequestOptions {
	timeoutMs: number;
	signal?: AbortSignal | undefined;
	/** Names the request in error messages. */
	label: string;
}

export interface TimedResponse {
	status: number;
	body: Buffer;
}

/**
 * Runs one fetch under a deadline and reads the whole body. Network
 * failures, timeouts and cancellation surface as RpcTransportError.
 */
export async function fetchWithDeadline(
	fetchFn: typeof fetch,
	url: string,
	init: RequestInit,
	opts: TimedRequestOptions,
): Promise<TimedResponse> {
	const deadline = createDeadline(opts.timeoutMs, opts.signal);
	try {
		const response = await fetchFn(url, { ...init, signal: deadline.signal });
		const body = Buffer.from(await response.arrayBuffer());
		return { status: response.status, body };
	} catch (err) {
		if (deadline.timedOut()) {
			throw timedOutError(opts.label, opts.timeoutMs, err);
		}
		if (opts.signal?.aborted) {
			throw cancelledError(opts.label, err);
		}
		const reason = err instanceof Error ? err.message : String(err);
		throw new RpcTransportError(`${opts.label} failed: ${reason}`, { cause: err });
	} finally {
		deadline.dispose();
	}
}

export interface SharedWaitOptions {
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
	label: string;
}

/**
 * Waits on work shared between callers. The caller's timeout and signal
 * end only this wait; the shared work keeps running for everyone else.
 * An already-aborted caller never starts or joins it.
 */
export async function awaitShared<T>(start: () => Promise<T>, opts: SharedWaitOptions): Promise<T> {
	const { signal, timeoutMs, label } = opts;
	if (signal?.aborted) {
		throw cancelledError(label, signal.reason);
	}
	const shared = start();
	if (!signal && timeoutMs === undefined) {
		return shared;
	}

	return new Promise<T>((resolve, reject) => {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const onAbort = (): void => {
			settle();
			reject(cancelledError(label, signal?.reason));
		};
		const settle = (): void => {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		};

		if (timeoutMs !== undefined) {
			timer = setTimeout(() => {
				settle();
				reject(timedOutError(label, timeoutMs, undefined));
			}, timeoutMs);
		}
		signal?.addEventListener("abort", onAbort, { once: true });
		shared.then(
			(value) => {
				settle();
				resolve(value);
			},
			(err: unknown) => {
				settle();
				reject(err);
			},
		);
	});
}
