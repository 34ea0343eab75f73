import { setTimeout as sleep } from "node:timers/promises";
import { AdapterError, type Diagnostics, type Result, silentDiagnostics } from "@loadstone/core";
import { readString, wrapAsync } from "./shared";

export const DEFAULT_QUERY_API_URL = "https://api.dune.com/api/v1";

/** States that end a successful execution (compared lower-cased) */
export const COMPLETED_STATES: ReadonlySet<string> = new Set([
	"completed",
	"success",
	"succeeded",
	"finished",
	"done",
	"query_state_completed",
]);

/** States that end a failed execution (compared lower-cased) */
export const FAILED_STATES: ReadonlySet<string> = new Set([
	"failed",
	"error",
	"cancelled",
	"query_state_failed",
]);

export interface QueryExecutionConfig {
	apiKey: string;
	/** API root (defaults to {@link DEFAULT_QUERY_API_URL}) */
	baseUrl?: string;
	diagnostics?: Diagnostics;
}

export interface WaitOptions {
	/** Give up after this long (default 15 minutes) */
	timeoutMs?: number;
	/** Delay between status polls (default 2 seconds) */
	pollMs?: number;
}

/**
 * Client for a remote query API that runs saved queries asynchronously.
 *
 * `execute` submits a run and returns its execution id;
 * `waitForCompletion` polls the run's status until it settles.
 */
export class QueryExecutionClient {
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly diagnostics: Diagnostics;

	constructor(config: QueryExecutionConfig) {
		this.apiKey = config.apiKey;
		this.baseUrl = (config.baseUrl ?? DEFAULT_QUERY_API_URL).replace(/\/+$/, "");
		this.diagnostics = config.diagnostics ?? silentDiagnostics;
	}

	private headers(): Record<string, string> {
		return {
			"X-Dune-Api-Key": this.apiKey,
			"Content-Type": "application/json",
			Accept: "application/json",
		};
	}

	private async getJson(path: string): Promise<unknown> {
		const response = await fetch(`${this.baseUrl}${path}`, {
			headers: this.headers(),
			signal: AbortSignal.timeout(30_000),
		});
		if (!response.ok) {
			throw new AdapterError(`GET ${path} returned ${response.status}: ${await response.text()}`);
		}
		return response.json();
	}

	/** Start a run of a saved query with the given parameters */
	async execute(
		queryId: string,
		parameters: Readonly<Record<string, string>>,
	): Promise<Result<string, AdapterError>> {
		return wrapAsync(async () => {
			const response = await fetch(
				`${this.baseUrl}/query/${encodeURIComponent(queryId)}/execute`,
				{
					method: "POST",
					headers: this.headers(),
					body: JSON.stringify({ query_parameters: parameters }),
					signal: AbortSignal.timeout(60_000),
				},
			);
			if (!response.ok) {
				throw new AdapterError(
					`Execute request returned ${response.status}: ${await response.text()}`,
				);
			}
			const body: unknown = await response.json();
			const executionId = readString(body, "execution_id") ?? readString(body, "executionId");
			if (executionId === undefined) {
				throw new AdapterError(`Unexpected execute response: ${JSON.stringify(body)}`);
			}
			this.diagnostics.info("Remote execution started", { queryId, executionId });
			return executionId;
		}, `Failed to execute query ${queryId}`);
	}

	/**
	 * Poll an execution until it reaches a completed or failed state.
	 *
	 * @returns Ok with the final state, or Err when the run failed or the timeout elapsed
	 */
	async waitForCompletion(
		executionId: string,
		options: WaitOptions = {},
	): Promise<Result<string, AdapterError>> {
		const timeoutMs = options.timeoutMs ?? 900_000;
		const pollMs = options.pollMs ?? 2_000;
		const statusPath = `/execution/${encodeURIComponent(executionId)}/status`;

		return wrapAsync(async () => {
			const deadline = Date.now() + timeoutMs;
			let lastState: string | undefined;

			while (Date.now() < deadline) {
				const status = await this.getJson(statusPath);
				const state = (readString(status, "state") ?? "").toLowerCase();
				if (state !== lastState) {
					this.diagnostics.info("Remote execution state", { executionId, state });
					lastState = state;
				}

				if (COMPLETED_STATES.has(state)) {
					return state;
				}
				if (FAILED_STATES.has(state)) {
					throw new AdapterError(
						`Execution ${executionId} ended in state ${state}${await this.failureDetail(executionId)}`,
					);
				}
				await sleep(pollMs);
			}

			throw new AdapterError(
				`Timed out after ${timeoutMs}ms waiting for execution ${executionId}; check ${this.baseUrl}${statusPath}`,
			);
		}, `Failed waiting for execution ${executionId}`);
	}

	/** Best-effort fetch of the results body, which carries the error details of a failed run. */
	private async failureDetail(executionId: string): Promise<string> {
		try {
			const body = await this.getJson(`/execution/${encodeURIComponent(executionId)}/results`);
			return `: ${JSON.stringify(body)}`;
		} catch (error) {
			this.diagnostics.warn("Could not fetch failure details", {
				executionId,
				error: error instanceof Error ? error.message : String(error),
			});
			return "";
		}
	}
}
