import { randomUUID } from "node:crypto";
import axios, { isAxiosError, type AxiosInstance } from "axios";
import { CancelledError, ExecutionError } from "../core/errors.js";
import { pause } from "../core/timeout.js";
import type { ExecutionCollaborator, ExecutionRequest, ExecutionResult, HostServer, RunScope } from "./types.js";

const POLL_INTERVAL_MS = 2000;
const REQUEST_TIMEOUT_MS = 30_000;

export type HistoryState =
  | { state: "pending" }
  | { state: "success"; outputs: Record<string, unknown> }
  | { state: "error"; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeMessage(message: unknown): string {
  // [event, data] pairs; execution_error carries the node and exception
  if (Array.isArray(message) && message.length === 2 && typeof message[0] === "string") {
    const [event, data] = message;
    if (event === "execution_error" && isRecord(data)) {
      const node = typeof data.node_id === "string" ? `node ${data.node_id}` : "node ?";
      const type = typeof data.node_type === "string" ? ` (${data.node_type})` : "";
      const text = typeof data.exception_message === "string" ? data.exception_message.trim() : "execution error";
      return `${node}${type}: ${text}`;
    }
    return event;
  }
  if (isRecord(message) && typeof message.message === "string") return message.message;
  return JSON.stringify(message);
}

/** Read one `/history/{id}` entry. An absent entry means still queued or running. */
export function interpretHistory(entry: unknown): HistoryState {
  if (!isRecord(entry)) return { state: "pending" };
  const status = isRecord(entry.status) ? entry.status : {};
  const outputs = isRecord(entry.outputs) ? entry.outputs : {};

  if (status.status_str === "error") {
    const messages = Array.isArray(status.messages) ? status.messages : [];
    const errors = messages.filter((m) => Array.isArray(m) && m[0] === "execution_error");
    const described = (errors.length > 0 ? errors : messages).map(describeMessage);
    return { state: "error", message: described.length > 0 ? described.join("; ") : "Unknown error" };
  }

  for (const [nodeId, output] of Object.entries(outputs)) {
    if (isRecord(output) && output.error) {
      return { state: "error", message: `node ${nodeId}: ${String(output.error)}` };
    }
  }

  if (status.status_str === "success" || status.completed === true) return { state: "success", outputs };
  return { state: "pending" };
}

/** Message of a prompt the server refused to queue. */
export function describePromptRejection(data: unknown): string {
  if (!isRecord(data)) return "prompt rejected";
  const error = isRecord(data.error) ? data.error : {};
  const head = typeof error.message === "string" ? error.message : "prompt rejected";
  const nodeErrors = isRecord(data.node_errors) ? data.node_errors : {};
  const parts = Object.entries(nodeErrors).flatMap(([nodeId, value]) => {
    const errs = isRecord(value) && Array.isArray(value.errors) ? value.errors : [];
    return errs.map((e) => `node ${nodeId}: ${isRecord(e) && typeof e.message === "string" ? e.message : JSON.stringify(e)}`);
  });
  return parts.length > 0 ? `${head}: ${parts.join("; ")}` : head;
}

/**
 * Queues a prompt on the host's HTTP API and polls its history until it
 * finishes. On abort the host is asked to interrupt the running prompt.
 */
export class HttpExecution implements ExecutionCollaborator {
  async run(scope: RunScope, server: HostServer, request: ExecutionRequest): Promise<ExecutionResult> {
    const http = axios.create({ baseURL: server.baseUrl, timeout: REQUEST_TIMEOUT_MS });
    const promptId = await this.queue(http, request);
    request.onLog(`queued prompt ${promptId}`);

    try {
      for (;;) {
        if (request.signal.aborted) throw new CancelledError(request.label);
        const res = await http.get<unknown>(`/history/${promptId}`, { signal: request.signal });
        const state = interpretHistory(isRecord(res.data) ? res.data[promptId] : undefined);
        if (state.state === "success") return { promptId, outputs: state.outputs };
        if (state.state === "error") {
          request.onLog(`error: ${state.message}`);
          throw new ExecutionError(`${request.label}: ${state.message}`);
        }
        await pause(POLL_INTERVAL_MS, request.signal);
      }
    } catch (err) {
      if (request.signal.aborted) {
        await this.interrupt(http, scope);
        throw new CancelledError(request.label);
      }
      if (err instanceof ExecutionError || err instanceof CancelledError) throw err;
      throw new ExecutionError(`${request.label}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  private async queue(http: AxiosInstance, request: ExecutionRequest): Promise<string> {
    try {
      const res = await http.post<unknown>(
        "/prompt",
        { prompt: request.prompt, client_id: randomUUID() },
        { signal: request.signal },
      );
      if (isRecord(res.data) && typeof res.data.prompt_id === "string") return res.data.prompt_id;
      throw new ExecutionError(`${request.label}: server returned no prompt id`);
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      if (request.signal.aborted) throw new CancelledError(request.label);
      if (isAxiosError(err) && err.response) {
        throw new ExecutionError(`${request.label}: ${describePromptRejection(err.response.data)}`, { cause: err });
      }
      throw new ExecutionError(`${request.label}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  private async interrupt(http: AxiosInstance, scope: RunScope): Promise<void> {
    try {
      await http.post("/interrupt", {}, { timeout: 5000 });
    } catch (err) {
      scope.logger.warn("interrupt request failed", { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
