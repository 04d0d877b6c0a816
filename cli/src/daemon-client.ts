/**
 * HTTP client for a running screen-narrator daemon
 */

import type {
  AssistantStatus,
  FollowUpState,
  TaskName,
  TriggerOutcome,
} from "@screen-narrator/types";

export const DEFAULT_DAEMON_PORT = 4799;

const TASK_NAMES: readonly TaskName[] = ["capture", "follow-up", "navigate"];

const TRIGGER_OUTCOMES: readonly TriggerOutcome[] = [
  "admitted",
  "denied",
  "submitted",
  "stopped",
  "canceled",
  "started",
  "shutting-down",
];

/**
 * Thrown when no daemon answers at the configured URL
 */
export class DaemonUnreachableError extends Error {
  constructor(
    public readonly url: string,
    cause?: unknown
  ) {
    super(`Screen Narrator daemon is not reachable at ${url}`, { cause });
    this.name = "DaemonUnreachableError";
  }
}

/**
 * Thrown when the daemon answers with an error envelope
 */
export class DaemonRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "DaemonRequestError";
  }
}

export interface CommandReceipt {
  command: string;
  outcome: TriggerOutcome;
}

interface Envelope {
  success: boolean;
  data: unknown;
  message?: string;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEnvelope(value: unknown): Envelope | null {
  if (!isRecord(value) || typeof value.success !== "boolean") {
    return null;
  }
  return {
    success: value.success,
    data: value.data ?? null,
    message: typeof value.message === "string" ? value.message : undefined,
  };
}

function toCommandReceipt(value: unknown): CommandReceipt | null {
  if (!isRecord(value) || typeof value.command !== "string") {
    return null;
  }
  const outcome = TRIGGER_OUTCOMES.find((item) => item === value.outcome);
  return outcome ? { command: value.command, outcome } : null;
}

function toStatus(value: unknown): AssistantStatus | null {
  if (!isRecord(value)) {
    return null;
  }
  const numberOr = (field: unknown, fallback: number) =>
    typeof field === "number" && Number.isFinite(field) ? field : fallback;
  const activeTask = TASK_NAMES.find((name) => name === value.activeTask);
  const followUp: FollowUpState =
    value.followUp === "listening" ? "listening" : "idle";

  return {
    running: value.running === true,
    activeTask: activeTask ?? null,
    followUp,
    speaking: value.speaking === true,
    credentialConfigured: value.credentialConfigured === true,
    detailCount: numberOr(value.detailCount, 0),
    detailIndex: numberOr(value.detailIndex, -1),
  };
}

/**
 * Resolve the daemon base URL: explicit option, then NARRATOR_URL, then the
 * loopback address on NARRATOR_PORT (default 4799)
 */
export function resolveDaemonUrl(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const candidate = explicit || env.NARRATOR_URL;
  if (candidate) {
    return candidate.replace(/\/+$/, "");
  }
  const port = env.NARRATOR_PORT || String(DEFAULT_DAEMON_PORT);
  return `http://127.0.0.1:${port}`;
}

export class DaemonClient {
  constructor(
    public readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async sendCommand(command: string): Promise<CommandReceipt> {
    const data = await this.request(
      "POST",
      `/api/commands/${encodeURIComponent(command)}`
    );
    const receipt = toCommandReceipt(data);
    if (!receipt) {
      throw new DaemonRequestError("Unexpected command response", 200);
    }
    return receipt;
  }

  async getStatus(): Promise<AssistantStatus> {
    const data = await this.request("GET", "/api/status");
    const status = toStatus(data);
    if (!status) {
      throw new DaemonRequestError("Unexpected status response", 200);
    }
    return status;
  }

  async setCredential(key: string): Promise<void> {
    await this.request("POST", "/api/credential", { key });
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    body?: Record<string, unknown>
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers:
          body === undefined ? undefined : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new DaemonUnreachableError(this.baseUrl, error);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new DaemonRequestError(
        `Daemon returned a non-JSON response (status ${response.status})`,
        response.status
      );
    }

    const envelope = toEnvelope(payload);
    if (!envelope) {
      throw new DaemonRequestError(
        `Unexpected response from daemon (status ${response.status})`,
        response.status
      );
    }
    if (!response.ok || !envelope.success) {
      throw new DaemonRequestError(
        envelope.message ?? `Request failed with status ${response.status}`,
        response.status
      );
    }
    return envelope.data;
  }
}
