import { z } from "zod";

// ---------------------------------------------------------------------------
// Result taxonomy shared by every cloud REST client
// ---------------------------------------------------------------------------

export interface RemoteOk<T> {
  ok: true;
  data: T;
  status: number;
}

/** 404, 409 and 403 are ordinary outcomes for callers, not exceptions. */
export type RemoteErrorKind = "not-found" | "conflict" | "forbidden" | "error";

export interface RemoteErr {
  ok: false;
  kind: RemoteErrorKind;
  error: string;
  status: number;
}

export type RemoteResult<T> = RemoteOk<T> | RemoteErr;

export function errorKindForStatus(status: number): RemoteErrorKind {
  switch (status) {
    case 404:
      return "not-found";
    case 409:
      return "conflict";
    case 403:
      return "forbidden";
    default:
      return "error";
  }
}

// ---------------------------------------------------------------------------
// Long-running operations
// ---------------------------------------------------------------------------

export type OperationStatus = "PENDING" | "RUNNING" | "DONE";

export interface OperationError {
  code: string;
  message: string;
  location?: string;
}

/**
 * A handle on an asynchronous remote operation. `zone` is absent for
 * project-scoped operations.
 */
export interface RemoteOperation {
  name: string;
  operationType: string;
  status: OperationStatus;
  targetLink: string;
  targetId?: string;
  zone?: string;
  error?: { errors: OperationError[] };
}

/** The last path segment of a resource URL, or the value itself. */
export function getLocalName(resourceUrl: string): string {
  const trimmed = resourceUrl.replace(/\/+$/, "");
  const slash = trimmed.lastIndexOf("/");
  return slash === -1 ? trimmed : trimmed.slice(slash + 1);
}

// ---------------------------------------------------------------------------
// Bearer-token transport over Node's fetch
// ---------------------------------------------------------------------------

const googleErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
  }),
});

export class BearerRestTransport {
  constructor(
    private baseUrl: string,
    private accessToken: string,
  ) {}

  get<T>(path: string): Promise<RemoteResult<T>> {
    return this.execute<T>(`${this.baseUrl}${path}`, {
      method: "GET",
      headers: this.headers(),
    });
  }

  post<T>(path: string, body: unknown): Promise<RemoteResult<T>> {
    return this.execute<T>(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  delete<T>(path: string): Promise<RemoteResult<T>> {
    return this.execute<T>(`${this.baseUrl}${path}`, {
      method: "DELETE",
      headers: this.headers(),
    });
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  private async execute<T>(
    url: string,
    init: RequestInit,
  ): Promise<RemoteResult<T>> {
    try {
      const res = await fetch(url, init);
      if (res.ok) {
        const data = (await res.json()) as T;
        return { ok: true, data, status: res.status };
      }
      const text = await res.text();
      return {
        ok: false,
        kind: errorKindForStatus(res.status),
        error: parseErrorMessage(text),
        status: res.status,
      };
    } catch (err) {
      return {
        ok: false,
        kind: "error",
        error: `Network error: ${err instanceof Error ? err.message : String(err)}`,
        status: 0,
      };
    }
  }
}

function parseErrorMessage(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text;
  }
  const parsed = googleErrorSchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : text;
}
