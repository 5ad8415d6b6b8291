import axios, { type AxiosInstance, type Method } from "axios";
import { AppError } from "../../infra/app-error.js";

export interface HttpRecordClientOptions {
  baseUrl: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  /** Injected in tests with a stub adapter. */
  http?: AxiosInstance;
}

interface RequestOptions {
  allowNotFound: boolean;
  body?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

const TIMEOUT_CODES: ReadonlySet<string> = new Set(["ECONNABORTED", "ETIMEDOUT"]);
const MAX_DETAIL_LENGTH = 200;

function describeDetail(data: unknown): string {
  if (typeof data === "string") {
    const trimmed = data.trim();
    return trimmed.length > 0 ? trimmed.slice(0, MAX_DETAIL_LENGTH) : "no detail";
  }
  if (isRecord(data)) {
    const { detail, message } = data;
    if (typeof detail === "string" && detail.length > 0) {
      return detail.slice(0, MAX_DETAIL_LENGTH);
    }
    if (typeof message === "string" && message.length > 0) {
      return message.slice(0, MAX_DETAIL_LENGTH);
    }
  }
  return "no detail";
}

export function translateTransportError(error: unknown, operation: string, timeoutMs: number): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new AppError(
        "downstream_rejected",
        "downstream_rejected",
        `Record store rejected ${operation} with status ${status}: ${describeDetail(error.response?.data)}`,
        {
          statusCode: status >= 400 && status <= 599 ? status : 502,
          downstreamStatus: status,
          cause: error,
        },
      );
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new AppError(
        "downstream_timeout",
        "downstream_timeout",
        `Record store did not answer ${operation} within ${timeoutMs}ms.`,
        { cause: error },
      );
    }
  }
  return new AppError(
    "downstream_unreachable",
    "downstream_unreachable",
    `Record store is unreachable for ${operation}.`,
    { cause: error },
  );
}

export function malformedResponse(operation: string, expectation: string): AppError {
  return new AppError(
    "downstream_rejected",
    "malformed_response",
    `Record store returned a malformed response for ${operation}: ${expectation}.`,
  );
}

/**
 * JSON-over-HTTP access to the record service. axios exposes one deadline
 * per request, so the connect and read budgets are summed into it.
 */
export class HttpRecordClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  readonly timeoutMs: number;

  constructor(options: HttpRecordClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.connectTimeoutMs + options.readTimeoutMs;
    this.http =
      options.http ??
      axios.create({
        headers: { Accept: "application/json" },
        transitional: { clarifyTimeoutError: true },
      });
  }

  async get(path: string, operation: string): Promise<unknown> {
    return this.send("GET", path, operation, { allowNotFound: true });
  }

  async post(path: string, body: unknown, operation: string): Promise<unknown> {
    return this.send("POST", path, operation, { allowNotFound: false, body });
  }

  async put(path: string, body: unknown, operation: string): Promise<unknown> {
    return this.send("PUT", path, operation, { allowNotFound: true, body });
  }

  private async send(method: Method, path: string, operation: string, options: RequestOptions): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({
        method,
        baseURL: this.baseUrl,
        url: path,
        timeout: this.timeoutMs,
        ...(options.body !== undefined ? { data: options.body } : {}),
      });
      return response.data;
    } catch (error) {
      if (options.allowNotFound && axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw translateTransportError(error, operation, this.timeoutMs);
    }
  }
}
