import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
  type RawAxiosResponseHeaders,
} from "axios";
import { Agent } from "https";

export interface FakeReply {
  status?: number;
  data?: unknown;
  headers?: RawAxiosResponseHeaders;
}

export interface RecordedRequest {
  method: string;
  url: string;
  cookie: string | null;
  contentType: string | null;
  timeout: number | undefined;
  rejectUnauthorized: boolean | undefined;
  body: unknown;
}

export interface QueryPayload {
  queryType?: string;
  query?: string;
  autoLimit?: number;
  defaultSchema?: string;
}

type Handler<T> = (input: T) => FakeReply | Error;

export interface FakeDrillOptions {
  login?: FakeReply | Error;
  query?: Handler<QueryPayload>;
  logout?: FakeReply | Error;
}

export interface FakeDrill {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
  queries(): string[];
}

export const SESSION_COOKIE = "JSESSIONID=node0test123";

export const LOGIN_OK: FakeReply = {
  status: 303,
  headers: {
    "set-cookie": [`${SESSION_COOKIE}; Path=/; Secure; HttpOnly`],
    location: "https://drill.test:8047/",
  },
};

function header(config: InternalAxiosRequestConfig, name: string): string | null {
  const value = config.headers.get(name);
  return typeof value === "string" ? value : null;
}

function parseBody(data: unknown): unknown {
  if (typeof data !== "string") {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return Object.fromEntries(new URLSearchParams(data));
  }
}

function isQueryPayload(value: unknown): value is QueryPayload {
  return typeof value === "object" && value !== null;
}

/** Query reply in the shape Drill's `/query.json` answers with. */
export function queryReply(columns: string[], metadata: string[] | undefined, rows: Array<Record<string, unknown>>): FakeReply {
  return {
    status: 200,
    data: { queryId: "1f2e3d4c-0000-0000-0000-000000000001", columns, metadata, rows, queryState: "COMPLETED" },
  };
}

/** An axios adapter that answers like a Drill web server, without leaving the process. */
export function createFakeDrill(options: FakeDrillOptions = {}): FakeDrill {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const body = parseBody(config.data);
    const url = config.url ?? "";
    requests.push({
      method: (config.method ?? "get").toUpperCase(),
      url,
      cookie: header(config, "Cookie"),
      contentType: header(config, "Content-Type"),
      timeout: config.timeout,
      rejectUnauthorized: config.httpsAgent instanceof Agent ? config.httpsAgent.options.rejectUnauthorized : undefined,
      body,
    });

    let reply: FakeReply | Error;
    if (url === "/j_security_check") {
      reply = options.login ?? LOGIN_OK;
    } else if (url === "/query.json") {
      reply = options.query && isQueryPayload(body) ? options.query(body) : queryReply([], [], []);
    } else if (url === "/logout") {
      reply = options.logout ?? { status: 200, data: "" };
    } else {
      reply = { status: 404, data: "" };
    }

    if (reply instanceof AxiosError && !reply.config) {
      // axios attaches the failed request's config, form body included
      reply.config = config;
    }
    if (reply instanceof Error) {
      throw reply;
    }

    const response: AxiosResponse = {
      status: reply.status ?? 200,
      statusText: "",
      headers: reply.headers ?? {},
      data: reply.data ?? "",
      config,
    };
    return response;
  };

  return {
    adapter,
    requests,
    queries: () =>
      requests
        .filter((request) => request.url === "/query.json" && isQueryPayload(request.body))
        .map((request) => (isQueryPayload(request.body) ? request.body.query ?? "" : "")),
  };
}

export function networkError(code: string): AxiosError {
  return new AxiosError(`connect ${code} 10.0.0.1:8047`, code);
}
