import type { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { performance } from "perf_hooks";

import { listObjects, listSchemas } from "../catalog/catalog.js";
import { getConfig, type DrillDataConfig } from "../state/config.js";
import {
  AuthenticationError,
  ConfigurationError,
  QueryError,
  SessionClosedError,
} from "../utils/errors.js";
import { createRequestId, createSessionId } from "../utils/id.js";
import { createLogger } from "../utils/log.js";
import type { ExecuteOptions, ObjectDescriptor, ResultTable, Session } from "../utils/types.js";
import { parseQueryResponse, toResultTable } from "./response.js";
import {
  buildBaseUrl,
  createTransport,
  describeNetworkError,
  errorText,
  networkCause,
  extractCookie,
  isLoginRedirect,
} from "./transport.js";

const log = createLogger("client");

export interface ConnectOptions extends Partial<Pick<DrillDataConfig, "port" | "protocol" | "verifyTls" | "loginTimeoutMs" | "queryTimeoutMs">> {
  adapter?: AxiosAdapter;
}

export class DrillClient {
  private http: AxiosInstance;
  private session: Session | null;
  private queryTimeoutMs: number;

  private constructor(http: AxiosInstance, session: Session, queryTimeoutMs: number) {
    this.http = http;
    this.session = session;
    this.queryTimeoutMs = queryTimeoutMs;
  }

  /**
   * Authenticates against Drill's form login and returns a client bound to the
   * resulting session. Throws `AuthenticationError` for rejected credentials or
   * an unreachable host.
   */
  static async connect(
    hostname: string,
    username: string,
    password: string,
    options: ConnectOptions = {},
  ): Promise<DrillClient> {
    const defaults = getConfig();
    const config = {
      port: options.port ?? defaults.port,
      protocol: options.protocol ?? defaults.protocol,
      verifyTls: options.verifyTls ?? defaults.verifyTls,
      loginTimeoutMs: options.loginTimeoutMs ?? defaults.loginTimeoutMs,
      queryTimeoutMs: options.queryTimeoutMs ?? defaults.queryTimeoutMs,
    };
    const baseUrl = buildBaseUrl(config, hostname);
    const http = createTransport({ baseUrl, verifyTls: config.verifyTls, adapter: options.adapter });

    log.info(`Attempting connection to ${hostname}...`);

    let response: AxiosResponse;
    try {
      response = await http.post(
        "/j_security_check",
        new URLSearchParams({ j_username: username, j_password: password }).toString(),
        {
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          timeout: config.loginTimeoutMs,
        },
      );
    } catch (error) {
      log.error(`Authentication failed for ${username}: ${describeNetworkError(error)}`);
      throw new AuthenticationError(`Cannot reach Drill at ${baseUrl}: ${describeNetworkError(error)}`, {
        cause: networkCause(error),
      });
    }

    if (response.status === 401 || response.status === 403 || isLoginRedirect(response)) {
      log.error(`Authentication failed for ${username}: credentials rejected.`);
      throw new AuthenticationError(`Drill rejected the credentials for ${username}.`);
    }
    if (response.status >= 400) {
      log.error(`Authentication failed for ${username}: HTTP ${response.status}.`);
      throw new AuthenticationError(`Login to ${baseUrl} failed: ${errorText(response)}`);
    }

    const cookie = extractCookie(response);
    if (!cookie) {
      log.error(`Authentication failed for ${username}: no session cookie issued.`);
      throw new AuthenticationError(`Drill at ${baseUrl} did not issue a session cookie.`);
    }

    log.info("Authentication successful.");

    const session: Session = {
      sessionId: createSessionId(),
      hostname,
      baseUrl,
      username,
      cookie,
      connectedAt: Date.now(),
    };
    return new DrillClient(http, session, config.queryTimeoutMs);
  }

  get hostname(): string {
    return this.activeSession().hostname;
  }

  get isClosed(): boolean {
    return this.session === null;
  }

  private activeSession(): Session {
    if (!this.session) {
      throw new SessionClosedError();
    }
    return this.session;
  }

  /** Runs one SQL statement and returns its rows with DATE, TIME and TIMESTAMP columns as `Date` values. */
  async execute(sql: string, options: ExecuteOptions = {}): Promise<ResultTable> {
    const session = this.activeSession();
    const requestId = createRequestId();
    const payload: Record<string, string | number> = { queryType: "SQL", query: sql };
    if (options.autoLimit !== undefined) {
      payload.autoLimit = options.autoLimit;
    }
    if (options.defaultSchema) {
      payload.defaultSchema = options.defaultSchema;
    }

    log.debug(`${requestId} submitting: ${sql}`);
    const start = performance.now();

    let response: AxiosResponse;
    try {
      response = await this.http.post("/query.json", payload, {
        headers: { Cookie: session.cookie },
        timeout: this.queryTimeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      log.error(`${requestId} request failed: ${describeNetworkError(error)}`);
      throw new QueryError(`Query request failed: ${describeNetworkError(error)}`, null, { cause: networkCause(error) });
    }

    const duration = ((performance.now() - start) / 1000).toFixed(2);

    if (response.status === 401 || response.status === 403 || isLoginRedirect(response)) {
      log.error(`${requestId} session for ${session.username} is no longer valid.`);
      throw new AuthenticationError("Drill session expired or was revoked. Connect again.");
    }
    if (response.status !== 200) {
      const message = errorText(response);
      log.error(`${requestId} query failed (${duration}s): ${message}`);
      throw new QueryError(message, response.status);
    }

    const table = toResultTable(parseQueryResponse(response.data));
    log.info(`Query ${table.queryId ?? requestId} completed in ${duration}s. Returned ${table.rowCount} rows.`);
    return table;
  }

  listSchemas(): Promise<string[]> {
    return listSchemas(this);
  }

  listObjects(schema: string): Promise<ObjectDescriptor[]> {
    return listObjects(this, schema);
  }

  /** Ends the Drill session. Later calls throw `SessionClosedError`. */
  async close(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    try {
      await this.http.get("/logout", { headers: { Cookie: session.cookie }, timeout: this.queryTimeoutMs });
    } catch (error) {
      log.warn(`Logout from ${session.hostname} failed: ${describeNetworkError(error)}`);
    }
  }
}

/** Connects with the hostname and credentials from configuration. */
export async function createDefaultClient(options: ConnectOptions = {}): Promise<DrillClient> {
  const { hostname, username, password } = getConfig();
  if (!hostname || !username || password === null) {
    throw new ConfigurationError("Set DRILL_HOST, DRILL_USER and DRILL_PASSWORD (or ~/.drill-data/config.json).");
  }
  return DrillClient.connect(hostname, username, password, options);
}
