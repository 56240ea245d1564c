import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { Agent } from "https";

import type { DrillDataConfig } from "../state/config.js";

export interface TransportOptions {
  baseUrl: string;
  verifyTls: boolean;
  /** Replaces axios' HTTP adapter; used to run against an in-process Drill stand-in. */
  adapter?: AxiosAdapter;
}

export function buildBaseUrl(config: Pick<DrillDataConfig, "protocol" | "port">, hostname: string): string {
  return `${config.protocol}://${hostname}:${config.port}`;
}

export function createTransport(options: TransportOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    httpsAgent: new Agent({ rejectUnauthorized: options.verifyTls }),
    maxRedirects: 0,
    validateStatus: () => true,
    adapter: options.adapter,
  });
}

/** Joins the `name=value` parts of every Set-Cookie header into one Cookie header value. */
export function extractCookie(response: AxiosResponse): string | null {
  const setCookie = response.headers["set-cookie"];
  if (!setCookie || setCookie.length === 0) {
    return null;
  }
  const pairs = setCookie
    .map((header) => header.split(";")[0].trim())
    .filter((pair) => pair.includes("="));
  return pairs.length > 0 ? pairs.join("; ") : null;
}

export function headerString(response: AxiosResponse, name: string): string | null {
  const value: unknown = response.headers[name];
  return typeof value === "string" ? value : null;
}

export function isRedirect(response: AxiosResponse): boolean {
  return response.status >= 300 && response.status < 400;
}

/** True when Drill sent the caller back to its form login instead of serving the request. */
export function isLoginRedirect(response: AxiosResponse): boolean {
  if (!isRedirect(response)) {
    return false;
  }
  const location = headerString(response, "location") ?? "";
  return /login|error/i.test(location);
}

/** Drill's error text: the JSON `errorMessage`, else the raw body, else the status line. */
export function errorText(response: AxiosResponse): string {
  const body: unknown = response.data;
  if (typeof body === "object" && body !== null && "errorMessage" in body && typeof body.errorMessage === "string") {
    return body.errorMessage;
  }
  if (typeof body === "string" && body.trim()) {
    return body.trim();
  }
  return `HTTP ${response.status} ${response.statusText}`.trim();
}

/** Message-only stand-in for a failed request; the axios error carries the request body (and any password in it). */
export function networkCause(error: unknown): Error {
  return new Error(describeNetworkError(error));
}

export function describeNetworkError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
