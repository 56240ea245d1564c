import { randomUUID } from "crypto";

export function createSessionId(): string {
  return randomUUID();
}

/** Local correlation id for log lines; Drill assigns its own queryId on success. */
export function createRequestId(): string {
  return `q_${randomUUID().slice(0, 8)}`;
}
