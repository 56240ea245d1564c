export interface Session {
  sessionId: string;
  hostname: string;
  baseUrl: string;
  username: string;
  cookie: string;
  connectedAt: number;
}

export type ObjectType = "TABLE" | "VIEW" | "SYNONYM" | "FILE" | "DIRECTORY";

export interface ObjectDescriptor {
  schema: string;
  name: string;
  type: ObjectType;
}

export interface Column {
  name: string;
  /** Drill's reported type, e.g. `DATE` or `VARCHAR(65535)`; null when the server sends no metadata. */
  type: string | null;
}

export type ResultRow = Record<string, unknown>;

export interface ResultTable {
  queryId: string | null;
  columns: Column[];
  rows: ResultRow[];
  rowCount: number;
  attemptedAutoLimit: number | null;
}

export interface ExecuteOptions {
  /** Server-side row cap (Drill's `autoLimit`). */
  autoLimit?: number;
  defaultSchema?: string;
  signal?: AbortSignal;
}
