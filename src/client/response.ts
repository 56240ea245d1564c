import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { convertTemporalValue, temporalTypeOf, type TemporalType } from "../convert/temporal.js";
import { QueryError, ResponseFormatError } from "../utils/errors.js";
import { createLogger } from "../utils/log.js";
import type { Column, ResultRow, ResultTable } from "../utils/types.js";

const log = createLogger("response");

export const QueryResponseSchema = Type.Object({
  queryId: Type.Optional(Type.String()),
  columns: Type.Array(Type.String()),
  rows: Type.Array(Type.Record(Type.String(), Type.Unknown())),
  metadata: Type.Optional(Type.Array(Type.String())),
  queryState: Type.Optional(Type.String()),
  attemptedAutoLimit: Type.Optional(Type.Number()),
  errorMessage: Type.Optional(Type.String()),
});

export type QueryResponse = Static<typeof QueryResponseSchema>;

const QueryFailureSchema = Type.Object({
  queryState: Type.Union([Type.Literal("FAILED"), Type.Literal("CANCELED")]),
  errorMessage: Type.Optional(Type.String()),
});

/** Validates a `/query.json` body; a failed or canceled query state raises `QueryError`. */
export function parseQueryResponse(body: unknown): QueryResponse {
  if (Value.Check(QueryFailureSchema, body)) {
    throw new QueryError(body.errorMessage ?? `Query ${body.queryState.toLowerCase()}.`);
  }
  if (!Value.Check(QueryResponseSchema, body)) {
    const first = Value.Errors(QueryResponseSchema, body).First();
    const detail = first ? `${first.path || "/"}: ${first.message}` : "unexpected body";
    throw new ResponseFormatError(`Malformed query response (${detail}).`);
  }
  return body;
}

function resolveColumns(response: QueryResponse): Column[] {
  const { columns, metadata } = response;
  if (!metadata) {
    log.debug("Response carries no column metadata; temporal values are left as sent.");
    return columns.map((name) => ({ name, type: null }));
  }
  if (metadata.length !== columns.length) {
    throw new ResponseFormatError(
      `Drill returned ${metadata.length} metadata entries for ${columns.length} columns.`,
    );
  }
  return columns.map((name, index) => ({ name, type: metadata[index] }));
}

/** Builds a result table from a validated `/query.json` body, converting temporal columns. */
export function toResultTable(response: QueryResponse): ResultTable {
  const columns = resolveColumns(response);
  const temporal: Array<[string, TemporalType]> = [];
  for (const column of columns) {
    const kind = temporalTypeOf(column.type);
    if (kind) {
      temporal.push([column.name, kind]);
    }
  }

  const rows: ResultRow[] = response.rows.map((row) => {
    if (temporal.length === 0) {
      return row;
    }
    const converted: ResultRow = { ...row };
    for (const [name, kind] of temporal) {
      if (name in converted) {
        converted[name] = convertTemporalValue(name, kind, converted[name]);
      }
    }
    return converted;
  });

  return {
    queryId: response.queryId ?? null,
    columns,
    rows,
    rowCount: rows.length,
    attemptedAutoLimit: response.attemptedAutoLimit ?? null,
  };
}

/** Values of one column, in row order. */
export function columnValues(table: ResultTable, name: string): unknown[] {
  return table.rows.map((row) => row[name] ?? null);
}
