import { DrillClientError, NotFoundError, QueryError } from "../utils/errors.js";
import { createLogger } from "../utils/log.js";
import type { ExecuteOptions, ObjectDescriptor, ObjectType, ResultRow, ResultTable } from "../utils/types.js";

const log = createLogger("catalog");

export interface QueryRunner {
  execute(sql: string, options?: ExecuteOptions): Promise<ResultTable>;
}

const FILE_SYSTEM_PLUGINS = new Set(["dfs", "cp"]);
const RDBMS_OBJECT_TYPES = new Set<ObjectType>(["TABLE", "VIEW", "SYNONYM"]);
const SCHEMA_NOT_FOUND = /schema \[?.*?\]? is not valid|schema .* (?:not found|does not exist)/i;

function quoteIdentifier(schema: string): string {
  if (!schema.trim() || schema.includes("`")) {
    throw new DrillClientError(`Invalid schema name: ${JSON.stringify(schema)}`);
  }
  return `\`${schema}\``;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function text(row: ResultRow, key: string): string {
  const value = row[key];
  return value === null || value === undefined ? "" : String(value);
}

function flag(row: ResultRow, key: string): boolean {
  const value = row[key];
  return value === true || (typeof value === "string" && value.toLowerCase() === "true");
}

async function runCatalogQuery(runner: QueryRunner, schema: string, sql: string): Promise<ResultTable> {
  try {
    return await runner.execute(sql);
  } catch (error) {
    if (error instanceof QueryError && SCHEMA_NOT_FOUND.test(error.message)) {
      throw new NotFoundError(schema, { cause: error });
    }
    throw error;
  }
}

export async function listSchemas(runner: QueryRunner): Promise<string[]> {
  log.info("Fetching storage schemas...");
  const table = await runner.execute("SELECT SCHEMA_NAME FROM INFORMATION_SCHEMA.SCHEMATA ORDER BY SCHEMA_NAME");
  return table.rows.map((row) => text(row, "SCHEMA_NAME"));
}

async function listFiles(runner: QueryRunner, schema: string): Promise<ObjectDescriptor[]> {
  const table = await runCatalogQuery(runner, schema, `SHOW FILES IN ${quoteIdentifier(schema)}`);
  return table.rows.map((row): ObjectDescriptor => ({
    schema,
    name: text(row, "name"),
    type: flag(row, "isDirectory") ? "DIRECTORY" : "FILE",
  }));
}

async function listTables(runner: QueryRunner, schema: string): Promise<ObjectDescriptor[]> {
  const table = await runCatalogQuery(runner, schema, `SHOW TABLES IN ${quoteIdentifier(schema)}`);
  const wanted = schema.toLowerCase();
  return table.rows
    .filter((row) => text(row, "TABLE_SCHEMA").toLowerCase() === wanted)
    .map((row): ObjectDescriptor => ({ schema: text(row, "TABLE_SCHEMA"), name: text(row, "TABLE_NAME"), type: "TABLE" }));
}

function toObjectType(value: string): ObjectType | null {
  const upper = value.toUpperCase();
  for (const type of RDBMS_OBJECT_TYPES) {
    if (type === upper) {
      return type;
    }
  }
  return null;
}

// JDBC plugins over Oracle expose synonyms and views only through the data dictionary.
async function listDictionaryObjects(runner: QueryRunner, schema: string): Promise<ObjectDescriptor[]> {
  const [plugin, owner] = schema.split(".");
  const ownerFilter = owner ? `= ${quoteLiteral(owner.toUpperCase())}` : "IS NOT NULL";
  const sql =
    `SELECT OWNER, OBJECT_NAME, OBJECT_TYPE FROM ${quoteIdentifier(plugin)}.SYS.ALL_OBJECTS ` +
    `WHERE OBJECT_TYPE IN ('TABLE', 'VIEW', 'SYNONYM') AND OWNER ${ownerFilter} ` +
    `AND OWNER NOT IN ('SYS', 'SYSTEM') ORDER BY OWNER, OBJECT_NAME`;

  let table: ResultTable;
  try {
    table = await runner.execute(sql);
  } catch (error) {
    if (error instanceof QueryError) {
      log.debug(`No data dictionary behind ${plugin}: ${error.message}`);
      return [];
    }
    throw error;
  }

  const objects: ObjectDescriptor[] = [];
  for (const row of table.rows) {
    const type = toObjectType(text(row, "OBJECT_TYPE"));
    if (type) {
      objects.push({ schema: `${plugin}.${text(row, "OWNER")}`, name: text(row, "OBJECT_NAME"), type });
    }
  }
  return objects;
}

/**
 * Lists the tables, views, synonyms or files inside one schema.
 *
 * File-system plugins are listed with SHOW FILES; everything else with SHOW
 * TABLES, falling back to the plugin's SYS.ALL_OBJECTS when that is empty.
 */
export async function listObjects(runner: QueryRunner, schema: string): Promise<ObjectDescriptor[]> {
  log.info(`Listing objects in schema: ${schema}`);
  const plugin = schema.split(".")[0].toLowerCase();

  if (FILE_SYSTEM_PLUGINS.has(plugin)) {
    return listFiles(runner, schema);
  }

  const tables = await listTables(runner, schema);
  if (tables.length > 0) {
    return tables;
  }

  log.debug(`SHOW TABLES returned nothing for ${schema}; querying the data dictionary.`);
  return listDictionaryObjects(runner, schema);
}
