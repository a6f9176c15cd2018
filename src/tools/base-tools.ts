/**
 * Base tools: ad-hoc SQL and catalog browsing
 */

import { requireManaged } from "../db/connection-provider.js";
import { defineHandler, optionalStringArg, stringArg } from "../gateway/descriptor.js";
import { createResponse } from "../gateway/response.js";

export const readQuery = defineHandler({
  name: "base_readQuery",
  description: "Execute a SQL query and return the rows.",
  parameters: [
    { name: "conn", type: "session", session: "managed" },
    { name: "sql", type: "string", description: "SQL text to execute" },
    { name: "tool_name", type: "string" },
  ],
  run: async (session, args) => {
    const conn = requireManaged(session);
    const sql = stringArg(args, "sql");
    const rows = await conn.query(sql);
    return createResponse(rows, {
      tool_name: optionalStringArg(args, "tool_name") ?? "base_readQuery",
      sql,
      columns: rows.length > 0 ? Object.keys(rows[0]) : [],
      row_count: rows.length,
    });
  },
});

export const tableList = defineHandler({
  name: "base_tableList",
  description: "List tables and views in a schema.",
  parameters: [
    { name: "conn", type: "session", session: "managed" },
    { name: "schema_name", type: "string", description: "Schema to list", default: "public" },
  ],
  run: async (session, args) => {
    const conn = requireManaged(session);
    const schema = stringArg(args, "schema_name");
    const rows = await conn.query(
      `SELECT table_name, table_type
         FROM information_schema.tables
        WHERE table_schema = $1
        ORDER BY table_name`,
      [schema]
    );
    return createResponse(rows, {
      tool_name: "base_tableList",
      schema_name: schema,
      total_tables: rows.length,
    });
  },
});

export const columnDescription = defineHandler({
  name: "base_columnDescription",
  description: "Describe the columns of a table.",
  parameters: [
    { name: "conn", type: "session", session: "managed" },
    { name: "table_name", type: "string", description: "Table to describe" },
    { name: "schema_name", type: "string", description: "Schema of the table", default: "public" },
  ],
  run: async (session, args) => {
    const conn = requireManaged(session);
    const table = stringArg(args, "table_name");
    const schema = stringArg(args, "schema_name");
    const rows = await conn.query(
      `SELECT column_name, data_type, is_nullable, column_default
         FROM information_schema.columns
        WHERE table_schema = $1 AND table_name = $2
        ORDER BY ordinal_position`,
      [schema, table]
    );
    return createResponse(rows, {
      tool_name: "base_columnDescription",
      table_name: `${schema}.${table}`,
      total_columns: rows.length,
    });
  },
});

export const BASE_TOOLS = [readQuery, tableList, columnDescription];
