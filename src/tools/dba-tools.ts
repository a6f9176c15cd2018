/**
 * DBA tools: workload and session inspection
 */

import { requireManaged, requireRaw } from "../db/connection-provider.js";
import { TRACE_TAG_SETTING } from "../db/pg-provider.js";
import { defineHandler, numberArg, stringArg } from "../gateway/descriptor.js";
import { createResponse } from "../gateway/response.js";

export const tableSqlList = defineHandler({
  name: "dba_tableSqlList",
  description: "List recent statements that touched a table, from pg_stat_activity.",
  parameters: [
    { name: "conn", type: "session", session: "managed" },
    { name: "table_name", type: "string", description: "Table name to search for in statement text" },
    { name: "no_days", type: "integer", description: "How many days back to look", default: 7 },
  ],
  run: async (session, args) => {
    const conn = requireManaged(session);
    const table = stringArg(args, "table_name");
    const days = numberArg(args, "no_days");
    const rows = await conn.query(
      `SELECT pid, usename, query_start, state, query
         FROM pg_stat_activity
        WHERE query ILIKE '%' || $1 || '%'
          AND query_start >= now() - make_interval(days => $2::int)
        ORDER BY query_start DESC`,
      [table, days]
    );
    return createResponse(rows, {
      tool_name: "dba_tableSqlList",
      table_name: table,
      no_days: days,
      total_queries: rows.length,
    });
  },
});

export const sessionList = defineHandler({
  name: "dba_sessionList",
  description: "List client backend sessions.",
  parameters: [{ name: "raw", type: "session", session: "raw" }],
  run: async (session) => {
    const { client } = requireRaw(session);
    const result = await client.query(
      `SELECT pid, usename, application_name, client_addr::text AS client_addr, state, backend_start
         FROM pg_stat_activity
        WHERE backend_type = 'client backend'
        ORDER BY backend_start`
    );
    return createResponse(result.rows, {
      tool_name: "dba_sessionList",
      total_sessions: result.rowCount ?? result.rows.length,
    });
  },
});

export const whoAmI = defineHandler({
  name: "dba_whoAmI",
  description: "Show the backend identity and the trace tag attached to this call.",
  parameters: [{ name: "conn", type: "session", session: "managed" }],
  run: async (session) => {
    const conn = requireManaged(session);
    const rows = await conn.query(
      `SELECT current_user AS current_user, session_user AS session_user,
              current_setting('${TRACE_TAG_SETTING}', true) AS trace_tag`
    );
    return createResponse(rows[0] ?? null, { tool_name: "dba_whoAmI" });
  },
});

export const DBA_TOOLS = [tableSqlList, sessionList, whoAmI];
