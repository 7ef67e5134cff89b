/**
 * MCP server exposing the simulator over the tool-call protocol.
 *
 * Operation tools go through `ToolDispatcher.invoke`; the read-only accessors
 * and the ledger reset are answered directly. Every result is rendered as
 * pretty-printed JSON text, with `isError` set when `success` is false.
 * @module server/server
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { formatIssues, tableNameSchema } from "../dispatcher/index.js";
import type { ToolDispatcher } from "../dispatcher/index.js";
import { ErrorCode } from "../errors/index.js";
import { NoopLogger, logError } from "../observability/index.js";
import type { Logger } from "../observability/index.js";
import { ALL_TOOLS } from "./tools.js";

export const SERVER_NAME = "dynamo-sim-mcp";
export const SERVER_VERSION = "1.0.0";

export interface AccessorResult {
  success: boolean;
  data?: unknown;
  error?: string;
  errorCode?: ErrorCode;
}

const advisoriesSchema = z.object({ tableName: tableNameSchema });

const streamEventsSchema = z.object({
  tableName: tableNameSchema,
  limit: z.number().int().positive().optional(),
});

function invalid(name: string, error: z.ZodError): AccessorResult {
  return {
    success: false,
    error: `Invalid parameters for ${name}: ${formatIssues(error)}`,
    errorCode: ErrorCode.InvalidParameters,
  };
}

/**
 * Answers one tool call: accessors directly, everything else through the dispatcher.
 */
export function handleToolCall(
  dispatcher: ToolDispatcher,
  name: string,
  args: unknown,
): AccessorResult {
  switch (name) {
    case "get_ledger_summary":
      return { success: true, data: dispatcher.getLedgerSummary() };
    case "get_advisories": {
      const parsed = advisoriesSchema.safeParse(args);
      if (!parsed.success) {
        return invalid(name, parsed.error);
      }
      return { success: true, data: dispatcher.getAdvisories(parsed.data.tableName) };
    }
    case "get_stream_events": {
      const parsed = streamEventsSchema.safeParse(args);
      if (!parsed.success) {
        return invalid(name, parsed.error);
      }
      return {
        success: true,
        data: { events: dispatcher.getStreamEvents(parsed.data.tableName, parsed.data.limit) },
      };
    }
    case "reset_ledger":
      dispatcher.resetLedger();
      return { success: true, data: dispatcher.getLedgerSummary() };
    default:
      return dispatcher.invoke(name, args ?? {});
  }
}

export function createServer(dispatcher: ToolDispatcher, logger: Logger = new NoopLogger()): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: ALL_TOOLS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = handleToolCall(dispatcher, name, args);
      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        isError: !result.success,
      };
    } catch (error) {
      logError(logger, name, error);
      const errorResponse: AccessorResult = {
        success: false,
        error: `Unexpected error occurred while executing ${name}: ${error instanceof Error ? error.message : String(error)}`,
        errorCode: ErrorCode.Internal,
      };
      return {
        content: [{ type: "text", text: JSON.stringify(errorResponse, null, 2) }],
        isError: true,
      };
    }
  });

  return server;
}
