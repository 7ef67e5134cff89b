/**
 * MCP tool catalog.
 * @module server/tools
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

const expressionBindings = {
  expressionAttributeNames: { type: "object", description: "Attribute name aliases, e.g. {\"#s\": \"status\"} (optional)" },
  expressionAttributeValues: { type: "object", description: "Placeholder values, e.g. {\":s\": \"shipped\"} (optional)" },
};

const conditionalWrite = {
  ...expressionBindings,
  conditionExpression: { type: "string", description: "Condition the current item must satisfy (optional)" },
  returnStreamEvent: { type: "boolean", description: "Include the resulting stream events in the response (optional)" },
};

const DYNAMODB_CREATE_TABLE_TOOL: Tool = {
  name: "create_table",
  description: "Creates a simulated table with a partition key and an optional sort key",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table to create" },
      keySchema: {
        type: "object",
        description: "Key attributes of the table",
        properties: {
          partitionKey: { type: "string", description: "Name of the partition key" },
          sortKey: { type: "string", description: "Name of the sort key (optional)" },
        },
        required: ["partitionKey"],
      },
      billingMode: { type: "string", enum: ["ON_DEMAND", "PROVISIONED"], description: "Billing mode (default ON_DEMAND)" },
    },
    required: ["tableName", "keySchema"],
  },
};

const DYNAMODB_DESCRIBE_TABLE_TOOL: Tool = {
  name: "describe_table",
  description: "Gets the key schema, billing mode, item count and size of a table",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table to describe" },
    },
    required: ["tableName"],
  },
};

const DYNAMODB_DELETE_TABLE_TOOL: Tool = {
  name: "delete_table",
  description: "Deletes a table and all of its items",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table to delete" },
    },
    required: ["tableName"],
  },
};

const DYNAMODB_LIST_TABLES_TOOL: Tool = {
  name: "list_tables",
  description: "Lists table names in ascending order",
  inputSchema: {
    type: "object",
    properties: {
      limit: { type: "number", description: "Maximum number of tables to return (optional)" },
      exclusiveStartTableName: { type: "string", description: "Name of the table to start after, for pagination (optional)" },
    },
  },
};

const DYNAMODB_UPDATE_TABLE_TOOL: Tool = {
  name: "update_table",
  description: "Switches the billing mode of a table",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      billingMode: { type: "string", enum: ["ON_DEMAND", "PROVISIONED"], description: "New billing mode" },
    },
    required: ["tableName", "billingMode"],
  },
};

const DYNAMODB_PUT_ITEM_TOOL: Tool = {
  name: "put_item",
  description: "Inserts an item, replacing any item with the same key",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      item: { type: "object", description: "Item to store; values are strings, numbers, booleans or null" },
      ...conditionalWrite,
    },
    required: ["tableName", "item"],
  },
};

const DYNAMODB_GET_ITEM_TOOL: Tool = {
  name: "get_item",
  description: "Retrieves an item by its primary key",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      key: { type: "object", description: "Primary key of the item to retrieve" },
    },
    required: ["tableName", "key"],
  },
};

const DYNAMODB_UPDATE_ITEM_TOOL: Tool = {
  name: "update_item",
  description: "Applies SET and REMOVE clauses to an item, creating it when absent",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      key: { type: "object", description: "Primary key of the item to update" },
      updateExpression: { type: "string", description: "Update expression (e.g., 'SET #s = :s REMOVE notes')" },
      ...conditionalWrite,
    },
    required: ["tableName", "key", "updateExpression"],
  },
};

const DYNAMODB_DELETE_ITEM_TOOL: Tool = {
  name: "delete_item",
  description: "Deletes an item by its primary key; deleting an absent key succeeds",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      key: { type: "object", description: "Primary key of the item to delete" },
      ...conditionalWrite,
    },
    required: ["tableName", "key"],
  },
};

const DYNAMODB_QUERY_TABLE_TOOL: Tool = {
  name: "query",
  description: "Reads the items of one partition, ordered by sort key",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      keyConditionExpression: { type: "string", description: "Key condition (e.g., 'pk = :pk AND begins_with(sk, :prefix)')" },
      filterExpression: { type: "string", description: "Filter applied after the key condition (optional)" },
      ...expressionBindings,
      limit: { type: "number", description: "Maximum number of items to examine (optional)" },
      scanIndexForward: { type: "boolean", description: "Ascending sort-key order when true (default true)" },
    },
    required: ["tableName", "keyConditionExpression"],
  },
};

const DYNAMODB_SCAN_TABLE_TOOL: Tool = {
  name: "scan",
  description: "Reads every item of a table, optionally filtered",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      filterExpression: { type: "string", description: "Filter expression (optional)" },
      ...expressionBindings,
      limit: { type: "number", description: "Maximum number of items to examine (optional)" },
    },
    required: ["tableName"],
  },
};

const DYNAMODB_BATCH_WRITE_ITEM_TOOL: Tool = {
  name: "batch_write_item",
  description: "Puts several items into one table; each item succeeds or fails on its own",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      items: { type: "array", items: { type: "object" }, description: "Items to store" },
      returnStreamEvent: conditionalWrite.returnStreamEvent,
    },
    required: ["tableName", "items"],
  },
};

const DYNAMODB_BATCH_GET_ITEM_TOOL: Tool = {
  name: "batch_get_item",
  description: "Gets several items from one table by primary key",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      keys: { type: "array", items: { type: "object" }, description: "Primary keys to retrieve" },
    },
    required: ["tableName", "keys"],
  },
};

const DYNAMODB_GET_LEDGER_SUMMARY_TOOL: Tool = {
  name: "get_ledger_summary",
  description: "Reports total operations and cost, per-operation costs and per-table capacity usage",
  inputSchema: {
    type: "object",
    properties: {},
  },
};

const DYNAMODB_GET_ADVISORIES_TOOL: Tool = {
  name: "get_advisories",
  description: "Lists the advisories, index suggestion and capacity report currently standing for a table",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
    },
    required: ["tableName"],
  },
};

const DYNAMODB_GET_STREAM_EVENTS_TOOL: Tool = {
  name: "get_stream_events",
  description: "Returns the most recent change events of a table, oldest first",
  inputSchema: {
    type: "object",
    properties: {
      tableName: { type: "string", description: "Name of the table" },
      limit: { type: "number", description: "Number of most recent events to return (optional)" },
    },
    required: ["tableName"],
  },
};

const DYNAMODB_RESET_LEDGER_TOOL: Tool = {
  name: "reset_ledger",
  description: "Clears the cost ledger",
  inputSchema: {
    type: "object",
    properties: {},
  },
};

export const OPERATION_TOOLS: Tool[] = [
  DYNAMODB_LIST_TABLES_TOOL,
  DYNAMODB_DESCRIBE_TABLE_TOOL,
  DYNAMODB_CREATE_TABLE_TOOL,
  DYNAMODB_UPDATE_TABLE_TOOL,
  DYNAMODB_DELETE_TABLE_TOOL,
  DYNAMODB_PUT_ITEM_TOOL,
  DYNAMODB_GET_ITEM_TOOL,
  DYNAMODB_UPDATE_ITEM_TOOL,
  DYNAMODB_DELETE_ITEM_TOOL,
  DYNAMODB_QUERY_TABLE_TOOL,
  DYNAMODB_SCAN_TABLE_TOOL,
  DYNAMODB_BATCH_WRITE_ITEM_TOOL,
  DYNAMODB_BATCH_GET_ITEM_TOOL,
];

export const ACCESSOR_TOOLS: Tool[] = [
  DYNAMODB_GET_LEDGER_SUMMARY_TOOL,
  DYNAMODB_GET_ADVISORIES_TOOL,
  DYNAMODB_GET_STREAM_EVENTS_TOOL,
  DYNAMODB_RESET_LEDGER_TOOL,
];

export const ALL_TOOLS: Tool[] = [...OPERATION_TOOLS, ...ACCESSOR_TOOLS];
