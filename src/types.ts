export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

/** Lightweight search hit as produced by the retrieval client. */
export type Match = {
  id: string;
  title: string;
  snippet: string;
  url: string;
};

/** Wire shape of a single search result. */
export type SearchResult = {
  id: string;
  title: string;
  text: string;
  url: string;
};

export type FetchResponse = {
  id: string;
  title: string;
  text: string;
  url: string;
  metadata: JsonObject | null;
};

export type ErrorKind =
  | "invalid_input"
  | "validation"
  | "upstream"
  | "serialization"
  | "internal";

export type HandlerResult =
  | { ok: true; value: JsonValue }
  | { ok: false; kind: ErrorKind; message: string; details?: JsonValue };

export type InputSchema = {
  type: "object";
  properties: JsonObject;
  required: string[];
};

export type OperationHandler = (args: unknown) => Promise<HandlerResult>;

export interface Operation {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: InputSchema;
  readonly handler: OperationHandler;
}

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: InputSchema;
};

export type RequestId = string | number;

export type McpError = {
  code: number;
  message: string;
  data?: JsonValue;
};

export type McpResponse =
  | { jsonrpc: "2.0"; id: RequestId | null; result: JsonValue }
  | { jsonrpc: "2.0"; id: RequestId | null; error: McpError };

export interface ServiceInfo {
  name: string;
  version: string;
}
