/**
 * JSON-RPC error codes returned by the MCP endpoint itself
 */
export const JSON_RPC_PARSE_ERROR = -32700;
export const JSON_RPC_INTERNAL_ERROR = -32603;
export const JSON_RPC_SERVER_ERROR = -32000;

export interface JsonRpcErrorResponse {
  readonly jsonrpc: "2.0";
  readonly error: {
    readonly code: number;
    readonly message: string;
  };
  readonly id: null;
}

export interface McpServerInfo {
  readonly name: string;
  readonly version: string;
}

export function createJsonRpcError(code: number, message: string): JsonRpcErrorResponse {
  return {
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  };
}
