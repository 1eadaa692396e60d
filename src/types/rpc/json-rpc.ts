/**
 * JSON-RPC 1.0 envelopes as spoken by bitcoind
 */

export type JsonRpcParams = ReadonlyArray<unknown>;

/**
 * RPC method request payload
 */
export interface JsonRpcRequest {
  jsonrpc: '1.0';
  id: string;
  method: string;
  params: JsonRpcParams;
}

/**
 * RPC error member of a response envelope
 */
export interface JsonRpcError {
  code: number;
  message: string;
}

/**
 * RPC method response
 */
export interface JsonRpcResponse<T = unknown> {
  id: string | number | null;
  result?: T | null;
  error?: JsonRpcError | null;
}
