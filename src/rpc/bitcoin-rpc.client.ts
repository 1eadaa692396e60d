import { BITCOIN_RPC } from '@common/constants/config';
import { ErrorHandler, RpcError, errorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger } from '@nestjs/common';
import { JsonRpcParams, JsonRpcRequest, JsonRpcResponse, RpcResult, rpcFailure, rpcSuccess } from '@types';
import axios, { AxiosRequestConfig, isAxiosError } from 'axios';

function isJsonRpcResponse<T = unknown>(data: unknown): data is JsonRpcResponse<T> {
  return typeof data === 'object' && data !== null && !Array.isArray(data) && ('result' in data || 'error' in data);
}

/**
 * Client for bitcoind's JSON-RPC 1.0 interface.
 *
 * Each call is a single attempt bounded by the configured timeout. Failures of
 * any kind (transport, HTTP status, undecodable body, RPC error, missing result)
 * are returned as a failed {@link RpcResult}; `call` never rejects.
 */
@Injectable()
export class BitcoinRpcClient {
  private readonly logger = new Logger(BitcoinRpcClient.name);
  private readonly errorHandler = new ErrorHandler(BitcoinRpcClient.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Call an RPC method
   * @param method The RPC method name
   * @param params Parameters for the method
   * @param targetHost Host to call instead of the configured BITCOIN_HOST
   */
  async call<T>(method: string, params: JsonRpcParams = [], targetHost?: string): Promise<RpcResult<T>> {
    let host = targetHost ?? 'unknown';
    const startTime = Date.now();

    try {
      const { host: defaultHost, port, user, password, timeoutMs } = this.configService.getRpcConfig();
      host = targetHost ?? defaultHost;
      const url = `http://${host}:${port}`;

      const request: JsonRpcRequest = {
        jsonrpc: BITCOIN_RPC.JSONRPC_VERSION,
        id: BITCOIN_RPC.REQUEST_ID,
        method,
        params,
      };

      const config: AxiosRequestConfig = {
        timeout: timeoutMs,
        headers: { 'Content-Type': 'application/json' },
        auth: { username: user, password },
      };

      const response = await axios.post<unknown>(url, request, config);
      this.logger.debug(`RPC call ${method} on ${host} completed in ${Date.now() - startTime}ms`);
      return this.unwrap<T>(response.data, method, host);
    } catch (error) {
      return rpcFailure(this.describeFailure(error, method, host, Date.now() - startTime));
    }
  }

  private unwrap<T>(data: unknown, method: string, host: string): RpcResult<T> {
    if (!isJsonRpcResponse<T>(data)) {
      return rpcFailure(this.errorHandler.handleRpcError('Malformed RPC response', host, method));
    }

    if (data.error) {
      const message = `RPC error: ${data.error.message} (code: ${data.error.code})`;
      return rpcFailure(this.errorHandler.handleRpcError(message, host, method));
    }

    if (data.result === undefined || data.result === null) {
      return rpcFailure(this.errorHandler.handleRpcError('RPC response has no result', host, method));
    }

    return rpcSuccess(data.result);
  }

  private describeFailure(error: unknown, method: string, host: string, elapsedMs: number): RpcError {
    let message: string;

    if (isAxiosError(error) && error.response) {
      // bitcoind reports RPC errors with a 500 status and a JSON envelope
      const body: unknown = error.response.data;
      if (isJsonRpcResponse(body) && body.error) {
        message = `RPC error: ${body.error.message} (code: ${body.error.code})`;
      } else {
        message = `HTTP error ${error.response.status}: ${error.response.statusText}`;
      }
    } else if (isAxiosError(error) && error.request) {
      message = `No response received (${error.code ?? 'unknown'} after ${elapsedMs}ms)`;
    } else {
      // configuration errors and anything else thrown before the request went out
      message = errorMessage(error);
    }

    return this.errorHandler.handleRpcError(message, host, method);
  }
}
