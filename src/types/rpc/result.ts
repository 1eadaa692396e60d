import type { AppError } from '@common/utils/error-handler';

/**
 * Outcome of a single RPC call. A call either yields its whole result or fails.
 */
export type RpcResult<T> = RpcSuccess<T> | RpcFailure;

export interface RpcSuccess<T> {
  ok: true;
  value: T;
}

export interface RpcFailure {
  ok: false;
  reason: string;
  error: AppError;
}

export function rpcSuccess<T>(value: T): RpcSuccess<T> {
  return { ok: true, value };
}

export function rpcFailure(error: AppError): RpcFailure {
  return { ok: false, reason: error.message, error };
}
