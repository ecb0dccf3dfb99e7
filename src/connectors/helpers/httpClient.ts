import axios, { AxiosError, AxiosInstance, RawAxiosRequestHeaders } from "axios";
import axiosRetry from "axios-retry";

export interface HttpClientOptions {
  baseURL?: string;
  timeout?: number;
  retries?: number;
  headers?: RawAxiosRequestHeaders;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;
export const DEFAULT_HTTP_RETRIES = 3;

const NON_IDEMPOTENT_METHODS = new Set(["post", "patch"]);

/**
 * 429 is retried for every method. Network errors, timeouts and 5xx are
 * retried only where resending cannot apply the request twice.
 */
export const shouldRetryRequest = (error: AxiosError): boolean => {
  if (error.response?.status === 429) return true;

  const method = error.config?.method?.toLowerCase() ?? "get";
  if (NON_IDEMPOTENT_METHODS.has(method)) return false;

  return (
    axiosRetry.isNetworkError(error) ||
    axiosRetry.isRetryableError(error) ||
    error.code === AxiosError.ECONNABORTED
  );
};

/**
 * Axios instance with a per-request timeout and automatic retries
 * (see `shouldRetryRequest`).
 */
export const createHttpClient = (options: HttpClientOptions = {}): AxiosInstance => {
  const http = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout ?? DEFAULT_HTTP_TIMEOUT_MS,
    headers: options.headers,
  });

  axiosRetry(http, {
    retries: options.retries ?? DEFAULT_HTTP_RETRIES,
    retryDelay: axiosRetry.exponentialDelay,
    retryCondition: shouldRetryRequest,
  });

  return http;
};

/**
 * Normalises axios failures into a plain Error naming the request.
 */
export const describeHttpError = (error: unknown, context: string): Error => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const method = error.config?.method?.toUpperCase() ?? "REQUEST";
    const url = error.config?.url ?? "";
    return new Error(
      `${context} failed (${method} ${url}${status ? ` HTTP ${status}` : ""}): ${error.message}`,
    );
  }
  return error instanceof Error ? error : new Error(String(error));
};
