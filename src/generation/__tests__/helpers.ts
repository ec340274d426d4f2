import { AxiosError } from "axios";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";

/**
 * An axios adapter answering every request with `status` and `data`,
 * rejecting non-2xx responses the way axios' own adapters do.
 */
export function stubAdapter(
  status: number,
  data: unknown,
  requests: InternalAxiosRequestConfig[] = [],
): AxiosAdapter {
  return async (config) => {
    requests.push(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response,
      );
    }
    return response;
  };
}

/** An adapter that fails without a response, like a refused connection. */
export function networkErrorAdapter(): AxiosAdapter {
  return async (config) => {
    throw new AxiosError("connect ECONNREFUSED", AxiosError.ERR_NETWORK, config);
  };
}

export function requestBody(config: InternalAxiosRequestConfig | undefined): unknown {
  return typeof config?.data === "string" ? JSON.parse(config.data) : config?.data;
}
