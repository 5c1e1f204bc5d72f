import axios, { type AxiosRequestConfig } from "axios";
import { cfg } from "../config.js";

/** The slice of axios the providers use; tests pass a fake. */
export type HttpGet = (
  url: string,
  config?: AxiosRequestConfig
) => Promise<{ data: unknown }>;

export function createHttpGet(
  userAgent: string,
  defaults: AxiosRequestConfig = {}
): HttpGet {
  const client = axios.create({
    timeout: cfg.HTTP_TIMEOUT_MS,
    headers: { "User-Agent": userAgent },
    ...defaults,
  });
  return (url, config) => client.get(url, config);
}
