// CHANGE: Shared fixtures for axios responses, errors and project pages.
// WHY: Tests stub the axios instance and never reach the network.

import axios, { AxiosError, AxiosHeaders, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import type { Settings } from "../src/config.js";
import type { Project } from "../src/types.js";

export const HOST = "https://api.example.test";

export const testSettings: Settings = {
  api: {
    host: HOST,
    basePath: "/rest",
    version: "2024-05-23",
    pageLimit: 100,
    timeoutMs: 1000
  },
  pacing: {
    requestDelayMs: 5,
    rateLimitDelayMs: 100,
    maxRateLimitRetries: null
  }
};

export const FIRST_PAGE_URL = `${HOST}/rest/orgs/org-1/projects?version=2024-05-23&limit=100`;

const requestConfig: InternalAxiosRequestConfig = {
  url: FIRST_PAGE_URL,
  headers: new AxiosHeaders()
};

export function ok<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    status,
    statusText: "OK",
    headers: {},
    config: requestConfig,
    data
  };
}

export function httpError(status: number, statusText = "", data: unknown = null): AxiosError {
  const error = new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", requestConfig);
  error.response = {
    status,
    statusText,
    headers: {},
    config: requestConfig,
    data
  } satisfies AxiosResponse;
  return error;
}

export function networkError(): AxiosError {
  return new AxiosError("socket hang up", "ECONNRESET", requestConfig);
}

export function newClient(): AxiosInstance {
  return axios.create();
}

export function project(id: string | undefined, name = `Project ${id ?? "?"}`): Project {
  return id === undefined ? { name, attributes: {} } : { id, name, attributes: { name } };
}

export function pageBody(ids: readonly string[], next?: string) {
  return {
    data: ids.map(id => ({ id, type: "project", attributes: { name: `Project ${id}`, type: "npm" } })),
    links: next === undefined ? {} : { next }
  };
}

export function noPause(): Promise<void> {
  return Promise.resolve();
}
