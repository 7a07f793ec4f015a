import axios, { type AxiosRequestConfig } from "axios";
import { toApiError } from "./apiError.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
}

/**
 * Thin axios wrapper bound to one API resource. Every failure is rethrown
 * as an ApiError.
 */
export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.get<T>(path, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.post<T>(path, params.body, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
