import { AxiosInstance } from "axios";
import { z } from "zod";
import { BaseSourceConnector } from "./base-connector";
import { createHttpClient, describeHttpError } from "./helpers/httpClient";
import { parseAdapterConfig } from "../config/app-config";
import { Person, createPerson, pickAttributes } from "../models/person.model";
import { Logger } from "../utils/logger";

export const restApiConfigSchema = z.object({
  method: z.enum(["GET", "POST"]).default("GET"),
  baseURL: z.string().url(),
  path: z.string().default(""),
  authType: z.enum(["none", "basic", "bearer"]).default("none"),
  username: z.string().optional(),
  password: z.string().optional(),
  token: z.string().optional(),
  /** Dot path to the results array inside the response body */
  resultsJSONContainer: z.string().default(""),
  compareAttribute: z.string().min(1),
  timeout: z.number().int().positive().optional(),
});

export type RestApiConfig = z.infer<typeof restApiConfigSchema>;

const restApiSetSchema = z.object({ path: z.string().optional() });

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Flattens one JSON record into string attributes. Nested objects become
 * `parent.child` keys; nulls and arrays are dropped.
 */
export const flattenRecord = (
  record: Record<string, unknown>,
  prefix = "",
): Record<string, string> => {
  const attributes: Record<string, string> = {};

  for (const [key, value] of Object.entries(record)) {
    const name = prefix ? `${prefix}.${key}` : key;

    if (typeof value === "string") {
      attributes[name] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      attributes[name] = String(value);
    } else if (isPlainObject(value)) {
      Object.assign(attributes, flattenRecord(value, name));
    }
  }

  return attributes;
};

/**
 * Walks `container` (dot separated) into `body`. Empty path = body itself.
 */
export const resolveResults = (body: unknown, container: string): unknown[] => {
  let current: unknown = body;

  for (const segment of container.split(".").filter(Boolean)) {
    if (!isPlainObject(current)) {
      throw new Error(`results container "${container}" not found in response`);
    }
    current = current[segment];
  }

  if (!Array.isArray(current)) {
    throw new Error(`results container "${container || "<body>"}" is not an array`);
  }
  return current;
};

/**
 * Reads people from a JSON REST endpoint (an HR roster, typically).
 */
export class RestApiSource extends BaseSourceConnector {
  private readonly config: RestApiConfig;
  private readonly http: AxiosInstance;
  private path: string;

  constructor(extra: Record<string, unknown>, logger?: Logger, http?: AxiosInstance) {
    super(logger);

    this.config = parseAdapterConfig(restApiConfigSchema, extra, "RestAPI source");
    this.path = this.config.path;

    this.http =
      http ??
      createHttpClient({
        baseURL: this.config.baseURL,
        timeout: this.config.timeout,
        headers: { Accept: "application/json" },
      });
  }

  override forSet(setConfig: Record<string, unknown>): void {
    const { path } = parseAdapterConfig(restApiSetSchema, setConfig, "RestAPI sync set");
    if (path !== undefined) {
      this.path = path;
    }
  }

  async listUsers(desiredAttrs?: readonly string[]): Promise<Person[]> {
    let body: unknown;
    try {
      const response = await this.http.request<unknown>({
        method: this.config.method,
        url: this.path,
        headers: this.authHeaders(),
      });
      body = response.data;
    } catch (error) {
      throw describeHttpError(error, "RestAPI list users");
    }

    const people: Person[] = [];
    for (const record of resolveResults(body, this.config.resultsJSONContainer)) {
      if (!isPlainObject(record)) continue;

      const attributes = flattenRecord(record);
      const compareKey = attributes[this.config.compareAttribute];
      if (!compareKey) {
        this.logger.warn(
          `RestAPI record without compare attribute "${this.config.compareAttribute}" skipped`,
        );
        continue;
      }

      people.push(
        createPerson({
          compareKey,
          attributes: pickAttributes(attributes, desiredAttrs),
        }),
      );
    }

    this.logger.debug(`RestAPI returned ${people.length} people`);
    return people;
  }

  private authHeaders(): Record<string, string> {
    switch (this.config.authType) {
      case "basic": {
        const credentials = Buffer.from(
          `${this.config.username ?? ""}:${this.config.password ?? ""}`,
        ).toString("base64");
        return { Authorization: `Basic ${credentials}` };
      }
      case "bearer":
        return { Authorization: `Bearer ${this.config.token ?? ""}` };
      case "none":
        return {};
    }
  }
}
