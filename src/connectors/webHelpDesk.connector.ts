import { AxiosInstance } from "axios";
import { z } from "zod";
import {
  BaseDestinationConnector,
  DestinationCapabilities,
} from "./base-connector";
import { createHttpClient, describeHttpError } from "./helpers/httpClient";
import { parseAdapterConfig } from "../config/app-config";
import { Person, createPerson, pickAttributes } from "../models/person.model";
import { Logger } from "../utils/logger";

export const DEFAULT_BATCH_SIZE_PER_MINUTE = 50;
export const DEFAULT_LIST_CLIENTS_PAGE_LIMIT = 100;
export const CLIENTS_API_PATH = "/ra/Clients";

export const webHelpDeskConfigSchema = z.object({
  url: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
  listClientsPageLimit: z.number().int().default(0),
  batchSizePerMinute: z.number().int().default(0),
  timeout: z.number().int().positive().optional(),
});

export type WebHelpDeskConfig = z.infer<typeof webHelpDeskConfigSchema>;

/**
 * A WebHelpDesk "Client" is the help desk's end user record.
 */
const clientSchema = z.object({
  id: z.number().int().optional(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
  email: z.string().nullish(),
  username: z.string().nullish(),
});

export type WebHelpDeskClient = z.infer<typeof clientSchema>;

export const personFromClient = (
  client: WebHelpDeskClient,
  desiredAttrs?: readonly string[],
): Person => {
  const email = client.email ?? "";
  const attributes: Record<string, string> = {
    email,
    firstName: client.firstName ?? "",
    lastName: client.lastName ?? "",
    username: client.username ?? "",
  };
  if (client.id !== undefined) attributes.id = String(client.id);

  return createPerson({
    compareKey: email,
    externalID: client.id !== undefined ? String(client.id) : undefined,
    attributes: pickAttributes(attributes, desiredAttrs),
  });
};

/**
 * Request body for create and update. The numeric id comes from the
 * destination handle when present, else from an `id` attribute.
 */
export const clientFromPerson = (person: Person): WebHelpDeskClient => {
  const client: WebHelpDeskClient = {
    firstName: person.attributes.firstName ?? "",
    lastName: person.attributes.lastName ?? "",
    email: person.attributes.email ?? "",
    username: person.attributes.username ?? "",
  };

  const rawId = person.externalID ?? person.attributes.id;
  if (rawId !== undefined) {
    const id = Number(rawId);
    if (!Number.isInteger(id)) {
      throw new Error(`invalid WebHelpDesk client id "${rawId}"`);
    }
    client.id = id;
  }

  return client;
};

/**
 * WebHelpDesk ticketing destination. Its API cannot deactivate or
 * delete clients, so deletes are reported and skipped.
 */
export class WebHelpDeskDestination extends BaseDestinationConnector {
  private readonly config: WebHelpDeskConfig;
  private readonly http: AxiosInstance;
  private readonly pageLimit: number;

  constructor(extra: Record<string, unknown>, logger?: Logger, http?: AxiosInstance) {
    const config = parseAdapterConfig(webHelpDeskConfigSchema, extra, "WebHelpDesk destination");
    super(
      {
        batchSize:
          config.batchSizePerMinute > 0
            ? config.batchSizePerMinute
            : DEFAULT_BATCH_SIZE_PER_MINUTE,
        windowSeconds: 60,
      },
      logger,
    );

    this.config = config;
    this.pageLimit =
      config.listClientsPageLimit > 0
        ? config.listClientsPageLimit
        : DEFAULT_LIST_CLIENTS_PAGE_LIMIT;
    this.http =
      http ??
      createHttpClient({
        baseURL: config.url,
        timeout: config.timeout,
        headers: { "Content-Type": "application/json" },
      });
  }

  getName(): string {
    return "WebHelpDesk";
  }

  getCapabilities(): DestinationCapabilities {
    return { create: true, update: true, delete: false };
  }

  async listUsers(desiredAttrs?: readonly string[]): Promise<Person[]> {
    const clients: WebHelpDeskClient[] = [];

    for (let page = 1; ; page++) {
      const batch = await this.listClientsPage(page);
      clients.push(...batch);

      // a short page is the last one
      if (batch.length < this.pageLimit) break;
    }

    return clients.map((client) => personFromClient(client, desiredAttrs));
  }

  protected async createPerson(person: Person): Promise<void> {
    await this.send("post", clientFromPerson(person), "create client");
  }

  protected async updatePerson(person: Person): Promise<void> {
    await this.send("put", clientFromPerson(person), "update client");
  }

  protected async deletePerson(_person: Person): Promise<void> {
    throw new Error("WebHelpDesk does not support deleting clients");
  }

  private async listClientsPage(page: number): Promise<WebHelpDeskClient[]> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(CLIENTS_API_PATH, {
        params: { ...this.authParams(), limit: this.pageLimit, page },
      });
      data = response.data;
    } catch (error) {
      throw describeHttpError(error, "WebHelpDesk list clients");
    }

    const parsed = z.array(clientSchema).safeParse(data);
    if (!parsed.success) {
      throw new Error(`unexpected WebHelpDesk clients response on page ${page}`);
    }
    return parsed.data;
  }

  private async send(
    method: "post" | "put",
    client: WebHelpDeskClient,
    context: string,
  ): Promise<void> {
    try {
      await this.http.request({
        method,
        url: CLIENTS_API_PATH,
        params: this.authParams(),
        data: client,
      });
    } catch (error) {
      throw describeHttpError(error, `WebHelpDesk ${context}`);
    }
  }

  private authParams(): Record<string, string> {
    return { username: this.config.username, apiKey: this.config.password };
  }
}
