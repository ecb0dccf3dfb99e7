import { AxiosInstance } from "axios";
import { z } from "zod";
import {
  BaseDestinationConnector,
  DestinationCapabilities,
} from "./base-connector";
import {
  TokenProvider,
  createGoogleTokenProvider,
  googleAuthSchema,
} from "./helpers/googleAuth";
import {
  extractData,
  newUserForUpdate,
} from "./helpers/googleUserAttributes";
import { createHttpClient, describeHttpError } from "./helpers/httpClient";
import { parseAdapterConfig } from "../config/app-config";
import { Person, withPerson, pickAttributes } from "../models/person.model";
import { Logger } from "../utils/logger";

export const DIRECTORY_API_BASE_URL = "https://admin.googleapis.com/admin/directory/v1";
export const DIRECTORY_USER_SCOPE = "https://www.googleapis.com/auth/admin.directory.user";
export const DEFAULT_USERS_BATCH_SIZE_PER_MINUTE = 10;
const LIST_PAGE_SIZE = 500;

export const googleUsersConfigSchema = z.object({
  delegatedAdminEmail: z.string().min(1),
  /** Empty lists every user of the account's customer */
  domain: z.string().default(""),
  googleAuth: googleAuthSchema,
  batchSizePerMinute: z.number().int().default(0),
  timeout: z.number().int().positive().optional(),
});

export type GoogleUsersConfig = z.infer<typeof googleUsersConfigSchema>;

const usersPageSchema = z.object({
  users: z.array(z.record(z.unknown())).default([]),
  nextPageToken: z.string().optional(),
});

const directoryUserSchema = z.record(z.unknown());

/**
 * Google Workspace users through the Admin SDK Directory API. Accounts
 * are provisioned elsewhere, so only updates are applied here.
 */
export class GoogleUsersDestination extends BaseDestinationConnector {
  private readonly config: GoogleUsersConfig;
  private readonly http: AxiosInstance;
  private readonly getToken: TokenProvider;

  constructor(
    extra: Record<string, unknown>,
    logger?: Logger,
    http?: AxiosInstance,
    tokenProvider?: TokenProvider,
  ) {
    const config = parseAdapterConfig(googleUsersConfigSchema, extra, "GoogleUsers destination");
    super(
      {
        batchSize:
          config.batchSizePerMinute > 0
            ? config.batchSizePerMinute
            : DEFAULT_USERS_BATCH_SIZE_PER_MINUTE,
        windowSeconds: 60,
      },
      logger,
    );

    this.config = config;
    this.http =
      http ??
      createHttpClient({
        baseURL: DIRECTORY_API_BASE_URL,
        timeout: config.timeout,
        headers: { "Content-Type": "application/json" },
      });
    this.getToken =
      tokenProvider ??
      createGoogleTokenProvider(config.googleAuth, config.delegatedAdminEmail, [
        DIRECTORY_USER_SCOPE,
      ]);
  }

  getName(): string {
    return "GoogleUsers";
  }

  getCapabilities(): DestinationCapabilities {
    return { create: false, update: true, delete: false };
  }

  async listUsers(desiredAttrs?: readonly string[]): Promise<Person[]> {
    const people: Person[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.listUsersPage(pageToken);
      for (const user of page.users) {
        const person = extractData(user);
        people.push(
          withPerson(person, { attributes: pickAttributes(person.attributes, desiredAttrs) }),
        );
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    this.logger.debug(`GoogleUsers returned ${people.length} users`);
    return people;
  }

  protected async createPerson(_person: Person): Promise<void> {
    throw new Error("GoogleUsers does not create accounts");
  }

  protected async updatePerson(person: Person): Promise<void> {
    const userKey = encodeURIComponent(person.externalID ?? person.compareKey);
    const headers = await this.authHeaders();

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(`/users/${userKey}`, {
        headers,
        params: { projection: "full" },
      });
      data = response.data;
    } catch (error) {
      throw describeHttpError(error, "GoogleUsers get user");
    }

    const oldUser = directoryUserSchema.safeParse(data);
    if (!oldUser.success) {
      throw new Error(`unexpected GoogleUsers response for ${person.compareKey}`);
    }

    const body = newUserForUpdate(person.attributes, oldUser.data);

    try {
      await this.http.put(`/users/${userKey}`, body, { headers });
    } catch (error) {
      throw describeHttpError(error, "GoogleUsers update user");
    }
  }

  protected async deletePerson(_person: Person): Promise<void> {
    throw new Error("GoogleUsers does not delete accounts");
  }

  private async listUsersPage(
    pageToken?: string,
  ): Promise<z.infer<typeof usersPageSchema>> {
    const params: Record<string, string | number> = {
      maxResults: LIST_PAGE_SIZE,
      projection: "full",
    };
    if (this.config.domain) {
      params.domain = this.config.domain;
    } else {
      params.customer = "my_customer";
    }
    if (pageToken) params.pageToken = pageToken;

    let data: unknown;
    try {
      const response = await this.http.get<unknown>("/users", {
        headers: await this.authHeaders(),
        params,
      });
      data = response.data;
    } catch (error) {
      throw describeHttpError(error, "GoogleUsers list users");
    }

    const parsed = usersPageSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error("unexpected GoogleUsers list response");
    }
    return parsed.data;
  }

  private async authHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.getToken()}` };
  }
}
