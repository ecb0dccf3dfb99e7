import { AxiosInstance, Method } from "axios";
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
import { createHttpClient, describeHttpError } from "./helpers/httpClient";
import { GoogleContactsBuilder } from "../builders/googleContacts.builder";
import { parseAdapterConfig } from "../config/app-config";
import { Person, createPerson, pickAttributes } from "../models/person.model";
import {
  GoogleContact,
  parseContactEntry,
  parseContactsFeed,
} from "../parsers/googleContacts.parser";
import { Logger } from "../utils/logger";

export const MAX_QUERY_SIZE = 10000;
export const DEFAULT_CONTACTS_BATCH_SIZE = 10;
export const DEFAULT_CONTACTS_BATCH_DELAY_SECONDS = 3;
export const CONTACTS_SCOPE = "https://www.google.com/m8/feeds/contacts/";
const CONTACTS_FEED_BASE = "https://www.google.com/m8/feeds/contacts";

export const googleContactsConfigSchema = z.object({
  delegatedAdminEmail: z.string().min(1),
  domain: z.string().min(1),
  googleAuth: googleAuthSchema,
  batchSize: z.number().int().default(0),
  batchDelaySeconds: z.number().int().default(0),
  timeout: z.number().int().positive().optional(),
});

export type GoogleContactsConfig = z.infer<typeof googleContactsConfigSchema>;

interface ContactsRequest {
  method: Method;
  url: string;
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  data?: string;
}

export const personFromContact = (
  contact: GoogleContact,
  desiredAttrs?: readonly string[],
): Person =>
  createPerson({
    compareKey: contact.primaryEmail,
    externalID: contact.selfLink,
    attributes: pickAttributes(
      {
        id: contact.selfLink,
        email: contact.primaryEmail,
        phoneNumber: contact.primaryPhone,
        fullName: contact.title,
        givenName: contact.givenName,
        familyName: contact.familyName,
        where: contact.where,
        organization: contact.organization.name,
        title: contact.organization.title,
        jobDescription: contact.organization.jobDescription,
        department: contact.organization.department,
      },
      desiredAttrs,
    ),
  });

/**
 * Domain shared contacts (GData Atom feed). Contacts are addressed by
 * their self link; updates and deletes are conditional on the entry ETag.
 */
export class GoogleContactsDestination extends BaseDestinationConnector {
  private readonly config: GoogleContactsConfig;
  private readonly http: AxiosInstance;
  private readonly getToken: TokenProvider;
  private readonly builder = new GoogleContactsBuilder();

  constructor(
    extra: Record<string, unknown>,
    logger?: Logger,
    http?: AxiosInstance,
    tokenProvider?: TokenProvider,
  ) {
    const config = parseAdapterConfig(
      googleContactsConfigSchema,
      extra,
      "GoogleContacts destination",
    );
    super(
      {
        batchSize: config.batchSize > 0 ? config.batchSize : DEFAULT_CONTACTS_BATCH_SIZE,
        windowSeconds:
          config.batchDelaySeconds > 0
            ? config.batchDelaySeconds
            : DEFAULT_CONTACTS_BATCH_DELAY_SECONDS,
      },
      logger,
    );

    this.config = config;
    this.http =
      http ??
      createHttpClient({
        timeout: config.timeout,
        headers: { "GData-Version": "3.0" },
      });
    this.getToken =
      tokenProvider ??
      createGoogleTokenProvider(config.googleAuth, config.delegatedAdminEmail, [
        CONTACTS_SCOPE,
      ]);
  }

  getName(): string {
    return "GoogleContacts";
  }

  getCapabilities(): DestinationCapabilities {
    return { create: true, update: true, delete: true };
  }

  async listUsers(desiredAttrs?: readonly string[]): Promise<Person[]> {
    const body = await this.request(
      { method: "get", url: this.feedUrl(), params: { "max-results": MAX_QUERY_SIZE } },
      "GoogleContacts list contacts",
    );

    const feed = await parseContactsFeed(body);
    if (feed.total >= MAX_QUERY_SIZE) {
      throw new Error("too many entries in Google Contacts directory");
    }

    this.logger.debug(`GoogleContacts returned ${feed.contacts.length} contacts`);
    return feed.contacts.map((contact) => personFromContact(contact, desiredAttrs));
  }

  protected async createPerson(person: Person): Promise<void> {
    await this.request(
      {
        method: "post",
        url: this.feedUrl(),
        headers: { "Content-Type": "application/atom+xml" },
        data: this.builder.buildEntry(person.attributes),
      },
      "GoogleContacts create contact",
    );
  }

  protected async updatePerson(person: Person): Promise<void> {
    const url = this.contactUrl(person);
    const contact = await this.getContact(url);

    await this.request(
      {
        method: "put",
        url,
        headers: {
          "Content-Type": "application/atom+xml",
          "If-Match": contact.etag,
        },
        data: this.builder.buildEntry(person.attributes),
      },
      "GoogleContacts update contact",
    );
  }

  protected async deletePerson(person: Person): Promise<void> {
    const url = this.contactUrl(person);
    const contact = await this.getContact(url);

    await this.request(
      { method: "delete", url, headers: { "If-Match": contact.etag } },
      "GoogleContacts delete contact",
    );
  }

  private async getContact(url: string): Promise<GoogleContact> {
    const body = await this.request({ method: "get", url }, "GoogleContacts get contact");
    return parseContactEntry(body);
  }

  private contactUrl(person: Person): string {
    if (!person.externalID) {
      throw new Error(`no contact link known for ${person.compareKey}`);
    }
    return person.externalID;
  }

  private feedUrl(): string {
    return `${CONTACTS_FEED_BASE}/${encodeURIComponent(this.config.domain)}/full`;
  }

  private async request(contactsRequest: ContactsRequest, context: string): Promise<string> {
    const token = await this.getToken();

    try {
      const response = await this.http.request<unknown>({
        ...contactsRequest,
        responseType: "text",
        headers: {
          ...contactsRequest.headers,
          Authorization: `Bearer ${token}`,
          "GData-Version": "3.0",
        },
      });
      return typeof response.data === "string" ? response.data : "";
    } catch (error) {
      throw describeHttpError(error, context);
    }
  }
}
