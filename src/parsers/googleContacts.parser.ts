import { Parser, processors } from "xml2js";

export interface GoogleContactOrganization {
  name: string;
  title: string;
  jobDescription: string;
  department: string;
}

/**
 * One entry of the domain shared contacts feed, flattened.
 */
export interface GoogleContact {
  selfLink: string;
  etag: string;
  title: string;
  givenName: string;
  familyName: string;
  primaryEmail: string;
  primaryPhone: string;
  where: string;
  organization: GoogleContactOrganization;
}

export interface GoogleContactsFeed {
  total: number;
  contacts: GoogleContact[];
}

type XmlNode = Record<string, unknown>;

const isNode = (value: unknown): value is XmlNode =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** explicitArray is off, so repeated elements may arrive as one object */
const asArray = (value: unknown): unknown[] => {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
};

const textOf = (node: unknown): string => {
  if (typeof node === "string") return node;
  if (isNode(node) && typeof node._ === "string") return node._;
  return "";
};

const attrOf = (node: unknown, name: string): string => {
  if (!isNode(node) || !isNode(node.$)) return "";
  const value = node.$[name];
  return typeof value === "string" ? value : "";
};

const isPrimary = (node: unknown): boolean => attrOf(node, "primary") === "true";

const createParser = (): Parser =>
  new Parser({
    explicitArray: false,
    ignoreAttrs: false,
    tagNameProcessors: [processors.stripPrefix],
    attrNameProcessors: [processors.stripPrefix],
  });

const parseXml = async (xml: string): Promise<XmlNode> => {
  const parsed: unknown = await createParser().parseStringPromise(xml);
  if (!isNode(parsed)) {
    throw new Error("Invalid contacts response: not an XML document");
  }
  return parsed;
};

const toContact = (entry: unknown): GoogleContact => {
  const node = isNode(entry) ? entry : {};
  const name = isNode(node.name) ? node.name : {};
  const organization = isNode(node.organization) ? node.organization : {};

  const selfLink = asArray(node.link).find((link) => attrOf(link, "rel") === "self");
  const email = asArray(node.email).find(isPrimary);
  const phone = asArray(node.phoneNumber).find(isPrimary);

  return {
    selfLink: attrOf(selfLink, "href"),
    etag: attrOf(node, "etag"),
    title: textOf(node.title),
    givenName: textOf(name.givenName),
    familyName: textOf(name.familyName),
    primaryEmail: attrOf(email, "address"),
    primaryPhone: textOf(phone),
    where: attrOf(node.where, "valueString"),
    organization: {
      name: textOf(organization.orgName),
      title: textOf(organization.orgTitle),
      jobDescription: textOf(organization.orgJobDescription),
      department: textOf(organization.orgDepartment),
    },
  };
};

/**
 * Parses the Atom feed returned by a contacts listing.
 */
export const parseContactsFeed = async (xml: string): Promise<GoogleContactsFeed> => {
  const document = await parseXml(xml);
  const feed = document.feed;
  if (!isNode(feed)) {
    throw new Error("Invalid contacts response: missing feed element");
  }

  const total = Number.parseInt(textOf(feed.totalResults), 10);
  const contacts = asArray(feed.entry).map(toContact);

  return {
    total: Number.isNaN(total) ? contacts.length : total,
    contacts,
  };
};

/**
 * Parses a single contact entry (GET on a contact's self link).
 */
export const parseContactEntry = async (xml: string): Promise<GoogleContact> => {
  const document = await parseXml(xml);
  if (!isNode(document.entry)) {
    throw new Error("Invalid contacts response: missing entry element");
  }
  return toContact(document.entry);
};
