import { Person, PersonAttributes, createPerson } from "../../models/person.model";

/**
 * A Directory API user resource as returned over the wire. Multi-valued
 * fields are loosely typed, so every read goes through a guard.
 */
export type DirectoryUser = Record<string, unknown>;

type DirectoryEntry = Record<string, unknown>;

const isEntry = (value: unknown): value is DirectoryEntry =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const entriesOf = (value: unknown): DirectoryEntry[] =>
  Array.isArray(value) ? value.filter(isEntry) : [];

const stringField = (entry: DirectoryEntry, key: string): string | undefined => {
  const value = entry[key];
  return typeof value === "string" ? value : undefined;
};

/**
 * The `field` value of the first entry whose `type` matches.
 */
const typedValue = (
  entries: unknown,
  type: string,
  field: string,
): string | undefined => {
  const entry = entriesOf(entries).find((item) => item.type === type);
  return entry ? stringField(entry, field) : undefined;
};

const ORGANIZATION_FIELDS = ["costCenter", "department", "title"] as const;

/**
 * Decodes a directory user into flat attributes. Values of an unexpected
 * type are ignored.
 */
export const extractData = (user: DirectoryUser): Person => {
  const email = typeof user.primaryEmail === "string" ? user.primaryEmail : "";
  const attributes: Record<string, string> = { email };

  const set = (key: string, value: string | undefined): void => {
    if (value !== undefined) attributes[key] = value;
  };

  if (isEntry(user.name)) {
    set("familyName", stringField(user.name, "familyName"));
    set("givenName", stringField(user.name, "givenName"));
  }

  set("id", typedValue(user.externalIds, "organization", "value"));
  set("area", typedValue(user.locations, "desk", "area"));

  for (const organization of entriesOf(user.organizations)) {
    for (const field of ORGANIZATION_FIELDS) {
      if (attributes[field] === undefined) {
        set(field, stringField(organization, field));
      }
    }
  }

  set("phone", typedValue(user.phones, "work", "value"));
  set("manager", typedValue(user.relations, "manager", "value"));

  if (isEntry(user.customSchemas)) {
    for (const [schemaName, fields] of Object.entries(user.customSchemas)) {
      if (!isEntry(fields)) continue;
      for (const [fieldName, value] of Object.entries(fields)) {
        if (typeof value === "string") {
          attributes[`${schemaName}.${fieldName}`] = value;
        }
      }
    }
  }

  return createPerson({
    compareKey: email,
    externalID: typeof user.id === "string" ? user.id : undefined,
    attributes,
  });
};

/**
 * Puts `{ type, [field]: value }` first and keeps every entry of another
 * type as it was. Existing entries of the same type are replaced.
 */
const replaceTyped = (
  oldEntries: unknown,
  type: string,
  field: string,
  value: string,
): DirectoryEntry[] => [
  { type, [field]: value },
  ...entriesOf(oldEntries).filter((entry) => entry.type !== type),
];

export const updateIDs = (newID: string, oldIDs: unknown): DirectoryEntry[] =>
  replaceTyped(oldIDs, "organization", "value", newID);

export const updateLocations = (newArea: string, oldLocations: unknown): DirectoryEntry[] =>
  replaceTyped(oldLocations, "desk", "area", newArea);

export const updatePhones = (newPhone: string, oldPhones: unknown): DirectoryEntry[] =>
  replaceTyped(oldPhones, "work", "value", newPhone);

export const updateRelations = (newRelation: string, oldRelations: unknown): DirectoryEntry[] =>
  replaceTyped(oldRelations, "manager", "value", newRelation);

/**
 * Builds the update body for `person`, merging its multi-valued fields into
 * those of the existing user. Keys containing a dot are custom schema
 * fields (`Schema.Field`).
 */
export const newUserForUpdate = (
  attributes: PersonAttributes,
  oldUser: DirectoryUser,
): DirectoryUser => {
  const user: DirectoryUser = {};
  const name: Record<string, string> = {};
  const organization: Record<string, string> = {};
  const customSchemas: Record<string, Record<string, string>> = {};

  for (const [key, value] of Object.entries(attributes)) {
    switch (key) {
      case "email":
        break;
      case "familyName":
      case "givenName":
        name[key] = value;
        break;
      case "id":
        user.externalIds = updateIDs(value, oldUser.externalIds);
        break;
      case "area":
        user.locations = updateLocations(value, oldUser.locations);
        break;
      case "costCenter":
      case "department":
      case "title":
        organization[key] = value;
        break;
      case "phone":
        user.phones = updatePhones(value, oldUser.phones);
        break;
      case "manager":
        user.relations = updateRelations(value, oldUser.relations);
        break;
      default: {
        const dot = key.indexOf(".");
        if (dot <= 0 || dot === key.length - 1) {
          throw new Error(`unsupported Google user attribute "${key}"`);
        }
        const schemaName = key.slice(0, dot);
        customSchemas[schemaName] = {
          ...customSchemas[schemaName],
          [key.slice(dot + 1)]: value,
        };
      }
    }
  }

  if (Object.keys(name).length > 0) user.name = name;

  if (Object.keys(organization).length > 0) {
    const [primary, ...others] = entriesOf(oldUser.organizations);
    user.organizations = [{ ...primary, ...organization }, ...others];
  }

  if (Object.keys(customSchemas).length > 0) user.customSchemas = customSchemas;

  return user;
};
