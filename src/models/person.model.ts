/**
 * Person Data Model
 * The comparable unit exchanged between a source directory, the
 * reconciliation engine and a destination directory.
 */

// ============================================================================
// PERSON
// ============================================================================

export type PersonAttributes = Readonly<Record<string, string>>;

export interface Person {
  /** Identity used for matching; compared case-insensitively */
  readonly compareKey: string;

  /** Destination-side handle (resource URL, numeric id, user key...) */
  readonly externalID?: string;

  readonly attributes: PersonAttributes;

  /** Excluded from create/update, still counted as present */
  readonly changesDisabled: boolean;
}

export interface PersonInit {
  compareKey: string;
  externalID?: string;
  attributes?: Record<string, string>;
  changesDisabled?: boolean;
}

/**
 * Builds a frozen Person. Attributes are copied so callers can keep
 * reusing the object they passed in.
 */
export const createPerson = (init: PersonInit): Person => {
  const person: Person = {
    compareKey: init.compareKey,
    attributes: Object.freeze({ ...(init.attributes ?? {}) }),
    changesDisabled: init.changesDisabled ?? false,
    ...(init.externalID !== undefined ? { externalID: init.externalID } : {}),
  };

  return Object.freeze(person);
};

/**
 * Returns a copy of `person` with the given fields replaced.
 */
export const withPerson = (
  person: Person,
  changes: Partial<PersonInit>,
): Person =>
  createPerson({
    compareKey: person.compareKey,
    externalID: person.externalID,
    attributes: { ...person.attributes },
    changesDisabled: person.changesDisabled,
    ...changes,
  });

export const normalizeCompareKey = (compareKey: string): string =>
  compareKey.toLowerCase();

/**
 * Full structural equality: same key set, same values.
 */
export const attributesEqual = (
  a: PersonAttributes,
  b: PersonAttributes,
): boolean => {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;

  for (const key of keysA) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (a[key] !== b[key]) return false;
  }
  return true;
};

/**
 * Keeps only the listed attribute keys. An empty list keeps everything.
 */
export const pickAttributes = (
  attributes: Record<string, string>,
  desiredAttrs?: readonly string[],
): Record<string, string> => {
  if (!desiredAttrs || desiredAttrs.length === 0) return { ...attributes };

  const picked: Record<string, string> = {};
  for (const key of desiredAttrs) {
    if (Object.prototype.hasOwnProperty.call(attributes, key)) {
      picked[key] = attributes[key];
    }
  }
  return picked;
};
