import { AttributeMapping } from "../models/sync-config.model";
import { Person, createPerson } from "../models/person.model";
import logger, { Logger } from "../utils/logger";

/**
 * Remaps source people onto the destination's attribute keys.
 *
 * Each output record carries only the destination keys declared in the
 * mapping. A record missing a required source attribute is not dropped:
 * it comes back with `changesDisabled` set, so it is neither created nor
 * updated but still keeps its destination counterpart from being deleted.
 */
export const projectToDestinationAttributes = (
  sourcePeople: readonly Person[],
  mapping: readonly AttributeMapping[],
  log: Logger = logger,
): Person[] =>
  sourcePeople.map((person) => {
    const attributes: Record<string, string> = {};
    const missing: string[] = [];

    for (const entry of mapping) {
      if (Object.prototype.hasOwnProperty.call(person.attributes, entry.sourceKey)) {
        attributes[entry.destinationKey] = person.attributes[entry.sourceKey];
      } else if (entry.required) {
        missing.push(entry.sourceKey);
      }
    }

    if (missing.length > 0) {
      log.warn(`user ${person.compareKey} missing required attribute(s): ${missing.join(", ")}`, {
        compareKey: person.compareKey,
        missing,
        attributes,
      });
    }

    return createPerson({
      compareKey: person.compareKey,
      attributes,
      changesDisabled: person.changesDisabled || missing.length > 0,
    });
  });

/**
 * Source-side keys to request from the source adapter.
 */
export const sourceKeysOf = (mapping: readonly AttributeMapping[]): string[] =>
  Array.from(new Set(mapping.map((entry) => entry.sourceKey)));

/**
 * Destination-side keys to request from the destination adapter.
 */
export const destinationKeysOf = (
  mapping: readonly AttributeMapping[],
): string[] => Array.from(new Set(mapping.map((entry) => entry.destinationKey)));
