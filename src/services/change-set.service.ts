import { ChangeSet, emptyChangeSet } from "../models/change-set.model";
import {
  Person,
  attributesEqual,
  normalizeCompareKey,
  withPerson,
} from "../models/person.model";

export enum PersonStatus {
  NOT_IN_LIST = "not_in_list",
  IN_LIST = "in_list",
  IN_LIST_BUT_DIFFERENT = "in_list_but_different",
}

/**
 * Lowercased compareKey → first person with that key, in listing order.
 */
export const indexByCompareKey = (
  people: readonly Person[],
): Map<string, Person> => {
  const index = new Map<string, Person>();
  for (const person of people) {
    const key = normalizeCompareKey(person.compareKey);
    if (!index.has(key)) index.set(key, person);
  }
  return index;
};

export const personStatusInIndex = (
  person: Person,
  index: ReadonlyMap<string, Person>,
): PersonStatus => {
  const match = index.get(normalizeCompareKey(person.compareKey));
  if (!match) return PersonStatus.NOT_IN_LIST;

  return attributesEqual(person.attributes, match.attributes)
    ? PersonStatus.IN_LIST
    : PersonStatus.IN_LIST_BUT_DIFFERENT;
};

/**
 * Three-way diff of projected source people against the destination.
 *
 * Updates queue the source record, addressed with the matched destination
 * record's externalID. Disabled source records are never created or
 * updated, but they still count as present when looking for deletes.
 */
export const generateChangeSet = (
  sourcePeople: readonly Person[],
  destinationPeople: readonly Person[],
): ChangeSet => {
  const changeSet = emptyChangeSet();
  const destinationIndex = indexByCompareKey(destinationPeople);
  const sourceIndex = indexByCompareKey(sourcePeople);

  for (const person of sourcePeople) {
    if (person.changesDisabled) continue;

    switch (personStatusInIndex(person, destinationIndex)) {
      case PersonStatus.NOT_IN_LIST:
        changeSet.toCreate.push(person);
        break;
      case PersonStatus.IN_LIST_BUT_DIFFERENT: {
        const match = destinationIndex.get(normalizeCompareKey(person.compareKey));
        changeSet.toUpdate.push(
          match?.externalID !== undefined
            ? withPerson(person, { externalID: match.externalID })
            : person,
        );
        break;
      }
      case PersonStatus.IN_LIST:
        break;
    }
  }

  for (const person of destinationPeople) {
    if (!sourceIndex.has(normalizeCompareKey(person.compareKey))) {
      changeSet.toDelete.push(person);
    }
  }

  return changeSet;
};
