import { Person } from "./person.model";

export interface ChangeSet {
  toCreate: Person[];
  toUpdate: Person[];
  toDelete: Person[];
}

export interface ChangeResults {
  created: number;
  updated: number;
  deleted: number;
  errors: string[];
}

export type ChangeKind = "create" | "update" | "delete";

export const emptyChangeSet = (): ChangeSet => ({
  toCreate: [],
  toUpdate: [],
  toDelete: [],
});

export const emptyChangeResults = (): ChangeResults => ({
  created: 0,
  updated: 0,
  deleted: 0,
  errors: [],
});

export const failedChangeResults = (error: unknown): ChangeResults => ({
  ...emptyChangeResults(),
  errors: [error instanceof Error ? error.message : String(error)],
});

/**
 * Shared tally for one apply phase. Every apply unit records into the same
 * counter; increments run on the event loop so none are lost.
 */
export class ChangeCounter {
  private created = 0;
  private updated = 0;
  private deleted = 0;

  increment(kind: ChangeKind): void {
    switch (kind) {
      case "create":
        this.created++;
        break;
      case "update":
        this.updated++;
        break;
      case "delete":
        this.deleted++;
        break;
    }
  }

  toResults(): ChangeResults {
    return {
      created: this.created,
      updated: this.updated,
      deleted: this.deleted,
      errors: [],
    };
  }
}
