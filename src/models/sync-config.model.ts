/**
 * Declarative sync configuration, as loaded from the JSON config file.
 */

export const SourceType = {
  REST_API: "RestAPI",
} as const;

export type SourceType = (typeof SourceType)[keyof typeof SourceType];

export const DestinationType = {
  GOOGLE_CONTACTS: "GoogleContacts",
  GOOGLE_USERS: "GoogleUsers",
  WEB_HELP_DESK: "WebHelpDesk",
} as const;

export type DestinationType =
  (typeof DestinationType)[keyof typeof DestinationType];

export const Verbosity = {
  LOW: 0,
  MEDIUM: 5,
  HIGH: 10,
} as const;

export interface AttributeMapping {
  readonly sourceKey: string;
  readonly destinationKey: string;
  readonly required: boolean;
  /** Carried through for adapters; matching is always case-insensitive */
  readonly caseSensitive: boolean;
}

export interface RuntimeConfig {
  dryRunMode: boolean;
  verbosity: number;
}

export interface SourceConfig {
  type: SourceType;
  extra: Record<string, unknown>;
}

export interface DestinationConfig {
  type: DestinationType;
  extra: Record<string, unknown>;
  disableAdd: boolean;
  disableUpdate: boolean;
  disableDelete: boolean;
}

export interface SyncSet {
  name: string;
  source: Record<string, unknown>;
  destination: Record<string, unknown>;
}

export interface AppConfig {
  runtime: RuntimeConfig;
  source: SourceConfig;
  destination: DestinationConfig;
  attributeMap: AttributeMapping[];
  syncSets: SyncSet[];
}
