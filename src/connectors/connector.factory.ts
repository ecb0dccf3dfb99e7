import { Destination, Source } from "./base-connector";
import { GoogleContactsDestination } from "./googleContacts.connector";
import { GoogleUsersDestination } from "./googleUsers.connector";
import { RestApiSource } from "./restApi.connector";
import { WebHelpDeskDestination } from "./webHelpDesk.connector";
import { ConfigError } from "../config/app-config";
import {
  DestinationConfig,
  DestinationType,
  SourceConfig,
  SourceType,
} from "../models/sync-config.model";
import { Logger } from "../utils/logger";

export const newSource = (config: SourceConfig, logger?: Logger): Source => {
  switch (config.type) {
    case SourceType.REST_API:
      return new RestApiSource(config.extra, logger);
    default:
      throw new ConfigError(`Unrecognized source type: ${String(config.type)}`);
  }
};

export const newDestination = (
  config: DestinationConfig,
  logger?: Logger,
): Destination => {
  switch (config.type) {
    case DestinationType.GOOGLE_CONTACTS:
      return new GoogleContactsDestination(config.extra, logger);
    case DestinationType.GOOGLE_USERS:
      return new GoogleUsersDestination(config.extra, logger);
    case DestinationType.WEB_HELP_DESK:
      return new WebHelpDeskDestination(config.extra, logger);
    default:
      throw new ConfigError(`Unrecognized destination type: ${String(config.type)}`);
  }
};
