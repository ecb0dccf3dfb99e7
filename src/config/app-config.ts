import fs from "fs";
import { z } from "zod";
import {
  AppConfig,
  DestinationType,
  SourceType,
  Verbosity,
} from "../models/sync-config.model";
import { config as envConfig } from "./config";
import logger, { Logger } from "../utils/logger";

export const DEFAULT_CONFIG_FILE = "./config.json";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export const formatZodIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

/**
 * Validates one adapter's `extra` block against its schema.
 */
export const parseAdapterConfig = <T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  adapterName: string,
): z.infer<T> => {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${adapterName} config: ${formatZodIssues(result.error)}`,
    );
  }
  return result.data;
};

const jsonObject = z.record(z.unknown());

const attributeMappingSchema = z.object({
  sourceKey: z.string().min(1),
  destinationKey: z.string().min(1),
  required: z.boolean().default(false),
  caseSensitive: z.boolean().default(false),
});

const appConfigSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z.object({
  runtime: z
    .object({
      dryRunMode: z.boolean().default(false),
      verbosity: z.number().int().min(0).default(Verbosity.LOW),
    })
    .default({}),
  source: z.object({
    type: z.nativeEnum(SourceType),
    extra: jsonObject.default({}),
  }),
  destination: z.object({
    type: z.nativeEnum(DestinationType),
    extra: jsonObject.default({}),
    disableAdd: z.boolean().default(false),
    disableUpdate: z.boolean().default(false),
    disableDelete: z.boolean().default(false),
  }),
  attributeMap: z.array(attributeMappingSchema).min(1),
  syncSets: z
    .array(
      z.object({
        name: z.string().min(1),
        source: jsonObject.default({}),
        destination: jsonObject.default({}),
      }),
    )
    .min(1)
    .default([{ name: "default" }]),
});

/**
 * Explicit argument, then CONFIG_PATH, then ./config.json
 */
export const resolveConfigPath = (configFile?: string): string =>
  configFile || envConfig.CONFIG_PATH || DEFAULT_CONFIG_FILE;

export const parseAppConfig = (raw: unknown): AppConfig => {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid sync configuration: ${formatZodIssues(result.error)}`,
    );
  }
  return result.data;
};

export const loadAppConfig = (
  configFile?: string,
  log: Logger = logger,
): AppConfig => {
  const filePath = resolveConfigPath(configFile);
  log.info(`Using config file: ${filePath}`);

  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config file ${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to parse config file ${filePath}: ${reason}`);
  }

  const appConfig = parseAppConfig(raw);

  log.info("Configuration loaded", {
    sourceType: appConfig.source.type,
    destinationType: appConfig.destination.type,
    syncSets: appConfig.syncSets.map((set) => set.name),
  });

  return appConfig;
};
