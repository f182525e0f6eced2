import dotenv from "dotenv";
import type { Id3Version } from "../downloader/tagWriters/tagWriter";
import { ConfigurationError } from "../errors";
import { Logger } from "../utils/logger";

const logger = Logger.create("Config");

export interface Configuration {
  clientId?: string;
  clientSecret?: string;
  /** Pre-issued bearer token; takes precedence over client credentials. */
  accessToken?: string;
  /** ISO 3166-1 alpha-2 country code applied to every catalog lookup that accepts one. */
  market?: string;
  tagSeparator: string;
  id3Version: Id3Version;
  filenameTemplate: string;
  followPlaylistPages: boolean;
}

export const configKeys = [
  "SPOTIFY_CLIENT_ID",
  "SPOTIFY_CLIENT_SECRET",
  "SPOTIFY_ACCESS_TOKEN",
  "SPOTIFY_MARKET",
  "TAG_SEPARATOR",
  "ID3_VERSION",
  "FILENAME_TEMPLATE",
  "FOLLOW_PLAYLIST_PAGES",
] as const;

export type ConfigKey = (typeof configKeys)[number];

export const DEFAULT_FILENAME_TEMPLATE = "{artist} - {title}";

const defaults: Pick<Configuration, "tagSeparator" | "id3Version" | "filenameTemplate" | "followPlaylistPages"> = {
  tagSeparator: "",
  id3Version: 3,
  filenameTemplate: DEFAULT_FILENAME_TEMPLATE,
  followPlaylistPages: false,
};

type ConfigSource = Partial<Record<string, string | undefined>>;

function getConfigValue(source: ConfigSource, key: ConfigKey): string | undefined {
  const value = source[key];
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim();
}

function parseMarket(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;

  const market = value.toUpperCase();
  if (!/^[A-Z]{2}$/.test(market)) {
    throw new ConfigurationError(`SPOTIFY_MARKET must be a two-letter country code, got '${value}'`);
  }
  return market;
}

function parseId3Version(value: string | undefined): Id3Version {
  if (value === undefined) return defaults.id3Version;

  switch (value) {
    case "3":
    case "2.3":
      return 3;
    case "4":
    case "2.4":
      return 4;
    default:
      throw new ConfigurationError(`ID3_VERSION must be 3 or 4, got '${value}'`);
  }
}

function parseBoolean(key: ConfigKey, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;

  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigurationError(`${key} must be a boolean, got '${value}'`);
  }
}

/**
 * Builds the configuration from environment-style key/value pairs.
 * The separator is read untrimmed so values such as "; " keep their spacing.
 */
export function loadConfiguration(source: ConfigSource = process.env): Configuration {
  const clientId = getConfigValue(source, "SPOTIFY_CLIENT_ID");
  const clientSecret = getConfigValue(source, "SPOTIFY_CLIENT_SECRET");

  if ((clientId === undefined) !== (clientSecret === undefined)) {
    throw new ConfigurationError("SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET must be set together");
  }

  const config: Configuration = {
    clientId,
    clientSecret,
    accessToken: getConfigValue(source, "SPOTIFY_ACCESS_TOKEN"),
    market: parseMarket(getConfigValue(source, "SPOTIFY_MARKET")),
    tagSeparator: source.TAG_SEPARATOR ?? defaults.tagSeparator,
    id3Version: parseId3Version(getConfigValue(source, "ID3_VERSION")),
    filenameTemplate: getConfigValue(source, "FILENAME_TEMPLATE") ?? defaults.filenameTemplate,
    followPlaylistPages: parseBoolean(
      "FOLLOW_PLAYLIST_PAGES",
      getConfigValue(source, "FOLLOW_PLAYLIST_PAGES"),
      defaults.followPlaylistPages
    ),
  };

  logger.logDebug("Loaded configuration", {
    market: config.market,
    id3Version: config.id3Version,
    hasClientCredentials: clientId !== undefined,
    hasAccessToken: config.accessToken !== undefined,
  });

  return config;
}

/** Loads a `.env` file into `process.env` (existing variables win), then reads the configuration. */
export function loadEnvironment(path?: string): Configuration {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error) {
    // A missing .env file is normal; the process environment alone is enough.
    logger.logDebug(`No environment file loaded: ${result.error.message}`);
  }
  return loadConfiguration(process.env);
}
