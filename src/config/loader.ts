import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { parseConfig, type SettingsInput } from "./config.js";
import { normalizePath } from "../utils/paths.js";
import {
  ConfigNotFoundError,
  ConfigParseError,
  ensureError,
  isNodeError,
} from "../utils/errors.js";
import { getLogger } from "../utils/log.js";

/**
 * Sample configuration template for new installations
 */
const SAMPLE_CONFIG = `{
  "exclude": "(^|/)(\\\\.git|node_modules)/",
  "newLineMarker": "auto",
  "addNewLineMarkerAtEndOfFile": true,
  "normalizeNewLineMarkers": true,
  "removeTrailingWhitespace": true,
  "removeTrailingEmptyLines": true,
  "normalizeEmptyFiles": "empty",
  "normalizeWhitespaceOnlyFiles": "empty",
  "normalizeNonStandardWhitespace": "replace-with-space",
  "replaceTabsWithSpaces": -1
}
`;

/**
 * Creates a new configuration file with sample content
 *
 * @param configPath - Path where the config file should be created
 * @param force - If true, overwrites existing file. If false, fails if file exists.
 * @throws {Error} If the file cannot be created or already exists (when not forcing)
 */
export async function createSampleConfig(
  configPath: string,
  force = false,
): Promise<void> {
  const normalizedPath = normalizePath(configPath);
  const configDir = dirname(normalizedPath);

  try {
    await mkdir(configDir, { recursive: true });

    // 'wx' fails atomically when the file already exists
    const writeFlags = force ? "w" : "wx";
    await writeFile(normalizedPath, SAMPLE_CONFIG, {
      encoding: "utf8",
      flag: writeFlags,
    });
  } catch (error) {
    const err = ensureError(error);
    if (isNodeError(err) && err.code === "EEXIST" && !force) {
      throw new Error(
        `Config file already exists at ${normalizedPath}. Use --force to overwrite`,
        { cause: err },
      );
    }
    throw new Error(
      `Failed to create config file at ${normalizedPath}: ${err.message}`,
      { cause: err },
    );
  }
}

/**
 * Loads and parses a configuration file.
 *
 * A missing file is only an error when its path was given explicitly; the
 * default location may simply not exist, in which case no settings are returned.
 *
 * @param configPath - Path to the JSON config file. `~` is supported.
 * @param explicit - Whether the user asked for this path
 * @throws {ConfigNotFoundError} When an explicit config file doesn't exist
 * @throws {ConfigParseError} When the config file cannot be parsed or is invalid
 */
export async function loadConfig(
  configPath: string,
  explicit: boolean,
): Promise<SettingsInput> {
  const normalizedPath = normalizePath(configPath);
  const logger = getLogger("config:loader");

  try {
    const configContent = await readFile(normalizedPath, "utf8");
    const settings = parseConfig(configContent);
    logger.debug({ path: normalizedPath }, "loaded config file");
    return settings;
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      if (explicit) throw new ConfigNotFoundError(normalizedPath);
      logger.debug({ path: normalizedPath }, "no config file");
      return {};
    }

    // Permissions, invalid JSON, schema violations
    throw new ConfigParseError(normalizedPath, ensureError(error));
  }
}
