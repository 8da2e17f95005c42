import { resolve } from "node:path";
import envPaths from "env-paths";
import { normalizePath } from "../utils/paths.js";

const paths = envPaths("whitespace-format", { suffix: "" });

/**
 * Default configuration file path
 * Can be overridden via WHITESPACE_FORMAT_CONFIG environment variable
 */
export const DEFAULT_CONFIG_PATH = process.env.WHITESPACE_FORMAT_CONFIG
  ? normalizePath(process.env.WHITESPACE_FORMAT_CONFIG)
  : resolve(paths.config, "config.json");
