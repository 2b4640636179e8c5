/**
 * Builds the immutable configuration record from user options.
 * Created once at start-up and passed to every component constructor.
 */

import path from "path";
import type { FileSystemCapability } from "../shared/types/index.js";
import { TabsetOptionsSchema } from "./schemas/config.js";
import {
  DEFAULT_CONFIG,
  DEFAULT_TABSETS_DIRNAME,
  type TabsetsConfig,
  type TabsetsEnvironment,
} from "./types/config.js";
import { ConfigError, isNotFoundError, toError } from "./utils/errorTypes.js";
import { logInfo } from "./utils/logger.js";

/**
 * Validate user options and resolve defaults.
 * @throws ConfigError when an option is unknown or has the wrong type
 */
export function createTabsetsConfig(options: unknown, environment: TabsetsEnvironment): TabsetsConfig {
  const parsed = TabsetOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw new ConfigError("Invalid tabsets options", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    });
  }

  const platform = environment.platform ?? process.platform;
  const opts = parsed.data;

  return Object.freeze({
    tabsetsDir: opts.tabsets_dir ?? path.join(environment.configDir, DEFAULT_TABSETS_DIRNAME),
    restoreColors: opts.restore_colors ?? DEFAULT_CONFIG.restoreColors,
    restoreDimensions: opts.restore_dimensions ?? DEFAULT_CONFIG.restoreDimensions,
    fuzzySelector: opts.fuzzy_selector ?? DEFAULT_CONFIG.fuzzySelector,
    pathStyle: opts.path_style ?? (platform === "win32" ? "windows" : "posix"),
  });
}

/**
 * Read options from a JSON file. A missing file yields the defaults.
 * @throws ConfigError when the file cannot be read, is not JSON, or holds invalid options
 */
export async function loadTabsetsConfigFile(
  filePath: string,
  environment: TabsetsEnvironment,
  fileSystem: FileSystemCapability
): Promise<TabsetsConfig> {
  let content: string;
  try {
    content = await fileSystem.readFile(filePath);
  } catch (error) {
    if (isNotFoundError(error)) {
      logInfo(`No options file at '${filePath}', using defaults`);
      return createTabsetsConfig({}, environment);
    }
    throw new ConfigError("Unable to read tabsets options file", { filePath }, toError(error));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError("Tabsets options file is not valid JSON", { filePath }, toError(error));
  }

  return createTabsetsConfig(raw, environment);
}
