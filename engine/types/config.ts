/**
 * Configuration type definitions for Tabsets
 */

import type { PathStyle } from "../../shared/types/index.js";

/** Resolved, read-only configuration shared by every component. */
export interface TabsetsConfig {
  /** Directory holding one `<name>.tabset.json` file per record */
  readonly tabsetsDir: string;
  /** Apply recorded colors when loading into an empty window (default: false) */
  readonly restoreColors: boolean;
  /** Apply recorded pixel size when loading into an empty window (default: false) */
  readonly restoreDimensions: boolean;
  /** Forwarded to the selection prompt; the engine itself ignores it (default: false) */
  readonly fuzzySelector: boolean;
  /** Path flavour for recorded `file://` URIs (default: from the platform) */
  readonly pathStyle: PathStyle;
}

/** Facts about the host the configuration is resolved against. */
export interface TabsetsEnvironment {
  /** The host application's configuration directory */
  configDir: string;
  /** Defaults to process.platform */
  platform?: NodeJS.Platform;
}

/** Name of the directory created under the host config directory by default */
export const DEFAULT_TABSETS_DIRNAME = "tabsets";

export const DEFAULT_CONFIG = {
  restoreColors: false,
  restoreDimensions: false,
  fuzzySelector: false,
} as const;
