/**
 * Shared types for Tabsets
 *
 * Organization:
 * - tabset.ts: Snapshot data model (TabsetData, TabsetTabData, TabsetPaneData)
 * - host.ts: Capabilities consumed from the terminal host, prompt UI and filesystem
 */

export type {
  ColorScheme,
  TabsetPaneData,
  TabsetTabData,
  TabsetData,
  SplitDirection,
  PathStyle,
} from "./tabset.js";

export type {
  WindowDimensions,
  SplitPaneOptions,
  SpawnTabOptions,
  HostPane,
  HostPaneInfo,
  HostTab,
  HostWindow,
  PromptChoice,
  SelectPromptRequest,
  TextPromptRequest,
  PromptRequest,
  PromptAnswer,
  Prompter,
  FileSystemCapability,
} from "./host.js";
