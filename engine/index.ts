/**
 * Tabsets: save the tabs and panes of a terminal window under a name and
 * rebuild them later.
 */

import type { FileSystemCapability, Prompter } from "../shared/types/index.js";
import { createTabsetCommands, type TabsetCommand } from "./commands.js";
import { createTabsetsConfig } from "./config.js";
import { DesktopNotifier, type Notifier } from "./services/DesktopNotifier.js";
import { ExecutableResolver } from "./services/ExecutableResolver.js";
import { LayoutCapture } from "./services/LayoutCapture.js";
import { LayoutReconstructor } from "./services/LayoutReconstructor.js";
import { TabsetService } from "./services/TabsetService.js";
import { TabsetStore } from "./services/TabsetStore.js";
import type { TabsetsConfig, TabsetsEnvironment } from "./types/config.js";
import { NodeFileSystem } from "./utils/fileSystem.js";

export type * from "../shared/types/index.js";
export type { TabsetsConfig, TabsetsEnvironment } from "./types/config.js";
export type { TabsetOptions } from "./schemas/config.js";
export { createTabsetsConfig, loadTabsetsConfigFile } from "./config.js";
export { TabsetDataSchema } from "./schemas/tabset.js";
export { createTabsetCommands, findTabsetCommand } from "./commands.js";
export type { TabsetCommand, TabsetCommandId, TabsetCommandTarget } from "./commands.js";
export { TabsetService } from "./services/TabsetService.js";
export type { TabsetOutcome, TabsetOutcomeCode, TabsetServiceDeps } from "./services/TabsetService.js";
export { TabsetStore } from "./services/TabsetStore.js";
export { LayoutCapture } from "./services/LayoutCapture.js";
export { LayoutReconstructor, inferSplitDirections, splitDirectionFor } from "./services/LayoutReconstructor.js";
export type { ReconstructReport, ReconstructFailure } from "./services/LayoutReconstructor.js";
export { ExecutableResolver } from "./services/ExecutableResolver.js";
export { DesktopNotifier } from "./services/DesktopNotifier.js";
export type { Notifier, NotifyOptions } from "./services/DesktopNotifier.js";
export { LogBuffer, logBuffer } from "./services/LogBuffer.js";
export type { LogEntry, LogFilterOptions } from "./services/LogBuffer.js";
export { NodeFileSystem } from "./utils/fileSystem.js";
export { isValidTabsetName } from "./utils/tabsetName.js";
export { basename, extractPathFromUri, isShell, KNOWN_SHELLS } from "./utils/paths.js";
export * from "./utils/errorTypes.js";

export interface CreateTabsetsOptions {
  /** Raw user options (tabsets_dir, restore_colors, ...) or an already resolved config */
  options?: unknown;
  config?: TabsetsConfig;
  environment: TabsetsEnvironment;
  prompter: Prompter;
  fileSystem?: FileSystemCapability;
  notifier?: Notifier;
}

export interface Tabsets {
  config: TabsetsConfig;
  service: TabsetService;
  commands: TabsetCommand[];
}

/**
 * Wire up the engine and create the tabsets directory.
 * @throws ConfigError when the options are invalid
 */
export async function createTabsets(setup: CreateTabsetsOptions): Promise<Tabsets> {
  const config = setup.config ?? createTabsetsConfig(setup.options, setup.environment);
  const fileSystem = setup.fileSystem ?? new NodeFileSystem(setup.environment.platform);

  const service = new TabsetService({
    config,
    store: new TabsetStore(config.tabsetsDir, fileSystem),
    capture: new LayoutCapture(),
    reconstructor: new LayoutReconstructor(config, new ExecutableResolver(fileSystem)),
    notifier: setup.notifier ?? new DesktopNotifier(fileSystem),
    prompter: setup.prompter,
  });
  await service.initialize();

  return { config, service, commands: createTabsetCommands(service) };
}
