/**
 * Bindable tabsets commands.
 *
 * Hosts register these with their key binding or command palette system; each
 * command takes the window it was invoked from.
 */

import type { HostWindow } from "../shared/types/index.js";
import type { TabsetOutcome, TabsetService } from "./services/TabsetService.js";

export type TabsetCommandId = "tabsets.save" | "tabsets.load" | "tabsets.delete" | "tabsets.rename";

export interface TabsetCommand {
  /** Unique identifier: 'tabsets.save' */
  id: TabsetCommandId;
  /** Display name for command palettes: 'Save Tabset' */
  label: string;
  /** Keywords for palette search */
  keywords: string[];
  execute: (window: HostWindow) => Promise<TabsetOutcome>;
}

/** Service operations the commands dispatch to */
export type TabsetCommandTarget = Pick<TabsetService, "save" | "load" | "delete" | "rename">;

export function createTabsetCommands(service: TabsetCommandTarget): TabsetCommand[] {
  return [
    {
      id: "tabsets.save",
      label: "Save Tabset",
      keywords: ["tabset", "save", "layout", "session"],
      execute: (window) => service.save(window),
    },
    {
      id: "tabsets.load",
      label: "Load Tabset",
      keywords: ["tabset", "load", "restore", "open"],
      execute: (window) => service.load(window),
    },
    {
      id: "tabsets.delete",
      label: "Delete Tabset",
      keywords: ["tabset", "delete", "remove"],
      execute: (window) => service.delete(window),
    },
    {
      id: "tabsets.rename",
      label: "Rename Tabset",
      keywords: ["tabset", "rename", "move"],
      execute: (window) => service.rename(window),
    },
  ];
}

export function findTabsetCommand(commands: readonly TabsetCommand[], id: string): TabsetCommand | undefined {
  return commands.find((command) => command.id === id);
}
