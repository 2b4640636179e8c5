/**
 * Layout Reconstructor
 *
 * Replays a saved tabset into a live window: spawns one tab per record, splits
 * panes in recorded order and types non-shell foreground commands back in.
 *
 * Only the split sequence is reproduced, not exact pane rectangles: each pane is
 * split off the tab's active pane, below it when it shares the previous pane's
 * left column and beside it otherwise. Command replay types the command name;
 * it does not bring back the program's state, history or environment.
 *
 * Failures after validation are best effort and land in the report: a tab that
 * cannot be spawned stops the remaining tabs, while colors or size the host
 * refuses, a tab title or focus change, or a pane that cannot be split are
 * skipped. None of them turns the whole reconstruction into a failure.
 */

import type {
  HostPane,
  HostTab,
  HostWindow,
  SplitDirection,
  TabsetData,
  TabsetTabData,
} from "../../shared/types/index.js";
import type { TabsetsConfig } from "../types/config.js";
import { InvalidSnapshotError } from "../utils/errorTypes.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { extractPathFromUri, isShell } from "../utils/paths.js";
import type { ExecutableResolver } from "./ExecutableResolver.js";

export interface ReconstructFailure {
  kind: "chrome" | "tab" | "pane" | "command";
  /** -1 for window-level failures */
  tabIndex: number;
  paneIndex?: number;
  message: string;
}

export interface ReconstructReport {
  /** The window held a single idle shell pane that was closed before replay */
  wasEmpty: boolean;
  tabsCreated: number;
  panesCreated: number;
  commandsReplayed: number;
  failures: ReconstructFailure[];
}

/** Text sent to an idle shell to close the lone pane of an empty window */
const SHELL_EXIT_COMMAND = "exit\r";

/**
 * Direction for a pane given the left column of the pane recorded before it
 */
export function splitDirectionFor(previousLeft: number, left: number): SplitDirection {
  return left === previousLeft ? "down" : "right";
}

/**
 * Split directions for a tab's panes in recorded order.
 * The first pane is the tab's initial pane and has no direction.
 */
export function inferSplitDirections(lefts: readonly number[]): Array<SplitDirection | null> {
  return lefts.map((left, index) => (index === 0 ? null : splitDirectionFor(lefts[index - 1], left)));
}

type ReconstructorConfig = Pick<TabsetsConfig, "restoreColors" | "restoreDimensions" | "pathStyle">;

export class LayoutReconstructor {
  constructor(
    private readonly config: ReconstructorConfig,
    private readonly resolver: ExecutableResolver
  ) {}

  /**
   * Rebuild a snapshot's tabs and panes inside a window
   * @throws InvalidSnapshotError when the snapshot has no tabs or a tab has no panes; nothing is mutated
   */
  async reconstruct(window: HostWindow, snapshot: TabsetData): Promise<ReconstructReport> {
    this.validate(snapshot);

    const report: ReconstructReport = {
      wasEmpty: await this.closeLoneShellPane(window),
      tabsCreated: 0,
      panesCreated: 0,
      commandsReplayed: 0,
      failures: [],
    };

    if (report.wasEmpty) {
      await this.restoreWindowChrome(window, snapshot, report);
    }

    for (const [tabIndex, tabData] of snapshot.tabs.entries()) {
      const tab = await this.spawnTab(window, tabData, tabIndex, report);
      if (!tab) {
        break;
      }
      report.tabsCreated++;
      await this.replayPanes(tab, tabData, tabIndex, report);
    }

    if (report.failures.length > 0) {
      logWarn("Tabset recreated with failures", {
        failures: report.failures.length,
        tabsCreated: report.tabsCreated,
        panesCreated: report.panesCreated,
      });
    } else {
      logInfo("Tabset recreated.", { tabsCreated: report.tabsCreated, panesCreated: report.panesCreated });
    }
    return report;
  }

  private validate(snapshot: TabsetData): void {
    if (snapshot.tabs.length === 0) {
      throw new InvalidSnapshotError("Invalid or empty tabset data.", { tabs: 0 });
    }
    const emptyTab = snapshot.tabs.findIndex((tab) => tab.panes.length === 0);
    if (emptyTab !== -1) {
      throw new InvalidSnapshotError("Tabset contains a tab without panes.", { tabIndex: emptyTab });
    }
  }

  /**
   * Close the window's only pane when it sits at a shell prompt.
   * @returns true when the window counts as empty and the tabset replaces it
   */
  private async closeLoneShellPane(window: HostWindow): Promise<boolean> {
    const tabs = await window.tabs();
    if (tabs.length !== 1) {
      return false;
    }
    if ((await tabs[0].panesWithInfo()).length !== 1) {
      return false;
    }

    const initialPane = await window.activePane();
    if (!initialPane) {
      logInfo("Initial tab left open because the window has no active pane.");
      return false;
    }
    const foreground = await initialPane.getForegroundProcessName();
    if (!foreground) {
      logInfo("Initial tab left open because its foreground process is unknown.");
      return false;
    }
    if (!isShell(foreground)) {
      logInfo("Initial tab left open because a running program was detected.", { foreground });
      return false;
    }

    await initialPane.sendText(SHELL_EXIT_COMMAND);
    logInfo("Existing single empty tab closed.");
    return true;
  }

  private async restoreWindowChrome(
    window: HostWindow,
    snapshot: TabsetData,
    report: ReconstructReport
  ): Promise<void> {
    if (this.config.restoreColors) {
      try {
        await window.setColorOverrides(snapshot.colors);
      } catch (error) {
        logError("Failed to restore window colors.", error);
        report.failures.push({ kind: "chrome", tabIndex: -1, message: "Failed to restore window colors." });
      }
    }
    if (this.config.restoreDimensions) {
      try {
        await window.setInnerSize(snapshot.window_width, snapshot.window_height);
      } catch (error) {
        logError("Failed to restore window size.", error);
        report.failures.push({ kind: "chrome", tabIndex: -1, message: "Failed to restore window size." });
      }
    }
  }

  private toLocalPath(cwd: string): string | undefined {
    const localPath = extractPathFromUri(cwd, this.config.pathStyle);
    return localPath.length > 0 ? localPath : undefined;
  }

  private async spawnTab(
    window: HostWindow,
    tabData: TabsetTabData,
    tabIndex: number,
    report: ReconstructReport
  ): Promise<HostTab | null> {
    let tab: HostTab | null = null;
    let spawnError: unknown;
    try {
      tab = await window.spawnTab({ cwd: this.toLocalPath(tabData.panes[0].cwd) });
    } catch (error) {
      spawnError = error;
    }
    if (!tab) {
      logError("Failed to create a new tab.", spawnError, { tabIndex });
      report.failures.push({ kind: "tab", tabIndex, message: "Failed to create a new tab." });
      return null;
    }

    // The tab exists from here on; title and focus problems do not stop replay
    try {
      await tab.setTitle(tabData.title);
    } catch (error) {
      logError("Failed to set tab title.", error, { tabIndex });
      report.failures.push({ kind: "tab", tabIndex, message: `Failed to set tab title '${tabData.title}'.` });
    }
    try {
      // Panes are created inside the active tab
      await tab.activate();
    } catch (error) {
      logError("Failed to activate tab.", error, { tabIndex });
      report.failures.push({ kind: "tab", tabIndex, message: "Failed to activate tab." });
    }
    return tab;
  }

  private async replayPanes(
    tab: HostTab,
    tabData: TabsetTabData,
    tabIndex: number,
    report: ReconstructReport
  ): Promise<void> {
    const directions = inferSplitDirections(tabData.panes.map((pane) => pane.left));
    let firstPane: HostPane | null = null;

    for (const [paneIndex, paneData] of tabData.panes.entries()) {
      const direction = directions[paneIndex];
      let pane: HostPane | null = null;

      try {
        if (direction === null) {
          pane = await tab.activePane();
          firstPane = pane;
        } else {
          const target = await tab.activePane();
          pane = target ? await target.split({ direction, cwd: this.toLocalPath(paneData.cwd) }) : null;
        }
      } catch (error) {
        logError("Failed to create a new pane.", error, { tabIndex, paneIndex });
      }

      if (!pane) {
        if (direction === null) {
          logError("New tab has no active pane.", undefined, { tabIndex });
        }
        report.failures.push({ kind: "pane", tabIndex, paneIndex, message: "Failed to create a new pane." });
        continue;
      }
      report.panesCreated++;

      await this.replayCommand(pane, paneData.exe, tabIndex, paneIndex, report);
    }

    if (firstPane) {
      try {
        await firstPane.activate();
      } catch (error) {
        logWarn("Failed to focus the first pane.", { tabIndex, error: String(error) });
      }
    }
  }

  /**
   * Type a non-shell foreground command back into its pane
   */
  private async replayCommand(
    pane: HostPane,
    exe: string,
    tabIndex: number,
    paneIndex: number,
    report: ReconstructReport
  ): Promise<void> {
    if (isShell(exe)) {
      return;
    }

    const command = await this.resolver.resolve(exe);
    if (!command) {
      return;
    }

    try {
      await pane.sendText(`${command}\n`);
      report.commandsReplayed++;
    } catch (error) {
      logError(`Failed to send command '${command}' to pane.`, error, { tabIndex, paneIndex });
      report.failures.push({ kind: "command", tabIndex, paneIndex, message: `Failed to run '${command}'.` });
    }
  }
}
