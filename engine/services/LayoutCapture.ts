import type { HostWindow, TabsetData, TabsetPaneData, TabsetTabData } from "../../shared/types/index.js";
import { logDebug } from "../utils/logger.js";

/**
 * Reads the current layout of a window into a snapshot.
 * Read-only; host failures propagate to the caller.
 */
export class LayoutCapture {
  async capture(window: HostWindow): Promise<TabsetData> {
    const dims = await window.getDimensions();
    const colors = await window.getColors();

    const tabs: TabsetTabData[] = [];
    for (const tab of await window.tabs()) {
      const panes: TabsetPaneData[] = [];
      for (const info of await tab.panesWithInfo()) {
        panes.push({
          left: info.left,
          cwd: (await info.pane.getCurrentWorkingDir()) ?? "",
          exe: (await info.pane.getForegroundProcessName()) ?? "",
        });
      }
      tabs.push({ title: await tab.getTitle(), panes });
    }

    logDebug("Captured window layout", {
      windowId: window.id,
      tabs: tabs.length,
      panes: tabs.reduce((count, tab) => count + tab.panes.length, 0),
    });

    return {
      window_width: dims.pixelWidth,
      window_height: dims.pixelHeight,
      colors: colors ?? {},
      tabs,
    };
  }
}
