/**
 * Desktop Notifier
 *
 * Logs a message and shows it to the user. `notify-send` is preferred when it is
 * installed because host toasts do not time out on every platform; the host
 * toast is the fallback.
 */

import { execa } from "execa";
import type { FileSystemCapability, HostWindow } from "../../shared/types/index.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";

export const NOTIFICATION_APP_NAME = "tabsets";
export const NOTIFICATION_TIMEOUT_MS = 4000;

export interface NotifyOptions {
  /** Log as an error and prefix the shown message with "FAILED:" */
  error?: boolean;
}

export interface Notifier {
  notify(window: HostWindow, message: string, options?: NotifyOptions): Promise<void>;
}

export class DesktopNotifier implements Notifier {
  constructor(private readonly fileSystem: FileSystemCapability) {}

  async notify(window: HostWindow, message: string, options: NotifyOptions = {}): Promise<void> {
    let shown = message;
    if (options.error) {
      logError(message);
      shown = `FAILED: ${message}`;
    } else {
      logInfo(message);
    }

    const notifySend = await this.findNotifySend();
    if (notifySend) {
      const result = await execa(
        notifySend,
        ["-a", NOTIFICATION_APP_NAME, "-t", String(NOTIFICATION_TIMEOUT_MS), "-u", "normal", shown],
        { reject: false, stdin: "ignore" }
      );
      if (!result.failed) {
        return;
      }
      logWarn("notify-send failed, falling back to host toast", { exitCode: result.exitCode });
    }

    await window.toast(NOTIFICATION_APP_NAME, shown, NOTIFICATION_TIMEOUT_MS);
  }

  private async findNotifySend(): Promise<string | null> {
    try {
      return await this.fileSystem.which("notify-send");
    } catch (error) {
      logWarn("Could not look up notify-send", { error: String(error) });
      return null;
    }
  }
}
