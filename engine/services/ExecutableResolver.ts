/**
 * Executable Resolver
 *
 * Maps a recorded foreground command back to something that can be typed into
 * a pane. A command present when the tabset was saved may be missing or moved
 * by the time it is loaded; that is reported as null and the caller skips it.
 */

import type { FileSystemCapability } from "../../shared/types/index.js";
import { logError } from "../utils/logger.js";

export class ExecutableResolver {
  constructor(private readonly fileSystem: FileSystemCapability) {}

  /**
   * Resolve an executable name or path.
   * Checks the path itself first, then falls back to a command search path lookup.
   * @returns Runnable path, or null when the command cannot be found
   */
  async resolve(command: string): Promise<string | null> {
    if (!command.trim()) {
      return null;
    }

    try {
      if (await this.fileSystem.isExecutable(command)) {
        return command;
      }

      const found = await this.fileSystem.which(command);
      if (found) {
        return found;
      }
    } catch (error) {
      logError(`Failed to resolve executable '${command}'.`, error);
      return null;
    }

    logError(`Failed to resolve executable '${command}'.`);
    return null;
  }
}
