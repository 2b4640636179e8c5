/**
 * Filesystem capability backed by Node's fs/promises.
 * Command lookup shells out to `which` (`where` on Windows) through execa.
 */

import fs from "fs/promises";
import { constants } from "fs";
import { execa } from "execa";
import type { FileSystemCapability } from "../../shared/types/index.js";
import { logDebug } from "./logger.js";

export class NodeFileSystem implements FileSystemCapability {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async isPath(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async isFile(path: string): Promise<boolean> {
    try {
      return (await fs.stat(path)).isFile();
    } catch {
      return false;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await fs.stat(path)).isDirectory();
    } catch {
      return false;
    }
  }

  async isExecutable(path: string): Promise<boolean> {
    try {
      await fs.access(path, constants.X_OK);
      return await this.isFile(path);
    } catch {
      return false;
    }
  }

  /**
   * Resolve a command on the search path.
   * Uses execa with an argument vector so the command is never shell-interpreted.
   */
  async which(command: string): Promise<string | null> {
    if (!command.trim()) return null;

    const lookup = this.platform === "win32" ? "where" : "which";
    const result = await execa(lookup, [command], { reject: false, stdin: "ignore" });
    if (result.failed || result.exitCode !== 0) {
      logDebug(`${lookup} found no match for '${command}'`, { exitCode: result.exitCode });
      return null;
    }

    const firstLine = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    return firstLine ?? null;
  }

  readFile(path: string): Promise<string> {
    return fs.readFile(path, "utf-8");
  }

  writeFile(path: string, content: string): Promise<void> {
    return fs.writeFile(path, content, "utf-8");
  }

  readDir(path: string): Promise<string[]> {
    return fs.readdir(path);
  }

  async mkdir(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  remove(path: string): Promise<void> {
    return fs.unlink(path);
  }

  removeDir(path: string): Promise<void> {
    return fs.rmdir(path);
  }

  move(from: string, to: string): Promise<void> {
    return fs.rename(from, to);
  }
}
