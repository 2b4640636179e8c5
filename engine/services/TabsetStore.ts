import path from "path";
import type { FileSystemCapability, TabsetData } from "../../shared/types/index.js";
import { TabsetDataSchema } from "../schemas/tabset.js";
import {
  AlreadyExistsError,
  DirectoryUnavailableError,
  FileSystemError,
  NotFoundError,
  TabsetParseError,
  ValidationError,
  isNotFoundError,
  toError,
} from "../utils/errorTypes.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { TABSET_FILE_SUFFIX, isValidTabsetName, tabsetNameFromFileName } from "../utils/tabsetName.js";

/**
 * TabsetStore maps tabset names to files in the tabsets directory and
 * reads/writes the snapshot JSON. The directory is the only source of truth;
 * nothing is cached between calls.
 */
export class TabsetStore {
  constructor(
    private readonly directory: string,
    private readonly fileSystem: FileSystemCapability
  ) {}

  getDirectory(): string {
    return this.directory;
  }

  /**
   * Creates the tabsets directory if needed
   */
  async initialize(): Promise<void> {
    if (await this.fileSystem.isDirectory(this.directory)) {
      return;
    }
    try {
      await this.fileSystem.mkdir(this.directory);
      logInfo(`Created tabsets directory '${this.directory}'.`);
    } catch (error) {
      throw new FileSystemError("Failed to create tabsets directory", { directory: this.directory }, toError(error));
    }
  }

  /**
   * Full path of the file backing a tabset name
   * @throws ValidationError for names outside the allowed character set
   */
  pathFor(name: string): string {
    if (!isValidTabsetName(name)) {
      throw new ValidationError(`Invalid tabset name '${name}'.`, { name });
    }
    return path.join(this.directory, `${name}${TABSET_FILE_SUFFIX}`);
  }

  async exists(name: string): Promise<boolean> {
    return this.fileSystem.isPath(this.pathFor(name));
  }

  /**
   * Writes a snapshot, replacing any record with the same name (atomic write with temp file)
   */
  async save(snapshot: TabsetData, name: string): Promise<void> {
    const filePath = this.pathFor(name);
    const parsed = TabsetDataSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new TabsetParseError("Refusing to save a malformed tabset", {
        name,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const tempFilePath = `${filePath}.tmp`;
    try {
      await this.fileSystem.writeFile(tempFilePath, JSON.stringify(parsed.data, null, 2));
      await this.fileSystem.move(tempFilePath, filePath);
    } catch (error) {
      logError(`Failed to write tabset '${name}'`, error, { filePath });
      try {
        if (await this.fileSystem.isPath(tempFilePath)) {
          await this.fileSystem.remove(tempFilePath);
        }
      } catch (cleanupError) {
        logWarn(`Could not remove temporary file '${tempFilePath}'`, { error: String(cleanupError) });
      }
      throw new FileSystemError(`Unable to save '${filePath}'.`, { name, filePath }, toError(error));
    }
  }

  /**
   * Reads and validates a snapshot
   * @throws NotFoundError when no record exists, TabsetParseError when the file is corrupt
   */
  async load(name: string): Promise<TabsetData> {
    const filePath = this.pathFor(name);

    let content: string;
    try {
      content = await this.fileSystem.readFile(filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new NotFoundError(`Tabset file not found '${filePath}'.`, { name, filePath }, toError(error));
      }
      throw new FileSystemError(`Failed to open file '${filePath}'.`, { name, filePath }, toError(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new TabsetParseError(
        `Failed to parse JSON data from tabset file '${filePath}'.`,
        { name, filePath },
        toError(error)
      );
    }

    const parsed = TabsetDataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TabsetParseError(`Tabset file '${filePath}' does not match the tabset format.`, {
        name,
        filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  /**
   * Names of all stored tabsets with valid names, sorted lexicographically
   * @throws DirectoryUnavailableError when the directory cannot be read
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await this.fileSystem.readDir(this.directory);
    } catch (error) {
      throw new DirectoryUnavailableError(this.directory, toError(error));
    }

    const names: string[] = [];
    for (const entry of entries) {
      const name = tabsetNameFromFileName(path.basename(entry));
      if (name === null) {
        continue;
      }
      // A file dropped in by hand may carry a name no operation accepts
      if (!isValidTabsetName(name)) {
        logWarn(`Skipping tabset file with invalid name '${entry}'.`, { directory: this.directory });
        continue;
      }
      names.push(name);
    }
    return names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * Removes a stored tabset
   * @throws NotFoundError when there is no such record
   */
  async delete(name: string): Promise<void> {
    const filePath = this.pathFor(name);
    try {
      await this.fileSystem.remove(filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new NotFoundError(`Tabset file not found '${filePath}'.`, { name, filePath }, toError(error));
      }
      throw new FileSystemError(`Unable to delete tabsets file '${filePath}'.`, { name, filePath }, toError(error));
    }
  }

  /**
   * Renames a stored tabset. Never overwrites an existing record.
   * @throws AlreadyExistsError when `newName` is taken, NotFoundError when `oldName` is missing
   */
  async rename(oldName: string, newName: string): Promise<void> {
    const oldFile = this.pathFor(oldName);
    const newFile = this.pathFor(newName);

    if (await this.fileSystem.isPath(newFile)) {
      throw new AlreadyExistsError(`Tabset '${newName}' already exists.`, { oldName, newName, filePath: newFile });
    }
    if (!(await this.fileSystem.isPath(oldFile))) {
      throw new NotFoundError(`Tabset file not found '${oldFile}'.`, { name: oldName, filePath: oldFile });
    }

    try {
      await this.fileSystem.move(oldFile, newFile);
    } catch (error) {
      throw new FileSystemError(
        `Unable to rename '${oldFile}' to '${newFile}'.`,
        { oldName, newName, oldFile, newFile },
        toError(error)
      );
    }
  }
}
