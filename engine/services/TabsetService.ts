/**
 * Tabset Service
 *
 * Public entry point for saving, loading, deleting and renaming tabsets.
 * Each operation converts every error into a TabsetOutcome and tells the user
 * about it through the notifier; nothing throws out of this class. An operation
 * mutates the store at most once.
 *
 * Interactive variants ask the Prompter for a name first. A dismissed prompt
 * resolves to a "cancelled" outcome without any notification.
 */

import type { HostWindow, PromptAnswer, PromptRequest, Prompter, TabsetData } from "../../shared/types/index.js";
import type { TabsetsConfig } from "../types/config.js";
import {
  AlreadyExistsError,
  DirectoryUnavailableError,
  InvalidSnapshotError,
  NotFoundError,
  TabsetParseError,
  getUserMessage,
} from "../utils/errorTypes.js";
import { logError, logInfo } from "../utils/logger.js";
import { isValidTabsetName } from "../utils/tabsetName.js";
import type { Notifier } from "./DesktopNotifier.js";
import type { LayoutCapture } from "./LayoutCapture.js";
import type { LayoutReconstructor } from "./LayoutReconstructor.js";
import type { TabsetStore } from "./TabsetStore.js";

export type TabsetOutcomeCode =
  | "INVALID_NAME"
  | "NOT_FOUND"
  | "PARSE_ERROR"
  | "IO_ERROR"
  | "ALREADY_EXISTS"
  | "DIRECTORY_UNAVAILABLE"
  | "NO_TABSETS"
  | "INVALID_SNAPSHOT"
  | "CAPTURE_FAILED"
  | "HOST_ERROR";

export type TabsetOutcome =
  | { status: "success"; message: string }
  | { status: "failure"; code: TabsetOutcomeCode; message: string }
  | { status: "cancelled" };

export interface TabsetServiceDeps {
  config: Pick<TabsetsConfig, "fuzzySelector">;
  store: TabsetStore;
  capture: LayoutCapture;
  reconstructor: LayoutReconstructor;
  notifier: Notifier;
  prompter: Prompter;
}

const CANCELLED: TabsetOutcome = { status: "cancelled" };

type NameLookup = { name: string } | { outcome: TabsetOutcome };

export class TabsetService {
  private readonly config: Pick<TabsetsConfig, "fuzzySelector">;
  private readonly store: TabsetStore;
  private readonly layoutCapture: LayoutCapture;
  private readonly reconstructor: LayoutReconstructor;
  private readonly notifier: Notifier;
  private readonly prompter: Prompter;

  constructor(deps: TabsetServiceDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.layoutCapture = deps.capture;
    this.reconstructor = deps.reconstructor;
    this.notifier = deps.notifier;
    this.prompter = deps.prompter;
  }

  /**
   * Creates the tabsets directory. Failure is logged; store operations report it later.
   * @returns false when the directory could not be created
   */
  async initialize(): Promise<boolean> {
    try {
      await this.store.initialize();
      return true;
    } catch (error) {
      logError(`Failed to create tabsets directory '${this.store.getDirectory()}'.`, error);
      return false;
    }
  }

  // ==========================================================================
  // Save
  // ==========================================================================

  /**
   * Capture the window, then ask for a name and store the layout under it
   */
  async save(window: HostWindow): Promise<TabsetOutcome> {
    const snapshot = await this.captureLayout(window);
    if ("outcome" in snapshot) {
      return snapshot.outcome;
    }

    const answer = await this.ask({ kind: "text", description: "Enter tabset name:" });
    if (answer.status === "cancelled") {
      return CANCELLED;
    }
    return this.storeSnapshot(window, snapshot.data, answer.value);
  }

  async saveAs(window: HostWindow, name: string): Promise<TabsetOutcome> {
    if (!isValidTabsetName(name)) {
      return this.fail(window, "INVALID_NAME", `Invalid tabset name '${name}'.`);
    }
    const snapshot = await this.captureLayout(window);
    if ("outcome" in snapshot) {
      return snapshot.outcome;
    }
    return this.storeSnapshot(window, snapshot.data, name);
  }

  private async captureLayout(window: HostWindow): Promise<{ data: TabsetData } | { outcome: TabsetOutcome }> {
    try {
      return { data: await this.layoutCapture.capture(window) };
    } catch (error) {
      logError("Failed to capture window layout", error, { windowId: window.id });
      return { outcome: await this.fail(window, "CAPTURE_FAILED", "Unable to read window layout.") };
    }
  }

  private async storeSnapshot(window: HostWindow, snapshot: TabsetData, name: string): Promise<TabsetOutcome> {
    if (!isValidTabsetName(name)) {
      return this.fail(window, "INVALID_NAME", `Invalid tabset name '${name}'.`);
    }
    try {
      await this.store.save(snapshot, name);
    } catch (error) {
      logError(`Failed to save tabset '${name}'`, error);
      return this.fail(window, "IO_ERROR", `Unable to save '${this.store.pathFor(name)}'.`);
    }
    return this.succeed(window, `Tabset '${name}' saved successfully.`);
  }

  // ==========================================================================
  // Load
  // ==========================================================================

  async load(window: HostWindow): Promise<TabsetOutcome> {
    const selection = await this.selectTabset(window, "Select tabset to load:");
    if ("outcome" in selection) {
      return selection.outcome;
    }
    return this.loadByName(window, selection.name);
  }

  async loadByName(window: HostWindow, name: string): Promise<TabsetOutcome> {
    if (!isValidTabsetName(name)) {
      return this.fail(window, "INVALID_NAME", `Invalid tabset name '${name}'.`);
    }
    const filePath = this.store.pathFor(name);

    let snapshot: TabsetData;
    try {
      snapshot = await this.store.load(name);
    } catch (error) {
      logError(`Failed to load tabset '${name}'`, error);
      if (error instanceof NotFoundError) {
        return this.fail(window, "NOT_FOUND", `Tabset file not found '${filePath}'.`);
      }
      if (error instanceof TabsetParseError) {
        return this.fail(window, "PARSE_ERROR", `Tabset file is corrupt '${filePath}'.`);
      }
      return this.fail(window, "IO_ERROR", getUserMessage(error));
    }

    try {
      const report = await this.reconstructor.reconstruct(window, snapshot);
      logInfo(`Tabset '${name}' reconstructed`, { ...report, failures: report.failures.length });
    } catch (error) {
      logError(`Failed to recreate tabset '${name}'`, error);
      const code = error instanceof InvalidSnapshotError ? "INVALID_SNAPSHOT" : "HOST_ERROR";
      return this.fail(window, code, `Tabset loading failed '${name}'.`);
    }
    return this.succeed(window, `Tabset loaded '${name}'.`);
  }

  // ==========================================================================
  // Delete
  // ==========================================================================

  async delete(window: HostWindow): Promise<TabsetOutcome> {
    const selection = await this.selectTabset(window, "Select tabset to delete:");
    if ("outcome" in selection) {
      return selection.outcome;
    }
    return this.deleteByName(window, selection.name);
  }

  async deleteByName(window: HostWindow, name: string): Promise<TabsetOutcome> {
    if (!isValidTabsetName(name)) {
      return this.fail(window, "INVALID_NAME", `Invalid tabset name '${name}'.`);
    }
    try {
      await this.store.delete(name);
    } catch (error) {
      logError(`Failed to delete tabset '${name}'`, error);
      const code = error instanceof NotFoundError ? "NOT_FOUND" : "IO_ERROR";
      return this.fail(window, code, `Unable to delete tabsets file '${this.store.pathFor(name)}'.`);
    }
    return this.succeed(window, `Deleted tabset '${name}'.`);
  }

  // ==========================================================================
  // Rename
  // ==========================================================================

  async rename(window: HostWindow): Promise<TabsetOutcome> {
    const selection = await this.selectTabset(window, "Select tabset to rename:");
    if ("outcome" in selection) {
      return selection.outcome;
    }

    const answer = await this.ask({
      kind: "text",
      description: "Enter new tabset name:",
      initialValue: selection.name,
    });
    if (answer.status === "cancelled") {
      return CANCELLED;
    }
    return this.renameByName(window, selection.name, answer.value);
  }

  async renameByName(window: HostWindow, oldName: string, newName: string): Promise<TabsetOutcome> {
    for (const name of [oldName, newName]) {
      if (!isValidTabsetName(name)) {
        return this.fail(window, "INVALID_NAME", `Invalid tabset name '${name}'.`);
      }
    }

    try {
      await this.store.rename(oldName, newName);
    } catch (error) {
      logError(`Failed to rename tabset '${oldName}'`, error);
      if (error instanceof AlreadyExistsError) {
        return this.fail(window, "ALREADY_EXISTS", `Tabset '${newName}' already exists.`);
      }
      const code = error instanceof NotFoundError ? "NOT_FOUND" : "IO_ERROR";
      return this.fail(
        window,
        code,
        `Unable to rename '${this.store.pathFor(oldName)}' to '${this.store.pathFor(newName)}'.`
      );
    }
    return this.succeed(window, `Tabset '${oldName}' successfully renamed to '${newName}'.`);
  }

  // ==========================================================================
  // Listing and selection
  // ==========================================================================

  /**
   * Stored tabset names in selection order (lexicographic).
   * The user is notified when the directory is unreadable or holds no tabsets.
   */
  async listNames(window: HostWindow): Promise<string[]> {
    const lookup = await this.collectNames(window);
    return "names" in lookup ? lookup.names : [];
  }

  private async collectNames(window: HostWindow): Promise<{ names: string[] } | { outcome: TabsetOutcome }> {
    let names: string[];
    try {
      names = await this.store.list();
    } catch (error) {
      logError("Failed to list tabsets", error);
      const code = error instanceof DirectoryUnavailableError ? "DIRECTORY_UNAVAILABLE" : "IO_ERROR";
      return {
        outcome: await this.fail(window, code, `Could not read tabsets directory '${this.store.getDirectory()}'.`),
      };
    }

    if (names.length === 0) {
      const message = "No saved tabset files found.";
      await this.tell(window, message, false);
      return { outcome: { status: "failure", code: "NO_TABSETS", message } };
    }
    return { names };
  }

  private async selectTabset(window: HostWindow, description: string): Promise<NameLookup> {
    const lookup = await this.collectNames(window);
    if ("outcome" in lookup) {
      return lookup;
    }

    const answer = await this.ask({
      kind: "select",
      description,
      choices: lookup.names.map((name) => ({ id: name, label: name })),
      fuzzy: this.config.fuzzySelector,
    });
    if (answer.status === "cancelled") {
      return { outcome: CANCELLED };
    }
    return { name: answer.value };
  }

  // ==========================================================================
  // Outcome helpers
  // ==========================================================================

  private async succeed(window: HostWindow, message: string): Promise<TabsetOutcome> {
    await this.tell(window, message, false);
    return { status: "success", message };
  }

  private async fail(window: HostWindow, code: TabsetOutcomeCode, message: string): Promise<TabsetOutcome> {
    await this.tell(window, message, true);
    return { status: "failure", code, message };
  }

  private async ask(request: PromptRequest): Promise<PromptAnswer> {
    try {
      return await this.prompter.prompt(request);
    } catch (error) {
      logError(`Prompt '${request.description}' failed`, error);
      return { status: "cancelled" };
    }
  }

  private async tell(window: HostWindow, message: string, error: boolean): Promise<void> {
    try {
      await this.notifier.notify(window, message, { error });
    } catch (notifyError) {
      logError(`Failed to show notification: ${message}`, notifyError);
    }
  }
}
