/**
 * Capabilities the tabsets engine consumes from its surroundings.
 *
 * The terminal host (window, tab and pane primitives), the prompt UI and the
 * filesystem are implemented outside the engine. Every call is async so that
 * hosts driven over a socket or CLI can implement them directly.
 */

import type { ColorScheme, SplitDirection } from "./tabset.js";

export interface WindowDimensions {
  pixelWidth: number;
  pixelHeight: number;
  isFullScreen: boolean;
}

export interface SplitPaneOptions {
  direction: SplitDirection;
  /** Working directory for the new pane; omitted means the host default */
  cwd?: string;
}

export interface SpawnTabOptions {
  cwd?: string;
}

export interface HostPane {
  readonly id: string;
  /** Current working directory as a URI or path, null when the host cannot tell */
  getCurrentWorkingDir(): Promise<string | null>;
  /** Name or path of the foreground process, null when unknown */
  getForegroundProcessName(): Promise<string | null>;
  /** Send literal text to the pane as if typed */
  sendText(text: string): Promise<void>;
  activate(): Promise<void>;
  /** Split this pane. Resolves to null when the host refused the split. */
  split(options: SplitPaneOptions): Promise<HostPane | null>;
}

/** A pane together with its position inside the tab grid. */
export interface HostPaneInfo {
  pane: HostPane;
  index: number;
  isActive: boolean;
  /** Cell column of the pane's left edge */
  left: number;
  /** Cell row of the pane's top edge */
  top: number;
  width: number;
  height: number;
}

export interface HostTab {
  readonly id: string;
  getTitle(): Promise<string>;
  setTitle(title: string): Promise<void>;
  activate(): Promise<void>;
  /** Panes in host order */
  panesWithInfo(): Promise<HostPaneInfo[]>;
  activePane(): Promise<HostPane | null>;
}

export interface HostWindow {
  readonly id: string;
  getDimensions(): Promise<WindowDimensions>;
  /** Effective color scheme of the window, undefined when none is configured */
  getColors(): Promise<ColorScheme | undefined>;
  setColorOverrides(colors: ColorScheme): Promise<void>;
  setInnerSize(pixelWidth: number, pixelHeight: number): Promise<void>;
  tabs(): Promise<HostTab[]>;
  /** Spawn a new tab. Resolves to null when the host refused to create it. */
  spawnTab(options: SpawnTabOptions): Promise<HostTab | null>;
  activePane(): Promise<HostPane | null>;
  /** Show a toast inside the host window */
  toast(title: string, message: string, timeoutMs: number): Promise<void>;
}

// ============================================================================
// Prompts
// ============================================================================

export interface PromptChoice {
  id: string;
  label: string;
}

export interface SelectPromptRequest {
  kind: "select";
  description: string;
  choices: PromptChoice[];
  /** Whether the selector should fuzzy match typed input */
  fuzzy: boolean;
}

export interface TextPromptRequest {
  kind: "text";
  description: string;
  initialValue?: string;
}

export type PromptRequest = SelectPromptRequest | TextPromptRequest;

export type PromptAnswer = { status: "answered"; value: string } | { status: "cancelled" };

/**
 * Shows a prompt and resolves once the user answers or dismisses it.
 * For select prompts the answered value is the chosen choice id.
 */
export interface Prompter {
  prompt(request: PromptRequest): Promise<PromptAnswer>;
}

// ============================================================================
// Filesystem
// ============================================================================

export interface FileSystemCapability {
  isPath(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  isExecutable(path: string): Promise<boolean>;
  /** Look a command up on the command search path, null when not found */
  which(command: string): Promise<string | null>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  /** Entry names (not paths) of a directory */
  readDir(path: string): Promise<string[]>;
  /** Create a directory and any missing parents */
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
  removeDir(path: string): Promise<void>;
  move(from: string, to: string): Promise<void>;
}
