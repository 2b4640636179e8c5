/**
 * Tabset snapshot types.
 *
 * A tabset is the persisted description of one window: its pixel size, color
 * overrides and the ordered tabs and panes it contained when it was saved.
 * Property names match the on-disk JSON format.
 */

/** Opaque color scheme as reported by the host (palette, cursor, tab bar...). */
export type ColorScheme = Record<string, unknown>;

/** One pane of a recorded tab. */
export interface TabsetPaneData {
  /** Horizontal grid position of the pane (cell column of its left edge) */
  readonly left: number;
  /** Working directory as reported by the host, usually a `file://` URI */
  readonly cwd: string;
  /** Foreground process name or absolute executable path */
  readonly exe: string;
}

/** One recorded tab. Pane order is the host's order and is replayed verbatim. */
export interface TabsetTabData {
  readonly title: string;
  readonly panes: readonly TabsetPaneData[];
}

/** The persisted unit. */
export interface TabsetData {
  /** Window width in pixels */
  readonly window_width: number;
  /** Window height in pixels */
  readonly window_height: number;
  readonly colors: ColorScheme;
  readonly tabs: readonly TabsetTabData[];
}

/** Direction of a pane split relative to the pane being split. */
export type SplitDirection = "down" | "right";

/** Path flavour used when turning recorded `file://` URIs back into paths. */
export type PathStyle = "posix" | "windows";
