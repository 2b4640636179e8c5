/**
 * Zod schemas for the tabset file format.
 *
 * Every record read from disk is validated here before it reaches the
 * reconstructor, so a hand-edited or truncated file surfaces as a parse error
 * instead of a half-built window.
 */

import { z } from "zod";
import type { TabsetData } from "../../shared/types/index.js";

export const TabsetPaneDataSchema = z.object({
  left: z.number().int(),
  cwd: z.string(),
  exe: z.string(),
});

export const TabsetTabDataSchema = z.object({
  title: z.string(),
  // Empty pane lists are accepted here and rejected by the reconstructor
  panes: z.array(TabsetPaneDataSchema),
});

export const TabsetDataSchema = z.object({
  window_width: z.number().int().nonnegative(),
  window_height: z.number().int().nonnegative(),
  colors: z.record(z.string(), z.unknown()).default({}),
  tabs: z.array(TabsetTabDataSchema),
}) satisfies z.ZodType<TabsetData, z.ZodTypeDef, unknown>;
