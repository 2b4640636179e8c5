/**
 * Zod schema for user-supplied tabsets options.
 * Keys use the snake_case names users write in their configuration.
 */

import { z } from "zod";

export const PathStyleSchema = z.enum(["posix", "windows"]);

export const TabsetOptionsSchema = z
  .object({
    /** Directory holding one `<name>.tabset.json` per record */
    tabsets_dir: z.string().trim().min(1).optional(),
    /** Restore recorded colors when loading into an empty window */
    restore_colors: z.boolean().optional(),
    /** Restore recorded pixel size when loading into an empty window */
    restore_dimensions: z.boolean().optional(),
    /** Fuzzy match names in the selection prompt */
    fuzzy_selector: z.boolean().optional(),
    /** How recorded `file://` URIs map to local paths */
    path_style: PathStyleSchema.optional(),
  })
  .strict();

export type TabsetOptions = z.infer<typeof TabsetOptionsSchema>;
