import { z } from "zod";

export interface UpdaterSettings {
  feedUrl?: string;
  currentVersion?: string;
}

// Unquoted versions such as `2.1` arrive as numbers; quote them to keep
// trailing zeros.
const versionValueSchema = z.union([z.string(), z.number()]);

export const updaterSettingsSchema = z
  .object({
    feedUrl: z.string().url("feedUrl must be an absolute URL").optional(),
    currentVersion: versionValueSchema.optional(),
  })
  .passthrough();
