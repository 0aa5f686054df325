import { z } from "zod";

/**
 * Relative paths resolve against the project root.
 */
const ProjectPathSchema = z.string().trim().min(1, "path must not be empty");

export const ConfigSchema = z.object({
  schema_version: z.number().int().positive().default(1),
  observed: z.array(ProjectPathSchema).default([]),
  hash_file: ProjectPathSchema.optional(),
  version_file: ProjectPathSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
