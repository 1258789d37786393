/**
 * Zod schema for artifact records returned by the backend.
 */

import { z } from "zod";
import type { WorkspaceArtifact } from "../types/artifact.js";
import { counter, idSchema, nullable } from "./helpers.js";

export const artifactSchema = z
  .object({
    id: idSchema,
    workspace_id: idSchema,
    task_id: nullable(idSchema),
    file_path: z.string().min(1),
    file_name: z.string().min(1),
    file_extension: nullable(z.string()),
    artifact_type: z
      .enum(["source_code", "document", "image", "data", "log", "output", "archive", "other"])
      .catch("other"),
    file_size_bytes: counter,
    mime_type: z.string().default("application/octet-stream"),
    storage_type: z.enum(["reference", "inline", "external"]).default("reference"),
    content: nullable(z.string()),
    description: nullable(z.string()),
    tags: z.array(z.string()).default([]),
    is_output: z.boolean().default(false),
    created_at: z.string().default(""),
  })
  .transform((artifact): WorkspaceArtifact => artifact);
