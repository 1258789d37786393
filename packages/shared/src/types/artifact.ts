/**
 * Workspace artifact records: files a workspace produced (outputs,
 * archives) registered with the backend.
 */

export type ArtifactType =
  | "source_code"
  | "document"
  | "image"
  | "data"
  | "log"
  | "output"
  | "archive"
  | "other";

/** reference = path on this device, inline = content carried in the record */
export type ArtifactStorage = "reference" | "inline" | "external";

export interface NewArtifact {
  task_id: string | null;
  file_path: string;
  file_name: string;
  file_extension: string | null;
  artifact_type: ArtifactType;
  file_size_bytes: number;
  mime_type: string;
  storage_type: ArtifactStorage;
  /** Inline content for small text outputs */
  content: string | null;
  description: string | null;
  tags: string[];
  is_output: boolean;
}

export interface WorkspaceArtifact extends NewArtifact {
  id: string;
  workspace_id: string;
  created_at: string;
}
