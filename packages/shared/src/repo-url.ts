/**
 * Repository URL normalization.
 *
 * Workspaces created for a repository get a default name derived from the
 * repository URL. URLs come in every shape git accepts, so they are first
 * normalized to "host/path":
 *   1. Strip protocol (https://, http://, ssh://, git://)
 *   2. Strip auth prefix (user@ or user:token@)
 *   3. Replace ":" with "/" for SCP-style (git@github.com:user/repo)
 *   4. Strip ".git" suffix and trailing slashes
 *   5. Lowercase the host only (path case preserved)
 */

/**
 * Normalize a git remote URL into "host/path".
 * Returns null for empty or unparseable input: never throws.
 *
 * @example
 *   normalizeRepoUrl("git@github.com:user/repo.git") // "github.com/user/repo"
 *   normalizeRepoUrl("https://GITHUB.COM/User/Repo") // "github.com/User/Repo"
 */
export function normalizeRepoUrl(repoUrl: string): string | null {
  const url = repoUrl.trim();
  if (!url) return null;

  // SCP-style: [user@]host:path where ":" is not followed by "//"
  const scp = url.match(/^(?:[^@/]+@)?([^:/]+):(?!\/\/)(.+)$/);
  if (scp) {
    return joinHostPath(scp[1], scp[2]);
  }

  const withoutProtocol = url
    .replace(/^(?:https?|ssh|git):\/\//, "")
    .replace(/^[^@/]+@/, "");

  const slash = withoutProtocol.indexOf("/");
  if (slash <= 0) return null;

  const host = withoutProtocol.slice(0, slash).replace(/:\d+$/, "");
  return joinHostPath(host, withoutProtocol.slice(slash + 1));
}

function joinHostPath(host: string, path: string): string | null {
  const cleanHost = host.toLowerCase();
  const cleanPath = path.replace(/\.git$/, "").replace(/\/+$/, "");
  if (!cleanHost || !cleanPath) return null;
  return `${cleanHost}/${cleanPath}`;
}

/**
 * Last path segment of a repository URL ("repo" for any spelling of
 * github.com/user/repo), or null if the URL cannot be normalized.
 */
export function repoNameFromUrl(repoUrl: string): string | null {
  const normalized = normalizeRepoUrl(repoUrl);
  if (!normalized) return null;
  const segments = normalized.split("/").filter(Boolean);
  return segments.length > 1 ? segments[segments.length - 1] : null;
}

/** Branches a fresh clone already has checked out, so no checkout is needed. */
export function isDefaultBranch(branch: string | null | undefined): boolean {
  return !branch || branch === "main" || branch === "master";
}
