import path from "path";

// Host paths may come from Windows (C:\Docs\a.3dm) regardless of the platform
// the agent runs on; win32 parsing accepts both separators.

export function fileNameOf(filePath: string): string {
  return path.win32.basename(filePath);
}

export function extensionOf(filePath: string): string {
  return path.win32.extname(filePath).toLowerCase();
}

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) return "";
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Comparable form of a path: forward slashes, no trailing slash, and
 * lower-cased when it carries a drive letter.
 */
export function comparablePath(filePath: string): string {
  let normalized = filePath.replace(/\\/g, "/").replace(/\/+$/, "");
  if (!normalized && /^[\\/]/.test(filePath)) return "/";
  if (/^[a-zA-Z]:/.test(normalized)) {
    normalized = normalized.toLowerCase();
  }
  return normalized;
}

export function isUnderRoot(filePath: string, root: string): boolean {
  const target = comparablePath(filePath);
  const base = comparablePath(root);
  if (!base) return false;
  const prefix = base.endsWith("/") ? base : `${base}/`;
  return target === base || target.startsWith(prefix);
}
