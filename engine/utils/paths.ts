import type { PathStyle } from "../../shared/types/index.js";

/** Shells whose prompt is considered an idle, replaceable pane. */
export const KNOWN_SHELLS: ReadonlySet<string> = new Set(["sh", "bash", "zsh", "fish", "nu", "dash", "csh", "ksh"]);

/**
 * Final component of a POSIX or Windows path.
 * `/foo/bar` gives `bar`, `c:\foo\bar` gives `bar`.
 */
export function basename(path: string): string {
  const index = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  return index === -1 ? path : path.slice(index + 1);
}

/**
 * Whether an executable name or path refers to an interactive shell.
 * Windows executables are matched without their `.exe` extension.
 */
export function isShell(executable: string): boolean {
  const name = basename(executable).replace(/\.exe$/i, "");
  return KNOWN_SHELLS.has(name);
}

function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    // Not valid percent-encoding; the host reported a raw path
    return path;
  }
}

/**
 * Turn a recorded working directory into a local path.
 *
 * Plain paths are returned unchanged. For `file://` URIs the scheme and any host
 * authority are removed and percent-escapes decoded:
 * - posix: `file://myhost/home/u/src` gives `/home/u/src`
 * - windows: `file:///C:/Users/u` gives `C:/Users/u`
 */
export function extractPathFromUri(uri: string, style: PathStyle = "posix"): string {
  if (!uri.toLowerCase().startsWith("file://")) {
    return uri;
  }

  let rest = uri.slice("file://".length);
  const slash = rest.indexOf("/");
  // Drop the authority ("localhost", a hostname) up to the first slash
  rest = slash === -1 ? "/" : rest.slice(slash);

  const path = decodePath(rest);
  if (style === "windows" && /^\/[A-Za-z]:/.test(path)) {
    return path.slice(1);
  }
  return path;
}
