const TABSET_NAME_PATTERN = /^[A-Za-z0-9+._ -]+$/;

export const TABSET_FILE_SUFFIX = ".tabset.json";

/**
 * Check whether a tabset name only contains allowed characters:
 * ASCII letters, digits, `+`, `.`, `-`, `_` and space.
 * Anything else, path separators included, is rejected so a name can never
 * address a file outside the tabsets directory.
 */
export function isValidTabsetName(name: string): boolean {
  return TABSET_NAME_PATTERN.test(name);
}

/**
 * Strip the tabset suffix from a directory entry, or null if the entry is not a tabset file
 */
export function tabsetNameFromFileName(fileName: string): string | null {
  if (!fileName.endsWith(TABSET_FILE_SUFFIX)) return null;
  const name = fileName.slice(0, -TABSET_FILE_SUFFIX.length);
  return name.length > 0 ? name : null;
}
