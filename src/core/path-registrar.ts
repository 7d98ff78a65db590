/**
 * Idempotent registration of a directory in a delimiter-joined path list
 * such as PATH or LD_LIBRARY_PATH.
 *
 * Matching is literal: the directory must appear between two delimiters
 * once the value is wrapped in delimiters, the same test the shell
 * fragments make with `case ":$VAR:" in *:"dir":*`. Trailing slashes and
 * symlinks are not normalized, so "/opt/bin" and "/opt/bin/" count as
 * different entries.
 */

/**
 * Split a path-list value into its segments. An empty value has no segments.
 */
export function splitSegments(value: string, delimiter: string): string[] {
  if (value === "") return [];
  return value.split(delimiter);
}

/**
 * Whether the directory already appears in the value, delimited on both sides.
 */
export function isRegistered(
  value: string,
  directory: string,
  delimiter: string,
): boolean {
  return `${delimiter}${value}${delimiter}`.includes(`${delimiter}${directory}${delimiter}`);
}

/**
 * Make sure `directory` is present in `currentValue`, prepending it if not.
 *
 * Existing segments keep their order, and a value that already holds the
 * directory is returned untouched. Pass "" for an unset variable.
 */
export function ensureRegistered(
  currentValue: string,
  directory: string,
  delimiter: string,
): string {
  if (isRegistered(currentValue, directory, delimiter)) {
    return currentValue;
  }
  if (currentValue === "") {
    return directory;
  }
  return `${directory}${delimiter}${currentValue}`;
}
