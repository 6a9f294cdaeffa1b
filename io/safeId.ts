/**
 * Normalize signal paths for file names.
 * Allows only [a-zA-Z0-9_-]; dots and everything else become '_'.
 */

export function safeFileStem(name: string): string {
  const stem = name.replace(/[^a-zA-Z0-9_-]/g, "_").replace(/^_+|_+$/g, "");
  return stem === "" ? "signal" : stem;
}
