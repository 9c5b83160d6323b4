/**
 * Rules for accepting uploaded video files and naming them on disk
 */

export const ALLOWED_VIDEO_EXTENSIONS: readonly string[] = ["mp4", "mov", "avi", "mkv", "webm"];

/**
 * Lower-cased extension after the last dot, or null when there is none
 */
export function getExtension(filename: string): string | null {
  const dot = filename.lastIndexOf(".");
  if (dot === -1 || dot === filename.length - 1) {
    return null;
  }
  return filename.slice(dot + 1).toLowerCase();
}

export function isAllowedVideoFile(
  filename: string,
  allowed: readonly string[] = ALLOWED_VIDEO_EXTENSIONS
): boolean {
  const extension = getExtension(filename);
  return extension !== null && allowed.includes(extension);
}

/**
 * Reduce a client-supplied filename to a safe single path component:
 * ASCII letters, digits, "_", "." and "-" only, whitespace and path
 * separators collapsed to "_", no leading or trailing "." or "_".
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x00-\x7F]/g, "");
  const joined = ascii
    .replace(/[/\\]/g, " ")
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join("_");

  return joined.replace(/[^A-Za-z0-9_.-]/g, "").replace(/^[._]+|[._]+$/g, "");
}
