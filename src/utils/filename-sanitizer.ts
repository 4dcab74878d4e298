/**
 * Characters Windows does not allow in filenames: \ / : * ? " < > |
 */
const WINDOWS_FORBIDDEN_CHARACTERS = /[\\/:*?"<>|]/g;

/**
 * Replace characters Windows forbids in filenames with underscores
 */
export function sanitizeFilename(name: string): string {
  return name.replace(WINDOWS_FORBIDDEN_CHARACTERS, '_');
}
