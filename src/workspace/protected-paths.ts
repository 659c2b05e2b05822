import picomatch from 'picomatch';

export const PROTECTED_PATH_PATTERNS = ['.trellis/**'] as const;

/**
 * Paths no agent tool may write directly: the engine's own state. Paths are
 * repo-relative with `/` separators; a leading `./` is ignored.
 */
export function isProtectedPath(path: string, patterns: readonly string[] = PROTECTED_PATH_PATTERNS): boolean {
  const isMatch = picomatch([...patterns], { dot: true });
  return isMatch(normalizeRepoPath(path));
}

export function normalizeRepoPath(path: string): string {
  return path.replaceAll('\\', '/').replace(/^(\.\/)+/, '');
}
