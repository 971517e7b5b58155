/**
 * Split a profile into command arguments the way an unquoted `$PROFILE`
 * expands in a shell: whitespace-separated words, empty words dropped.
 */
export function resolveProfileArgs(profile: string): string[] {
  return profile.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Exact string comparison; `" --release"` is not a release profile.
 */
export function isReleaseProfile(profile: string, releaseFlag: string): boolean {
  return profile === releaseFlag;
}
