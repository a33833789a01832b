import { posix } from 'path';
import { PathSafetyError } from './errors';

export const OUTSIDE_ARTIFACT_DIRECTORY = 'Access denied: path is outside the artifact directory';

const SESSION_NAME = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;

/** A session name becomes one directory below the base directory, nothing deeper. */
export function assertSessionName(name: string): void {
  if (!SESSION_NAME.test(name)) {
    throw new PathSafetyError(`Invalid session name: ${JSON.stringify(name)}`);
  }
}

export function assertSafeFilename(filename: string): void {
  if (filename.includes('..') || filename.includes('/') || filename.includes('\\')) {
    throw new PathSafetyError('Invalid filename: path separators and traversal attempts are not allowed');
  }
  if (!filename || filename.startsWith('.')) {
    throw new PathSafetyError('Invalid filename: filename cannot be empty or start with a dot');
  }
}

/**
 * Maps a requested download path onto the artifact directory. Relative paths
 * are taken from the artifact directory, absolute ones must already lie below
 * it. Any parent-directory segment is refused outright, so the answer never
 * depends on what exists on the host.
 */
export function resolveArtifactPath(artifactDir: string, requested: string): string {
  if (!requested || requested.split(/[\\/]+/).includes('..')) {
    throw new PathSafetyError(OUTSIDE_ARTIFACT_DIRECTORY);
  }

  const resolved = posix.isAbsolute(requested) ? posix.normalize(requested) : posix.join(artifactDir, requested);
  const relative = posix.relative(artifactDir, resolved);
  if (!relative || relative.startsWith('..') || posix.isAbsolute(relative)) {
    throw new PathSafetyError(OUTSIDE_ARTIFACT_DIRECTORY);
  }
  return resolved;
}
