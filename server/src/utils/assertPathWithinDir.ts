import path from 'path'

/**
 * Assert that a resolved file path is inside the given directory (no path traversal).
 * The directory itself does not count as inside.
 * @throws Error if filePath resolves outside dir
 */
export function assertPathWithinDir(dir: string, filePath: string): void {
  const resolvedDir = path.resolve(dir)
  const resolvedPath = path.resolve(filePath)
  if (!resolvedPath.startsWith(resolvedDir + path.sep)) {
    throw new Error('Path must be within allowed directory')
  }
}

export function isPathWithinDir(dir: string, filePath: string): boolean {
  try {
    assertPathWithinDir(dir, filePath)
    return true
  } catch {
    return false
  }
}
