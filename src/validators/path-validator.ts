import * as path from 'path';

export const TEXT_EXTENSIONS = ['.txt', '.md', '.markdown'];
export const HTML_EXTENSIONS = ['.html', '.htm', '.xhtml'];

function isWithin(resolvedPath: string, dir: string): boolean {
  const relative = path.relative(dir, resolvedPath);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Sanitizes and validates an output directory path to prevent path traversal attacks
 * @throws Error if path contains null bytes or targets system directories
 */
export function sanitizeOutputPath(outputDir: string): string {
  if (outputDir.includes('\0')) {
    throw new Error('Invalid path: null byte detected');
  }

  const resolved = path.resolve(outputDir);

  const systemDirs = ['/etc', '/usr', '/bin', '/sbin', '/sys', '/proc', '/boot', '/dev'];
  if (systemDirs.some(dir => isWithin(resolved, dir))) {
    throw new Error('Cannot write to system directories');
  }

  return resolved;
}

/**
 * Sanitizes and validates a chapter source file path
 * @throws Error if path contains null bytes, targets system directories, or is not a text or HTML file
 */
export function sanitizeInputPath(inputPath: string): string {
  if (inputPath.includes('\0')) {
    throw new Error('Invalid path: null byte detected');
  }

  const extension = path.extname(inputPath).toLowerCase();
  if (![...TEXT_EXTENSIONS, ...HTML_EXTENSIONS].includes(extension)) {
    throw new Error(
      `Unsupported input file "${path.basename(inputPath)}". ` +
      `Expected one of: ${[...TEXT_EXTENSIONS, ...HTML_EXTENSIONS].join(', ')}`
    );
  }

  const resolved = path.resolve(inputPath);

  const blockedDirs = ['/etc', '/usr', '/bin', '/sbin', '/var/log', '/sys', '/proc'];
  if (blockedDirs.some(dir => isWithin(resolved, dir))) {
    throw new Error('Cannot read files from system directories');
  }

  return resolved;
}

/**
 * Validates that a resolved file path is within an intended directory
 * @throws Error if path escapes the intended directory
 */
export function validatePathWithinDirectory(filePath: string, intendedDir: string): void {
  if (!isWithin(path.resolve(filePath), path.resolve(intendedDir))) {
    throw new Error('Path traversal detected');
  }
}
