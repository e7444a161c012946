import { readdir, stat } from 'fs/promises';
import { join, extname, normalize, relative } from 'path';

export type StatementFileKind = 'pdf' | 'csv';

export interface StatementFileInfo {
  filePath: string;
  fileName: string;
  kind: StatementFileKind;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface ScanResult {
  files: StatementFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

const EXTENSION_KINDS: Record<string, StatementFileKind> = {
  '.pdf': 'pdf',
  '.csv': 'csv',
};

/**
 * Scans a directory tree for statement files (.pdf and .csv, any case),
 * filtering out temporary/invalid files.
 * Returns PDFs first, then CSVs, each sorted by path for deterministic
 * processing.
 */
export async function scanDirectoryForStatements(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const files: StatementFileInfo[] = [];
  const skipped: Array<{ fileName: string; reason: string }> = [];

  await walk(normalizedPath, normalizedPath, files, skipped);

  const kindOrder: Record<StatementFileKind, number> = { pdf: 0, csv: 1 };
  files.sort((a, b) => kindOrder[a.kind] - kindOrder[b.kind] || compareStrings(a.filePath, b.filePath));

  return {
    files,
    skipped,
    directoryPath: normalizedPath,
  };
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function walk(
  rootPath: string,
  directoryPath: string,
  files: StatementFileInfo[],
  skipped: Array<{ fileName: string; reason: string }>
): Promise<void> {
  const entries = await readdir(directoryPath, { withFileTypes: true });

  for (const entry of entries) {
    const filePath = join(directoryPath, entry.name);

    if (entry.isDirectory()) {
      await walk(rootPath, filePath, files, skipped);
      continue;
    }

    const fileName = entry.name;
    const kind = EXTENSION_KINDS[extname(fileName).toLowerCase()];
    if (kind === undefined) {
      continue;
    }

    const displayName = relative(rootPath, filePath);

    // Skip temporary files (starting with ~$ or .)
    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName: displayName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const fileStat = await stat(filePath);

    if (fileStat.size === 0) {
      skipped.push({ fileName: displayName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({
      filePath,
      fileName: displayName,
      kind,
      sizeBytes: fileStat.size,
      modifiedAt: fileStat.mtime,
    });
  }
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }

    return { valid: true };
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return { valid: false, error: `Directory does not exist: ${directoryPath}` };
    }
    if (code === 'EACCES') {
      return { valid: false, error: `Permission denied: ${directoryPath}` };
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}
