// Поиск и чтение файлов транскриптов.
import fg from 'fast-glob';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseTranscript } from './transcript.js';
import type { ParsedTranscript } from './transcript.js';

export interface TranscriptFile {
  absolutePath: string;
  relativePath: string;
}

const DEFAULT_PATTERNS = ['**/*.json'];

/**
 * Находит файлы транскриптов в директории (по умолчанию все *.json),
 * в стабильном порядке.
 */
export async function scanTranscriptFiles(
  basePath: string,
  patterns: string[] = DEFAULT_PATTERNS,
): Promise<TranscriptFile[]> {
  const resolvedBase = resolve(basePath);

  const paths = await fg(patterns, {
    cwd: resolvedBase,
    ignore: ['**/node_modules/**', '**/.git/**'],
    dot: false,
    onlyFiles: true,
    absolute: false,
  });

  return paths
    .sort()
    .map((relativePath) => ({ absolutePath: resolve(resolvedBase, relativePath), relativePath }));
}

// Читает и разбирает файл транскрипта.
export async function readTranscriptFile(file: TranscriptFile): Promise<ParsedTranscript> {
  const content = await readFile(file.absolutePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in ${file.relativePath}`, { cause: error });
  }
  return parseTranscript(raw, file.relativePath);
}
