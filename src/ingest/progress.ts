// Репортер прогресса загрузки транскриптов и пересчёта эмбеддингов.

// Итог загрузки транскриптов.
export interface IngestResult {
  totalFiles: number;
  skippedFiles: number;
  totalSegments: number;
  indexed: number;
  failed: number;
  duration: number;
}

// Итог пересчёта эмбеддингов.
export interface BackfillResult {
  scanned: number;
  updated: number;
  skipped: number;
  failed: number;
  duration: number;
}

// Интерфейс репортера прогресса.
export interface ProgressReporter {
  onScanComplete(fileCount: number): void;
  onFileIndexed(fileName: string, spanCount: number, segmentCount: number): void;
  onFileSkipped(fileName: string, reason: string): void;
  onEmbedProgress(current: number, total: number): void;
  onBulkErrors(errors: string[]): void;
  onIngestComplete(result: IngestResult): void;
  onBackfillProgress(scanned: number, updated: number): void;
  onBackfillComplete(result: BackfillResult): void;
}

function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}

// Вывод прогресса в консоль.
export class ConsoleProgress implements ProgressReporter {
  onScanComplete(fileCount: number): void {
    console.log(`  Сканирование: ${fileCount} файлов транскриптов найдено`);
  }

  onFileIndexed(fileName: string, spanCount: number, segmentCount: number): void {
    console.log(`  ${fileName}: ${spanCount} отрезков → ${segmentCount} сегментов`);
  }

  onFileSkipped(fileName: string, reason: string): void {
    console.error(`  Пропущен ${fileName}: ${reason}`);
  }

  onEmbedProgress(current: number, total: number): void {
    console.log(`  Эмбеддинги: ${current}/${total}`);
  }

  onBulkErrors(errors: string[]): void {
    for (const error of errors) {
      console.error(`  Ошибка индексации: ${error}`);
    }
  }

  onIngestComplete(result: IngestResult): void {
    console.log(
      `  Готово: ${result.totalFiles} файлов (${result.skippedFiles} пропущено), ` +
      `${result.indexed} сегментов проиндексировано, ${result.failed} ошибок за ${formatSeconds(result.duration)}с`,
    );
  }

  onBackfillProgress(scanned: number, updated: number): void {
    console.log(`  Просмотрено: ${scanned}, обновлено: ${updated}`);
  }

  onBackfillComplete(result: BackfillResult): void {
    console.log(
      `  Готово: ${result.updated} из ${result.scanned} документов обновлено ` +
      `(${result.skipped} пропущено, ${result.failed} ошибок) за ${formatSeconds(result.duration)}с`,
    );
  }
}
