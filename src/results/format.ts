// Текстовый вывод результатов поиска для CLI.
import type { SearchResponse } from '../search/types.js';
import type { ConversationGroup, SegmentResult } from './types.js';

function formatSegment(result: SegmentResult, rank: number): string[] {
  const lines = [`${rank}. [${result.start} - ${result.end}] (${result.score.toFixed(2)}) ${result.text}`];
  if (result.deepLink) {
    lines.push(`   ${result.deepLink}`);
  }
  return lines;
}

function formatGroup(group: ConversationGroup, rank: number): string[] {
  const lines = [`${rank}. Группа ${group.groupId}`];
  for (const item of group.items) {
    const marker = item.isMatch ? '*' : ' ';
    lines.push(`  ${marker} [${item.start} - ${item.end}] ${item.text}`);
  }
  return lines;
}

// Строки вывода: заголовок со сводкой, затем результаты.
export function formatSearchResponse(response: SearchResponse): string[] {
  const header =
    `Найдено: ${response.total}, показано: ${response.returned} ` +
    `(режим: ${response.modeUsed}, ${Math.round(response.queryTimeMs)} мс)`;
  const lines = [header];

  if (response.modeUsed !== response.requestedMode) {
    lines.push(`Режим ${response.requestedMode} недоступен, использован ${response.modeUsed}.`);
  }
  if (response.returned === 0) {
    lines.push('Ничего не найдено.');
    return lines;
  }

  lines.push('');
  if (response.grouped) {
    response.results.forEach((group, i) => lines.push(...formatGroup(group, i + 1)));
  } else {
    response.results.forEach((result, i) => lines.push(...formatSegment(result, i + 1)));
  }
  return lines;
}
