// Целое число секунд из сохранённого значения: дробная часть отбрасывается,
// отрицательные и нечисловые значения дают 0.
export function toWholeSeconds(value: unknown): number {
  let seconds: number;
  if (typeof value === 'number') {
    seconds = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    seconds = Number(value);
  } else {
    return 0;
  }

  if (!Number.isFinite(seconds) || seconds <= 0) {
    return 0;
  }
  return Math.floor(seconds);
}

/**
 * Форматирует секунды как MM:SS. Минуты не переносятся в часы:
 * 3661 → "61:01".
 */
export function formatTimestamp(value: unknown): string {
  const total = toWholeSeconds(value);
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}
