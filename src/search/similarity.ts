// Евклидова норма вектора.
export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

// Нулевой (или пустой) вектор: косинусная близость для него не определена.
export function isZeroVector(vector: readonly number[]): boolean {
  return vectorNorm(vector) === 0;
}
