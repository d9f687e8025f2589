// Barrel-файл модуля нормализации текста.
export { normalizeText, tokenize } from './normalizer.js';
