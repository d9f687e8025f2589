// Нормализация арабского текста для лексического поиска и поиска синонимов.

// Огласовки (харакат), знаки чтения Корана и надстрочный алиф.
const DIACRITICS = /[\u0610-\u061A\u064B-\u065F\u0670\u06D6-\u06ED]/g;

// Татвиль (растяжка).
const TATWEEL = /\u0640/g;

// Варианты алифа с хамзой, маддой и васлой.
const ALEF_VARIANTS = /[\u0622\u0623\u0625\u0671]/g;
const ALEF = '\u0627';

const TEH_MARBUTA = /\u0629/g;
const HEH = '\u0647';

const YEH = /\u064A/g;
const ALEF_MAKSURA = '\u0649';

// Арабская пунктуация внутри блока U+0600–U+06FF: запятая, точка с запятой,
// вопросительный знак, процент, разделители разрядов, точка.
const ARABIC_PUNCTUATION = /[\u060C\u061B\u061F\u066A-\u066D\u06D4]/g;

// Всё, что вне арабского блока и не пробел.
const NON_ARABIC = /[^\u0600-\u06FF\s]/g;

const WHITESPACE = /\s+/g;

/**
 * Приводит текст к канонической форме: NFKC (раскрывает формы представления),
 * удаляет огласовки и татвиль, сводит семейства букв к одному представителю
 * (алиф, та марбута → ха, йа → алиф максура), заменяет символы вне арабской
 * письменности пробелами и схлопывает пробелы.
 *
 * Идемпотентна: normalizeText(normalizeText(x)) === normalizeText(x).
 * Для не-строк и пустых строк возвращает ''.
 */
export function normalizeText(input: unknown): string {
  if (typeof input !== 'string' || input.length === 0) {
    return '';
  }

  return input
    .normalize('NFKC')
    .replace(DIACRITICS, '')
    .replace(TATWEEL, '')
    .replace(ALEF_VARIANTS, ALEF)
    .replace(TEH_MARBUTA, HEH)
    .replace(YEH, ALEF_MAKSURA)
    .replace(ARABIC_PUNCTUATION, ' ')
    .replace(NON_ARABIC, ' ')
    .replace(WHITESPACE, ' ')
    .trim();
}

// Разбивает текст на нормализованные слова.
export function tokenize(input: unknown): string[] {
  const normalized = normalizeText(input);
  return normalized ? normalized.split(' ') : [];
}

