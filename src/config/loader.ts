import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig } from './schema.js';

// Паттерн для подстановки переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

// Имя файла конфигурации в текущей директории.
const LOCAL_CONFIG_NAME = 'tsearch.config.yaml';

// Переменная окружения с явным путём к конфигу.
const CONFIG_ENV_VAR = 'TSEARCH_CONFIG';

// Простой объект (не массив и не null).
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивно обходит значение и заменяет строки вида ${ENV_VAR}
 * на значения из process.env. Ненайденные переменные остаются как есть.
 */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (match, varName: string) => process.env[varName] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item));
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item);
    }
    return result;
  }

  return value;
}

/**
 * Рекурсивный deep-merge двух объектов.
 * Значения из source перезаписывают target, кроме случая, когда оба значения являются объектами.
 * Массивы заменяются целиком.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Определяет путь к конфиг-файлу.
 * Порядок поиска:
 * 0. Переданный configPath (--config). При отсутствии файла — throw Error.
 * 1. TSEARCH_CONFIG. При отсутствии файла — throw Error.
 * 2. ./tsearch.config.yaml.
 * 3. ~/.config/tsearch/config.yaml.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at path: ${resolved}`);
  }

  const envConfigPath = process.env[CONFIG_ENV_VAR];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at ${CONFIG_ENV_VAR} path: ${resolved}`);
  }

  const localPath = resolve(LOCAL_CONFIG_NAME);
  if (await fileExists(localPath)) {
    return localPath;
  }

  const globalPath = join(homedir(), '.config', 'tsearch', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

/**
 * Превращает распарсенный YAML в AppConfig: подстановка ${ENV_VAR},
 * deep-merge с дефолтами, валидация через AppConfigSchema.
 * Пустой документ даёт дефолтный конфиг.
 */
export function parseConfig(raw: unknown): AppConfig {
  if (!isPlainObject(raw)) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const withEnvVars = resolveEnvVars(raw);
  const merged = isPlainObject(withEnvVars)
    ? deepMerge({ ...defaultConfig }, withEnvVars)
    : { ...defaultConfig };

  return AppConfigSchema.parse(merged);
}

/**
 * Загружает конфигурацию из YAML-файла.
 * Если конфиг-файл не найден — возвращает дефолтный конфиг.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);

  if (!resolvedPath) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const raw = await readFile(resolvedPath, 'utf-8');
  return parseConfig(parseYaml(raw));
}
