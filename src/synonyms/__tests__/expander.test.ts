import { describe, it, expect } from 'vitest';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createSynonymTable, loadSynonymTable } from '../table.js';
import { expandQuery } from '../expander.js';

describe('createSynonymTable', () => {
  it('нормализует ключи и значения', () => {
    const table = createSynonymTable({ 'صلاة': ['الصلاة', 'صلوات'] });

    expect(table.get('صلاه')).toEqual(['الصلاه', 'صلوات']);
    expect(table.has('صلاة')).toBe(false);
  });

  it('отбрасывает значения, совпадающие с ключом, пустые и повторы', () => {
    const table = createSynonymTable({ 'صلاة': ['صلاه', 'abc', 'صلوات', 'صَلوات'] });

    expect(table.get('صلاه')).toEqual(['صلوات']);
  });

  it('объединяет ключи, совпадающие после нормализации', () => {
    const table = createSynonymTable({
      'زكاة': ['صدقة'],
      'زكاه': ['الزكاة', 'صدقه'],
    });

    expect(table.get('زكاه')).toEqual(['صدقه', 'الزكاه']);
    expect(table.size).toBe(1);
  });

  it('пропускает ключи, пустые после нормализации', () => {
    const table = createSynonymTable({ 'prayer': ['صلاة'] });

    expect(table.size).toBe(0);
  });
});

describe('loadSynonymTable', () => {
  it('загружает встроенную таблицу', async () => {
    const table = await loadSynonymTable();

    expect(table.get('صلاه')).toEqual(['صلوات', 'الصلاه', 'فرىضه']);
    expect(table.get('نار')).toEqual(['عذاب', 'جهنم', 'عقاب']);
  });

  it('загружает таблицу из указанного файла и валидирует формат', async () => {
    const dir = join(tmpdir(), 'tsearch-synonyms-test');
    await mkdir(dir, { recursive: true });

    try {
      const validPath = join(dir, 'valid.json');
      await writeFile(validPath, JSON.stringify({ 'علم': ['فقه'] }), 'utf-8');
      const table = await loadSynonymTable(validPath);
      expect(table.get('علم')).toEqual(['فقه']);

      const invalidPath = join(dir, 'invalid.json');
      await writeFile(invalidPath, JSON.stringify({ 'علم': 'فقه' }), 'utf-8');
      await expect(loadSynonymTable(invalidPath)).rejects.toThrow();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('expandQuery', () => {
  const table = createSynonymTable({
    'صلاة': ['صلوات', 'الصلاة', 'فريضة'],
    'سفر': ['رحلة', 'مسافر'],
    'رحلة': ['سفر', 'صلوات'],
  });

  it('первым элементом всегда идёт нормализованный запрос', () => {
    expect(expandQuery('صَلاة', table)[0]).toBe('صلاه');
  });

  it('добавляет связанные термины в порядке слов, затем таблицы', () => {
    expect(expandQuery('صلاة سفر', table)).toEqual([
      'صلاه سفر',
      'صلوات',
      'الصلاه',
      'فرىضه',
      'رحله',
      'مسافر',
    ]);
  });

  it('не содержит повторов', () => {
    const expanded = expandQuery('سفر رحلة صلاة', table);

    expect(new Set(expanded).size).toBe(expanded.length);
    expect(expanded).toEqual(['سفر رحله صلاه', 'رحله', 'مسافر', 'سفر', 'صلوات', 'الصلاه', 'فرىضه']);
  });

  it('термин без записи в таблице даёт ровно один элемент', () => {
    expect(expandQuery('الصيام', table)).toEqual(['الصىام']);
  });

  it('пустой запрос даёт один пустой элемент', () => {
    expect(expandQuery('', table)).toEqual(['']);
  });
});
