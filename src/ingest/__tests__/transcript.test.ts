import { describe, it, expect } from 'vitest';
import { parseTranscript, videoIdFromFileName } from '../transcript.js';

describe('videoIdFromFileName', () => {
  it('убирает директорию, расширение и суффикс _transcript', () => {
    expect(videoIdFromFileName('videos/abc_DEF-1_transcript.json')).toBe('abc_DEF-1');
    expect(videoIdFromFileName('a/b/XYZ.json')).toBe('XYZ');
  });
});

describe('parseTranscript', () => {
  it('склеенный транскрипт: ссылка из файла, пустые отрезки отброшены', () => {
    const parsed = parseTranscript({
      video_link: 'https://www.youtube.com/watch?v=abc123',
      segment: [
        { start: 0, end: 5, text: 'الصلاة' },
        { start: 5, end: 6, text: '  ' },
      ],
    }, 'abc123.json');

    expect(parsed).toEqual({
      videoReference: 'https://www.youtube.com/watch?v=abc123',
      spans: [{ start: 0, end: 5, text: 'الصلاة' }],
    });
  });

  it('вывод распознавателя: ссылка строится по имени файла', () => {
    const parsed = parseTranscript({
      segments: [{ start: 1.5, end: 4, text: 'الزكاة' }],
    }, 'videos/abc_DEF-1_transcript.json');

    expect(parsed.videoReference).toBe('https://www.youtube.com/watch?v=abc_DEF-1');
    expect(parsed.spans).toEqual([{ start: 1.5, end: 4, text: 'الزكاة' }]);
  });

  it('вывод распознавателя со своей ссылкой', () => {
    const parsed = parseTranscript({
      video_link: 'https://youtu.be/own42',
      segments: [{ start: 0, end: 2, text: 'الصوم' }],
    }, 'other_transcript.json');

    expect(parsed.videoReference).toBe('https://youtu.be/own42');
  });

  it('плоский массив упорядочивается по segment_index', () => {
    const parsed = parseTranscript([
      { video_link: 'flat01', start: 10, end: 20, text: 'ثاني', segment_index: 1 },
      { video_link: 'flat01', start: 0, end: 10, text: 'أول', segment_index: 0 },
    ], 'flat.json');

    expect(parsed).toEqual({
      videoReference: 'flat01',
      spans: [
        { start: 0, end: 10, text: 'أول' },
        { start: 10, end: 20, text: 'ثاني' },
      ],
    });
  });

  it('неизвестный формат — ошибка с именем файла', () => {
    expect(() => parseTranscript({ foo: 1 }, 'dir/x.json'))
      .toThrow('Unrecognized transcript format in x.json');
  });
});
