import { Logger } from '@nestjs/common';
import { ReminderExtractorService } from './reminder-extractor.service';

describe('ReminderExtractorService', () => {
  let extractor: ReminderExtractorService;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    extractor = new ReminderExtractorService();
  });

  describe('arrays', () => {
    it('reads a fenced json array in order', () => {
      const raw = [
        'Here you go:',
        '```json',
        '[',
        '  {"title": "Call mom", "date": "2026-10-20", "time": "17:00"},',
        '  {"title": "Pay rent", "date": null, "time": null}',
        ']',
        '```',
      ].join('\n');

      expect(extractor.extract(raw)).toEqual({
        kind: 'array',
        candidates: [
          { title: 'Call mom', date: '2026-10-20', time: '17:00' },
          { title: 'Pay rent' },
        ],
      });
    });

    it('reads a bare array inside prose', () => {
      const raw = 'Sure! [{"title":"Gym","time":"07:30"}] Anything else?';

      expect(extractor.extract(raw)).toEqual({
        kind: 'array',
        candidates: [{ title: 'Gym', time: '07:30' }],
      });
    });

    it('reads an untagged fence', () => {
      const raw = '```\n[{"title":"Water plants"}]\n```';

      expect(extractor.extract(raw)).toEqual({
        kind: 'array',
        candidates: [{ title: 'Water plants' }],
      });
    });

    it('falls through to the object when the array is empty', () => {
      const raw = '[] {"title":"Stretch"}';

      expect(extractor.extract(raw)).toEqual({
        kind: 'object',
        candidate: { title: 'Stretch' },
      });
    });

    it('falls through when an item is not an object', () => {
      expect(extractor.extract('["a", "b"]')).toEqual({
        kind: 'none',
        raw: '["a", "b"]',
      });
    });

    it('truncates a bare array at the first nested bracket', () => {
      // the array capture stops at the inner "]" and fails to parse
      const raw = '[{"title":"Pack","tags":["a"]}]';

      expect(extractor.extract(raw)).toEqual({
        kind: 'object',
        candidate: { title: 'Pack' },
      });
    });

    it('prefers a bare bracket that precedes the fence', () => {
      const raw = 'Use [brackets] like ```json\n[{"title":"a"}]\n```';

      expect(extractor.extract(raw)).toEqual({
        kind: 'object',
        candidate: { title: 'a' },
      });
    });
  });

  describe('objects', () => {
    it('reads a bare object', () => {
      const raw = '{"title":"Call mom","date":"2026-10-20","time":"17:00"}';

      expect(extractor.extract(raw)).toEqual({
        kind: 'object',
        candidate: { title: 'Call mom', date: '2026-10-20', time: '17:00' },
      });
    });

    it('reads a fenced object with a nested object', () => {
      const raw = '```json\n{"title": "Dentist", "meta": {"room": 4}}\n```';

      expect(extractor.extract(raw)).toEqual({
        kind: 'object',
        candidate: { title: 'Dentist' },
      });
    });

    it('reports a bare nested object as unparseable', () => {
      const raw = '{"title": "Dentist", "meta": {"room": 4}}';

      expect(extractor.extract(raw)).toEqual({
        kind: 'unparseable',
        details: expect.any(String),
        raw,
      });
    });

    it('reports invalid JSON as unparseable', () => {
      const raw = "{title: 'Call mom'}";

      expect(extractor.extract(raw)).toEqual({
        kind: 'unparseable',
        details: expect.any(String),
        raw,
      });
    });

    it('stringifies numbers and drops other field types', () => {
      const raw = '{"title": false, "date": null, "time": 7}';

      expect(extractor.extract(raw)).toEqual({
        kind: 'object',
        candidate: { time: '7' },
      });
    });
  });

  it('reports when no JSON is present', () => {
    const raw = 'I could not find any reminders in that message.';

    expect(extractor.extract(raw)).toEqual({ kind: 'none', raw });
  });
});
