import { DateTimeParser } from './date-time.parser';

describe('DateTimeParser', () => {
  const parser = new DateTimeParser();
  // Tuesday
  const now = new Date(2024, 11, 10, 15, 30);

  describe('parseDate', () => {
    it.each([
      ['오늘', new Date(2024, 11, 10)],
      ['today', new Date(2024, 11, 10)],
      ['내일', new Date(2024, 11, 11)],
      ['Tomorrow', new Date(2024, 11, 11)],
      ['모레', new Date(2024, 11, 12)],
      ['내일 모레', new Date(2024, 11, 12)],
      ['이번 주', new Date(2024, 11, 10)],
      ['다음 주', new Date(2024, 11, 17)],
      ['다음주 금요일', new Date(2024, 11, 17)],
    ])('resolves the keyword "%s"', (token, expected) => {
      expect(parser.parseDate(token, now)).toEqual(expected);
    });

    it.each([
      ['2024-12-25', new Date(2024, 11, 25)],
      ['2025/1/3', new Date(2025, 0, 3)],
      ['2024년 3월 5일', new Date(2024, 2, 5)],
      ['12/25', new Date(2024, 11, 25)],
      ['1-15', new Date(2024, 0, 15)],
      ['12월 25일', new Date(2024, 11, 25)],
      ['25일', new Date(2024, 11, 25)],
    ])('resolves the format "%s"', (token, expected) => {
      expect(parser.parseDateDetailed(token, now)).toEqual({
        value: expected,
        source: 'format',
      });
    });

    it('keeps years below 100 as written', () => {
      const { value, source } = parser.parseDateDetailed('0050-03-01', now);
      expect(source).toBe('format');
      expect(value.getFullYear()).toBe(50);
      expect(value.getMonth()).toBe(2);
      expect(value.getDate()).toBe(1);
    });

    it('tolerates surrounding and repeated whitespace', () => {
      expect(parser.parseDate('  12월   25일 ', now)).toEqual(new Date(2024, 11, 25));
    });

    it('falls back to natural-language parsing', () => {
      expect(parser.parseDateDetailed('in 3 days', now)).toEqual({
        value: new Date(2024, 11, 13),
        source: 'natural',
      });
    });

    it('uses the anchor day for unparseable tokens', () => {
      expect(parser.parseDateDetailed('아무말', now)).toEqual({
        value: new Date(2024, 11, 10),
        source: 'default',
      });
      expect(parser.parseDateDetailed('', now).source).toBe('default');
    });

    it('does not mutate the anchor', () => {
      parser.parseDate('내일', now);
      expect(now).toEqual(new Date(2024, 11, 10, 15, 30));
    });
  });

  describe('parseTime', () => {
    it.each([
      ['오후 3시', 15, 0],
      ['오후 3시 30분', 15, 30],
      ['오전 9시', 9, 0],
      ['오전 12시', 0, 0],
      ['오후 12시', 12, 0],
      ['14시 30분', 14, 30],
      ['3:45 pm', 15, 45],
      ['7PM', 19, 0],
      ['10:05', 10, 5],
    ])('reads "%s" as %i:%i', (token, hour, minute) => {
      expect(parser.parseTimeDetailed(token)).toEqual({
        value: { hour, minute },
        source: 'format',
      });
    });

    it('defaults to 09:00 without digits', () => {
      expect(parser.parseTimeDetailed('시간 미정')).toEqual({
        value: { hour: 9, minute: 0 },
        source: 'default',
      });
    });

    it('defaults to 09:00 for out-of-range values', () => {
      expect(parser.parseTime('25시')).toEqual({ hour: 9, minute: 0 });
      expect(parser.parseTime('10시 75분')).toEqual({ hour: 9, minute: 0 });
    });
  });

  describe('parseDurationMinutes', () => {
    it.each([
      ['30분', 30],
      ['2시간', 120],
      ['90초', 2],
      ['1 시간', 60],
    ])('reads "%s" as %i minutes', (token, minutes) => {
      expect(parser.parseDurationMinutes(token)).toBe(minutes);
    });

    it('returns null without a unit', () => {
      expect(parser.parseDurationMinutes('곧')).toBeNull();
    });
  });
});
