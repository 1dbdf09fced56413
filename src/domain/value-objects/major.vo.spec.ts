import { ValidationError } from '@/domain/errors';
import { Major, MAJORS, parseMajor } from './major.vo';

describe('parseMajor', () => {
  it('should accept canonical names', () => {
    for (const major of MAJORS) {
      expect(parseMajor(major)).toEqual({ ok: true, value: major });
    }
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(parseMajor('music')).toEqual({ ok: true, value: Major.Music });
    expect(parseMajor('  COMPUTERSCIENCE ')).toEqual({ ok: true, value: Major.ComputerScience });
  });

  it.each(['', 'Physics', 'computer science'])('should reject %p', (raw) => {
    const result = parseMajor(raw);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe(
        'major must be one of: Math, ComputerScience, Economics, Law, Literature, Music, Other',
      );
    }
  });

  it('should list seven majors', () => {
    expect(MAJORS).toHaveLength(7);
  });
});
