import { AnswerMatcher, normalizeAnswer } from '../../src/services/answer-matcher';

describe('AnswerMatcher', () => {
  describe('normalizeAnswer', () => {
    it('should trim, lower-case and collapse inner whitespace', () => {
      expect(normalizeAnswer('  Good   Morning ')).toBe('good morning');
    });

    it('should drop a leading "to " when infinitives are allowed', () => {
      expect(normalizeAnswer('To Eat')).toBe('eat');
      expect(normalizeAnswer('to eat', { stripDiacritics: false, allowInfinitiveTo: false })).toBe('to eat');
    });

    it('should strip accents only when asked to', () => {
      expect(normalizeAnswer('Café')).toBe('café');
      expect(normalizeAnswer('Café', { stripDiacritics: true, allowInfinitiveTo: true })).toBe('cafe');
    });
  });

  describe('matches', () => {
    const matcher = new AnswerMatcher();

    it('should accept any listed translation regardless of case and spacing', () => {
      expect(matcher.matches('  CAT ', ['cat'])).toBe(true);
      expect(matcher.matches('kitty', ['cat', 'kitty'])).toBe(true);
    });

    it('should treat "to run" and "run" as the same answer', () => {
      expect(matcher.matches('run', ['to run'])).toBe(true);
      expect(matcher.matches('to run', ['run'])).toBe(true);
    });

    it('should reject wrong and empty answers', () => {
      expect(matcher.matches('dog', ['cat'])).toBe(false);
      expect(matcher.matches('   ', ['cat'])).toBe(false);
    });

    it('should keep accents significant by default', () => {
      expect(matcher.matches('cafe', ['café'])).toBe(false);
      expect(new AnswerMatcher({ stripDiacritics: true }).matches('cafe', ['café'])).toBe(true);
    });
  });
});
