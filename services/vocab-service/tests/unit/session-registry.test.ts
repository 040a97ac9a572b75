import { FlashcardSession } from '../../src/services/flashcard-session';
import { SessionRegistry } from '../../src/services/session-registry';
import { VocabularyStore } from '../../src/services/vocabulary-store';
import { NotFoundError } from '../../src/utils/errors';
import { InMemoryVocabularyRepository } from '../support/in-memory-repository';

describe('SessionRegistry', () => {
  const store = new VocabularyStore(new InMemoryVocabularyRepository());
  let clock: number;
  let registry: SessionRegistry;

  beforeEach(() => {
    clock = 0;
    registry = new SessionRegistry(() => new FlashcardSession({ store }), 1000, () => clock);
  });

  it('should hand out distinct ids for new sessions', () => {
    const first = registry.create();
    const second = registry.create();

    expect(first.id).not.toBe(second.id);
    expect(registry.get(first.id)).toBe(first.session);
    expect(registry.size).toBe(2);
  });

  it('should report an unknown id', () => {
    expect(() => registry.get('missing')).toThrow(NotFoundError);
  });

  it('should sweep only sessions idle past the TTL', () => {
    const idle = registry.create();
    clock = 800;
    const active = registry.create();
    clock = 1500;
    registry.get(active.id);

    expect(registry.sweep()).toBe(1);
    expect(() => registry.get(idle.id)).toThrow(NotFoundError);
    expect(registry.get(active.id)).toBe(active.session);
  });

  it('should discard a session on request', () => {
    const { id } = registry.create();

    expect(registry.discard(id)).toBe(true);
    expect(registry.discard(id)).toBe(false);
  });
});
