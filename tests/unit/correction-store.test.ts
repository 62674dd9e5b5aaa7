import { InMemoryCorrectionStore } from '../../src/learning/correction-store';
import { buildFewShotBlock } from '../../src/learning/few-shot';
import { CorrectionRecord } from '../../src/learning/types';

function correction(id: string, overrides: Partial<CorrectionRecord> = {}): CorrectionRecord {
  return {
    id,
    category: 'gratitude',
    aiResponse: 'Thanks.',
    humanEdit: 'Thank you so much for writing in!',
    correctionType: 'tone',
    createdAt: 0,
    ...overrides,
  };
}

describe('InMemoryCorrectionStore', () => {
  let store: InMemoryCorrectionStore;

  beforeEach(() => {
    store = new InMemoryCorrectionStore();
  });

  it('should return the newest corrections first', async () => {
    await store.save(correction('a'));
    await store.save(correction('b'));
    await store.save(correction('c'));

    const recent = await store.recent('gratitude', 2);

    expect(recent.map((c) => c.id)).toEqual(['c', 'b']);
  });

  it('should keep categories apart', async () => {
    await store.save(correction('a'));
    await store.save(correction('b', { category: 'payment_question' }));

    expect((await store.recent('payment_question', 5)).map((c) => c.id)).toEqual(['b']);
    expect(await store.recent('shipping_or_delivery_question', 5)).toEqual([]);
  });

  it('should cap each category at fifty corrections', async () => {
    for (let i = 0; i < 55; i++) {
      await store.save(correction(`c-${i}`));
    }

    const all = await store.recent('gratitude', 100);

    expect(all).toHaveLength(50);
    expect(all[0].id).toBe('c-54');
    expect(all[49].id).toBe('c-5');
  });
});

describe('buildFewShotBlock', () => {
  it('should return undefined when there are no corrections', () => {
    expect(buildFewShotBlock([])).toBeUndefined();
  });

  it('should render each correction as a numbered example', () => {
    const block = buildFewShotBlock([
      correction('a', { issue: 'Too curt' }),
      correction('b', { correctionType: 'accuracy', aiResponse: 'Refunds take a day.', humanEdit: 'Refunds take 5-7 business days.' }),
    ]);

    expect(block).toBe(
      [
        'LEARNING FROM PAST CORRECTIONS:',
        'These earlier replies were corrected by support agents. Avoid repeating the same mistakes.',
        '',
        'Example 1 (tone):',
        '  Issue: Too curt',
        '  Original: Thanks.',
        '  Corrected: Thank you so much for writing in!',
        '',
        'Example 2 (accuracy):',
        '  Issue: Not specified',
        '  Original: Refunds take a day.',
        '  Corrected: Refunds take 5-7 business days.',
      ].join('\n'),
    );
  });

  it('should clip long replies to two hundred characters', () => {
    const block = buildFewShotBlock([correction('a', { aiResponse: 'x'.repeat(250) })]);

    expect(block).toContain(`  Original: ${'x'.repeat(200)}...\n`);
  });
});
