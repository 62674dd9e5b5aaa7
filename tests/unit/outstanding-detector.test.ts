import { DETECTION_ERROR, OutstandingDetector, OutstandingDetectorOptions } from '../../src/outstanding/outstanding-detector';
import { buildRules, loadOutstandingRules, matchRule } from '../../src/outstanding/rules';
import { KnowledgeLookup } from '../../src/knowledge/types';
import { FakeInference, NOT_OUTSTANDING, testKnowledge } from '../helpers/fakes';

const OPTIONS: OutstandingDetectorOptions = { similarityThreshold: 0.6, llmEnabled: true, timeoutMs: 1000 };

describe('OutstandingDetector', () => {
  const rules = loadOutstandingRules();
  let fake: FakeInference;

  beforeEach(() => {
    fake = new FakeInference();
  });

  it('should report a rule match with high confidence and no model call', async () => {
    const detector = new OutstandingDetector(rules, testKnowledge(), fake, OPTIONS);

    const result = await detector.detect('maya.levin@example.com', 'I was charged after I cancelled in August');

    expect(result).toEqual({ isOutstanding: true, trigger: 'charged_after_cancel', confidence: 'high' });
    expect(fake.count()).toBe(0);
  });

  it('should report similarity to a confirmed case with medium confidence', async () => {
    const detector = new OutstandingDetector([], testKnowledge(), fake, OPTIONS);

    const result = await detector.detect(undefined, 'hives swelling after tasting');

    expect(result).toEqual({ isOutstanding: true, trigger: 'allergic_reaction', confidence: 'medium' });
    expect(fake.count()).toBe(0);
  });

  it('should ask the model when neither rules nor cases match', async () => {
    fake.on('outstanding', NOT_OUTSTANDING);
    const detector = new OutstandingDetector(rules, testKnowledge(), fake, OPTIONS);

    const result = await detector.detect(undefined, 'Can I change my delivery day?');

    expect(result).toEqual({ isOutstanding: false, trigger: 'none', confidence: 'high' });
    expect(fake.calls[0].user).toBe('Customer identified: no\nMessage:\nCan I change my delivery day?');
  });

  it('should normalize a trigger label from the model', async () => {
    fake.on('outstanding', { data: { is_outstanding: true, trigger: 'Vulnerable Customer!', confidence: 'medium' } });
    const detector = new OutstandingDetector(rules, testKnowledge(), fake, OPTIONS);

    const result = await detector.detect(undefined, 'I live alone and cannot get to the door');

    expect(result).toEqual({ isOutstanding: true, trigger: 'vulnerable_customer', confidence: 'medium' });
  });

  it('should skip the model when it is disabled', async () => {
    const detector = new OutstandingDetector(rules, testKnowledge(), fake, { ...OPTIONS, llmEnabled: false });

    const result = await detector.detect(undefined, 'Can I change my delivery day?');

    expect(result).toEqual({ isOutstanding: false, trigger: 'none', confidence: 'medium' });
    expect(fake.count()).toBe(0);
  });

  it('should report a detection error when the model fails', async () => {
    fake.on('outstanding', { error: 'timeout' });
    const detector = new OutstandingDetector(rules, testKnowledge(), fake, OPTIONS);

    expect(await detector.detect(undefined, 'Can I change my delivery day?')).toEqual(DETECTION_ERROR);
  });

  it('should report a detection error when case search throws', async () => {
    const broken: KnowledgeLookup = {
      search: async () => {
        throw new Error('index unavailable');
      },
    };
    const detector = new OutstandingDetector([], broken, fake, OPTIONS);

    expect(await detector.detect(undefined, 'Can I change my delivery day?')).toEqual(DETECTION_ERROR);
  });
});

describe('outstanding rules', () => {
  it('should return the first matching rule in file order', () => {
    const rules = buildRules({
      rules: [
        { id: 'a', trigger: 'first', patterns: ['\\bbox\\b'] },
        { id: 'b', trigger: 'second', patterns: ['\\bbox\\b'] },
      ],
    });

    expect(matchRule(rules, 'my BOX is late')?.trigger).toBe('first');
    expect(matchRule(rules, 'nothing here')).toBeUndefined();
  });

  it('should reject a malformed rule file', () => {
    expect(() => buildRules({ rules: [{ id: 'a', trigger: 'Bad Trigger', patterns: ['x'] }] })).toThrow(
      /Invalid outstanding rules/,
    );
  });
});
