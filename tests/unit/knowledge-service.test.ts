import { KnowledgeService, scoreText, tokenize } from '../../src/knowledge/knowledge-service';
import { testKnowledge } from '../helpers/fakes';

describe('KnowledgeService', () => {
  it('should rank entries by term overlap with a tag bonus', async () => {
    const results = await testKnowledge().search('subscription', 'pause my box');

    expect(results).toEqual([
      {
        id: 'sub-1',
        partition: 'subscription',
        title: 'Pausing',
        content: 'Subscriptions can be paused for one to three months.',
        tags: ['pause', 'skip'],
        score: 0.75,
      },
    ]);
  });

  it('should drop entries below the minimum score', async () => {
    expect(await testKnowledge().search('subscription', 'cheese refund')).toEqual([]);
  });

  it('should return nothing for a missing partition', async () => {
    expect(await testKnowledge().search('warranty', 'pause')).toEqual([]);
  });

  it('should refuse partition names that could leave the directory', async () => {
    expect(await testKnowledge().search('../config', 'pause')).toEqual([]);
  });

  it('should load partitions from the knowledge directory', async () => {
    const results = await new KnowledgeService().search('subscription', 'pause for two months');

    expect(results[0].id).toBe('sub-002');
  });
});

describe('knowledge scoring', () => {
  it('should drop stop words', () => {
    expect(tokenize('Can I pause my box, please?')).toEqual(['pause', 'box']);
  });

  it('should keep every word when all are stop words', () => {
    expect(tokenize('help me please')).toEqual(['help', 'me', 'please']);
  });

  it('should cap the score at one', () => {
    expect(scoreText('pause skip', ['pause', 'skip'], 'pause skip')).toBe(1);
    expect(scoreText('pause', ['pause', 'skip'])).toBe(0.5);
  });
});
