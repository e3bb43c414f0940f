import { PairAggregatorService } from './pair-aggregator.service';
import { polishPair } from './dedup-policy';
import { CoverageTier, type CandidatePair } from '../../types';
import { createTestSettings } from '../../../testing/test-settings';

function candidate(
  question: string,
  answer: string,
  chunkIndex = 0,
): CandidatePair {
  return { question, answer, chunkIndex };
}

describe('PairAggregatorService', () => {
  let aggregator: PairAggregatorService;

  beforeEach(() => {
    aggregator = new PairAggregatorService(createTestSettings());
  });

  describe('aggregate', () => {
    it('drops near-duplicate questions at maximum coverage', () => {
      const pairs = aggregator.aggregate(
        [
          candidate('What is the capital of France?', 'Paris'),
          candidate('What is the capital city of France?', 'Paris'),
        ],
        10,
        CoverageTier.Maximum,
      );

      expect(pairs).toEqual([
        { question: 'What is the capital of France?', answer: 'Paris' },
      ]);
    });

    it('keeps both near-duplicates under the strict policy', () => {
      const pairs = aggregator.aggregate(
        [
          candidate('What is the capital of France?', 'Paris city'),
          candidate('What is the capital city of France?', 'Paris city'),
          candidate('What is the capital of France?', 'Lutetia'),
        ],
        10,
        CoverageTier.Medium,
      );

      expect(pairs.map((pair) => pair.question)).toEqual([
        'What is the capital of France?',
        'What is the capital city of France?',
      ]);
    });

    it('applies the strict length filters', () => {
      const pairs = aggregator.aggregate(
        [
          candidate('Short one?', 'A long enough answer'),
          candidate('Long enough question here?', 'Tiny'),
          candidate('Long enough question here?', 'Sizable'),
        ],
        10,
        CoverageTier.Minimal,
      );

      expect(pairs).toEqual([
        { question: 'Long enough question here?', answer: 'Sizable' },
      ]);
    });

    it('applies the lenient length filters', () => {
      const pairs = aggregator.aggregate(
        [
          candidate('Hi', 'Because'),
          candidate('Who?', 'Me'),
          candidate('Who?', 'Ada'),
        ],
        10,
        CoverageTier.Maximum,
      );

      expect(pairs).toEqual([{ question: 'Who?', answer: 'Ada' }]);
    });

    it('orders by chunk index before deduplicating', () => {
      const pairs = aggregator.aggregate(
        [
          candidate('Which river flows through Vilnius?', 'The Neris', 1),
          candidate('Which river flows through Vilnius?', 'The Vilnia', 0),
        ],
        10,
        CoverageTier.Medium,
      );

      expect(pairs).toEqual([
        { question: 'Which river flows through Vilnius?', answer: 'The Vilnia' },
      ]);
    });

    it('polishes pairs and truncates to the target', () => {
      const pairs = aggregator.aggregate(
        [
          candidate('  Name the largest ocean on Earth.  ', '  The Pacific  '),
          candidate('Name the longest river in Africa', 'The Nile river'),
          candidate('Name the highest mountain on Earth?', 'Mount Everest'),
        ],
        2,
        CoverageTier.Medium,
      );

      expect(pairs).toEqual([
        { question: 'Name the largest ocean on Earth?', answer: 'The Pacific' },
        { question: 'Name the longest river in Africa?', answer: 'The Nile river' },
      ]);
    });

    it('is a fixed point when run on its own output', () => {
      const candidates = [
        candidate('What is the capital of France', 'Paris'),
        candidate('What is the capital city of France?', 'Paris'),
        candidate('Who wrote the novel War and Peace?', 'Leo Tolstoy'),
        candidate('In which year did the Berlin Wall fall?', '1989'),
      ];

      for (const tier of [CoverageTier.Medium, CoverageTier.Maximum]) {
        const once = aggregator.aggregate(candidates, 10, tier);
        const twice = aggregator.aggregate(
          once.map((pair) => ({ ...pair, chunkIndex: 0 })),
          10,
          tier,
        );
        expect(twice).toEqual(once);
      }
    });
  });

  describe('merge', () => {
    it('appends only new supplementary pairs behind the kept ones', () => {
      const kept = [
        { question: 'What is the capital of France?', answer: 'Paris' },
      ];

      const merged = aggregator.merge(
        kept,
        [
          candidate('What is the capital city of France?', 'Paris', 0),
          candidate('Who wrote the novel War and Peace?', 'Leo Tolstoy', 0),
        ],
        10,
        CoverageTier.Maximum,
      );

      expect(merged).toEqual([
        { question: 'What is the capital of France?', answer: 'Paris' },
        { question: 'Who wrote the novel War and Peace?', answer: 'Leo Tolstoy' },
      ]);
    });
  });

  describe('planSupplement', () => {
    it('requests the missing pairs below 70% at medium coverage', () => {
      expect(
        aggregator.planSupplement(13, 20, CoverageTier.Medium, 'Focus on people.'),
      ).toEqual({
        focus: 'missed',
        requestCount: 7,
        instruction:
          'Focus on people. Extract important content that may have been missed',
      });
    });

    it('does not supplement at or above the threshold', () => {
      expect(aggregator.planSupplement(14, 20, CoverageTier.Medium)).toBeNull();
      expect(aggregator.planSupplement(25, 20, CoverageTier.Minimal)).toBeNull();
    });

    it('requests at most 50 fact-focused pairs below 80% at maximum coverage', () => {
      expect(aggregator.planSupplement(100, 1000, CoverageTier.Maximum)).toEqual({
        focus: 'facts',
        requestCount: 50,
        instruction: undefined,
      });
      expect(aggregator.planSupplement(35, 50, CoverageTier.Maximum)).toEqual({
        focus: 'facts',
        requestCount: 15,
        instruction: undefined,
      });
      expect(aggregator.planSupplement(40, 50, CoverageTier.Maximum)).toBeNull();
    });

    it('uses configured thresholds', () => {
      const eager = new PairAggregatorService(
        createTestSettings({ aggregation: { supplementThreshold: 1 } }),
      );

      expect(eager.planSupplement(19, 20, CoverageTier.Minimal)).toEqual({
        focus: 'missed',
        requestCount: 1,
        instruction: 'Extract important content that may have been missed',
      });
    });
  });
});

describe('polishPair', () => {
  it('is idempotent', () => {
    const once = polishPair({ question: ' Define entropy... ', answer: ' Disorder ' });

    expect(once).toEqual({ question: 'Define entropy?', answer: 'Disorder' });
    expect(polishPair(once)).toEqual(once);
  });
});
