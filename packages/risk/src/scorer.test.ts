import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  ConfigError,
  DEFAULT_TAG_ENTRIES,
  InMemoryDataset,
  TagRegistry,
  createDataset,
  silentLogger,
  type DataElement,
  type Logger,
  type TagMetadata,
} from '@phikit/core';
import {
  RiskLevel,
  RiskScorer,
  calculateTagRisk,
  formatRiskScore,
  riskLevelFor,
  scoreDataset,
} from './scorer.js';
import { DEFAULT_RISK_WEIGHTS } from './weights.js';

function entry(tag: string, riskLevel: number, isPhi = true): TagMetadata {
  return { tag, name: tag, vr: 'LO', vm: '1', isPhi, riskLevel };
}

// PatientName: 5 * name(1.0) = 5, PatientBirthDate: 4 * date(0.8) = 3.2
const smallRegistry = new TagRegistry([entry('PatientName', 5), entry('PatientBirthDate', 4)]);

describe('risk:scorer', () => {
  describe('Aggregate Score', () => {
    it('empty dataset scores 0% / LOW', () => {
      const score = scoreDataset(new InMemoryDataset());
      expect(score.totalScore).toBe(0);
      expect(score.riskPercentage).toBe(0);
      expect(score.riskLevel).toBe(RiskLevel.LOW);
      expect(score.tagScores).toEqual({});
    });

    it('max score counts every registered PHI tag regardless of presence', () => {
      const score = scoreDataset(new InMemoryDataset());
      expect(score.maxScore).toBeCloseTo(30.4, 10);
    });

    it('fully identifiable dataset scores 100% / CRITICAL', () => {
      const ds = new InMemoryDataset();
      for (const meta of DEFAULT_TAG_ENTRIES) {
        ds.add(meta.tag, meta.vr, `value-of-${meta.tag}`);
      }
      const score = scoreDataset(ds);
      expect(score.riskPercentage).toBe(100);
      expect(score.riskLevel).toBe(RiskLevel.CRITICAL);
      expect(score.tagScores.PatientSex).toBeUndefined();
    });

    it('partial exposure is proportional', () => {
      const scorer = new RiskScorer({ registry: smallRegistry, logger: silentLogger });
      const score = scorer.score(createDataset([['PatientName', 'PN', 'Doe^Jane']]));

      expect(score.totalScore).toBe(5);
      expect(score.maxScore).toBeCloseTo(8.2, 10);
      expect(score.riskPercentage).toBeCloseTo((5 / 8.2) * 100, 10);
      expect(score.riskLevel).toBe(RiskLevel.HIGH);
    });

    it('no registered PHI tags yields 100%', () => {
      const scorer = new RiskScorer({ registry: new TagRegistry([entry('PatientSex', 1, false)]) });
      const score = scorer.score(createDataset([['PatientSex', 'CS', 'F']]));
      expect(score.maxScore).toBe(0);
      expect(score.riskPercentage).toBe(100);
    });

    it('all-zero weights make even an empty dataset CRITICAL', () => {
      const zeroed = Object.fromEntries(Object.keys(DEFAULT_RISK_WEIGHTS).map((k) => [k, 0]));
      const scorer = new RiskScorer({ registry: smallRegistry, weights: zeroed, logger: silentLogger });
      const score = scorer.score(new InMemoryDataset());
      expect(score.maxScore).toBe(0);
      expect(score.riskPercentage).toBe(100);
      expect(score.riskLevel).toBe(RiskLevel.CRITICAL);
    });

    it('breakdown explains zero-risk present tags too', () => {
      const scorer = new RiskScorer({ registry: smallRegistry, logger: silentLogger });
      const score = scorer.score(
        createDataset([
          ['PatientName', 'PN', ''],
          ['PatientBirthDate', 'DA', 'none'],
        ])
      );

      expect(score.tagScores).toEqual({ PatientName: 0, PatientBirthDate: 0 });
      expect(score.tagBreakdown.PatientBirthDate).toEqual({
        risk: 0,
        baseRisk: 4,
        weight: 0.8,
        maxRisk: 3.2,
        category: 'date',
      });
    });

    it('private tags are not scored', () => {
      const scorer = new RiskScorer({
        registry: new TagRegistry([entry('(0009,1001)', 5), entry('PatientName', 5)]),
        logger: silentLogger,
      });
      const score = scorer.score(
        createDataset([
          ['(0009,1001)', 'LO', 'Doe^Jane'],
          ['PatientName', 'PN', 'Doe^Jane'],
        ])
      );
      expect(score.maxScore).toBe(5);
      expect(Object.keys(score.tagScores)).toEqual(['PatientName']);
    });

    it('a failing field is logged and skipped', () => {
      class FlakyDataset extends InMemoryDataset {
        override get(tag: string): DataElement {
          if (tag === 'PatientName') throw new Error('corrupt element');
          return super.get(tag);
        }
      }
      const warn = vi.fn();
      const logger: Logger = { ...silentLogger, warn };
      const scorer = new RiskScorer({ registry: smallRegistry, logger });

      const ds = new FlakyDataset([
        ['PatientName', 'PN', 'Doe^Jane'],
        ['PatientBirthDate', 'DA', '19800101'],
      ]);
      const score = scorer.score(ds);

      expect(score.tagScores).toEqual({ PatientBirthDate: 3.2 });
      expect(warn).toHaveBeenCalledWith('Could not score tag PatientName', {
        tag: 'PatientName',
        error: 'corrupt element',
      });
    });

    it('a presence check that throws is logged and skipped', () => {
      class UnindexedDataset extends InMemoryDataset {
        override contains(tag: string): boolean {
          if (tag === 'PatientName') throw new Error('index corrupted');
          return super.contains(tag);
        }
      }
      const warn = vi.fn();
      const scorer = new RiskScorer({ registry: smallRegistry, logger: { ...silentLogger, warn } });

      const score = scorer.score(
        new UnindexedDataset([
          ['PatientName', 'PN', 'Doe^Jane'],
          ['PatientBirthDate', 'DA', '19800101'],
        ])
      );

      expect(score.tagScores).toEqual({ PatientBirthDate: 3.2 });
      expect(score.maxScore).toBeCloseTo(8.2, 10);
      expect(warn).toHaveBeenCalledWith('Could not score tag PatientName', {
        tag: 'PatientName',
        error: 'index corrupted',
      });
    });
  });

  describe('Risk Levels', () => {
    it('uses inclusive lower bounds', () => {
      expect(riskLevelFor(0)).toBe(RiskLevel.LOW);
      expect(riskLevelFor(24.99)).toBe(RiskLevel.LOW);
      expect(riskLevelFor(25)).toBe(RiskLevel.MEDIUM);
      expect(riskLevelFor(49.99)).toBe(RiskLevel.MEDIUM);
      expect(riskLevelFor(50)).toBe(RiskLevel.HIGH);
      expect(riskLevelFor(75)).toBe(RiskLevel.CRITICAL);
      expect(riskLevelFor(100)).toBe(RiskLevel.CRITICAL);
    });
  });

  describe('Per-Tag Risk', () => {
    it('placeholder value scores exactly 0 regardless of weight', () => {
      expect(calculateTagRisk('PatientName', 'ANONYMIZED').risk).toBe(0);
      const heavy = new RiskScorer().withWeights({ name: 3 });
      expect(heavy.calculateTagRisk('PatientName', 'ANONYMIZED').risk).toBe(0);
      expect(heavy.calculateTagRisk('PatientName', 'Anonymous').risk).toBe(0);
    });

    it('hash-like value scores 20% of the weighted maximum', () => {
      const result = calculateTagRisk('PatientID', 'a'.repeat(32));
      expect(result.maxRisk).toBe(5);
      expect(result.risk).toBe(5 * 0.2);
    });

    it('uppercase hex is not treated as hashed', () => {
      expect(calculateTagRisk('PatientID', 'ABCDEF0123456789').risk).toBe(5);
    });

    it('hex of other lengths is not treated as hashed', () => {
      expect(calculateTagRisk('PatientID', 'abcdef012345678').risk).toBe(5);
    });

    it('unknown tags score 0 with the unknown category', () => {
      expect(calculateTagRisk('(0009,1001)', 'Doe^Jane')).toEqual({
        risk: 0,
        baseRisk: 0,
        weight: 1,
        maxRisk: 0,
        category: 'unknown',
      });
    });

    it('registered tags without a category keep weight 1.0', () => {
      expect(calculateTagRisk('PatientSex', 'M')).toEqual({
        risk: 1,
        baseRisk: 1,
        weight: 1,
        maxRisk: 1,
        category: 'unknown',
      });
    });

    it('stays within [0, maxRisk] for every registered tag and awkward value', () => {
      const values = ['', '   ', 'x'.repeat(10_000), 'Jöhn^Dœ 山田', 'N/A', 'f'.repeat(64), '0'];
      for (const meta of DEFAULT_TAG_ENTRIES) {
        for (const value of values) {
          const result = calculateTagRisk(meta.tag, value);
          expect(result.risk).toBeGreaterThanOrEqual(0);
          expect(result.risk).toBeLessThanOrEqual(result.maxRisk);
        }
      }
    });
  });

  describe('Weight Tuning', () => {
    it('withWeights returns a new scorer and leaves the original alone', () => {
      const base = new RiskScorer({ registry: smallRegistry, logger: silentLogger });
      const tuned = base.withWeights({ date: 0 });
      const ds = createDataset([['PatientName', 'PN', 'Doe^Jane']]);

      expect(tuned.score(ds).maxScore).toBe(5);
      expect(tuned.score(ds).riskPercentage).toBe(100);
      expect(base.score(ds).maxScore).toBeCloseTo(8.2, 10);
      expect(base.weights.date).toBe(0.8);
    });

    it('does not mutate the default table', () => {
      new RiskScorer().withWeights({ uid: 2 });
      expect(DEFAULT_RISK_WEIGHTS.uid).toBe(0.7);
    });

    it('rejects negative or non-finite weights', () => {
      const scorer = new RiskScorer();
      expect(() => scorer.withWeights({ date: -1 })).toThrow('Invalid risk weight overrides');
      expect(() => scorer.withWeights({ date: Number.POSITIVE_INFINITY })).toThrow(
        'Invalid risk weight overrides'
      );
    });

    it('validates a full weight table passed to the constructor', () => {
      expect(() => new RiskScorer({ weights: { ...DEFAULT_RISK_WEIGHTS, name: -1 } })).toThrow(ConfigError);
      expect(() => new RiskScorer({ weights: { ...DEFAULT_RISK_WEIGHTS, date: Number.NaN } })).toThrow(
        'Invalid risk weight overrides'
      );
    });

    it('fromConfig applies configured overrides', () => {
      const scorer = RiskScorer.fromConfig({
        hash: { salt: '', algorithm: 'sha256', length: 16 },
        riskWeights: { time: 1 },
        logging: { level: 'info' },
      });
      expect(scorer.weights.time).toBe(1);
      expect(scorer.weights.date).toBe(0.8);
    });
  });

  describe('Logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
      delete process.env.LOG_LEVEL;
    });

    it('fromConfig logs at the configured level', () => {
      process.env.LOG_LEVEL = 'error';
      const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const scorer = RiskScorer.fromConfig(
        { hash: { salt: '', algorithm: 'sha256', length: 16 }, riskWeights: {}, logging: { level: 'debug' } },
        { registry: smallRegistry }
      );

      scorer.score(createDataset([['PatientName', 'PN', 'Doe^Jane']]));

      expect(stdout).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(stdout.mock.calls[0][0]))).toMatchObject({
        level: 'debug',
        ns: 'risk-scorer',
        msg: 'PHI tag PatientBirthDate not in dataset',
        data: { tag: 'PatientBirthDate' },
      });
    });

    it('an injected logger wins over the configured level', () => {
      const debug = vi.fn();
      const scorer = RiskScorer.fromConfig(
        { hash: { salt: '', algorithm: 'sha256', length: 16 }, riskWeights: {}, logging: { level: 'error' } },
        { registry: smallRegistry, logger: { ...silentLogger, debug } }
      );

      scorer.score(new InMemoryDataset());

      expect(debug).toHaveBeenCalledTimes(2);
    });
  });

  describe('Rendering', () => {
    it('lists contributions highest first', () => {
      const scorer = new RiskScorer({ registry: smallRegistry, logger: silentLogger });
      const score = scorer.score(
        createDataset([
          ['PatientBirthDate', 'DA', '19800101'],
          ['PatientName', 'PN', 'Doe^Jane'],
        ])
      );

      expect(formatRiskScore(score, smallRegistry).split('\n')).toEqual([
        '='.repeat(50),
        'PHI RISK ASSESSMENT',
        '='.repeat(50),
        'Risk Level: CRITICAL',
        'Risk Score: 8.2 / 8.2',
        'Risk Percentage: 100.0%',
        '',
        'Tag-level Risks:',
        '  PatientName (PatientName) [cat=name, base=5.0, weight=1.00]: 5.0',
        '  PatientBirthDate (PatientBirthDate) [cat=date, base=4.0, weight=0.80]: 3.2',
        '='.repeat(50),
      ]);
    });
  });
});
