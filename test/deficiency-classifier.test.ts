import { DeficiencyClassifier, classifyValue } from '../src/soil-health-engine/deficiency-classifier';
import { NutrientRangeTable } from '../src/soil-health-engine/nutrient-range-table';
import { ReadingNormalizer } from '../src/soil-health-engine/reading-normalizer';
import { loadEngineConfig } from '../src/shared/config/engine-config';
import { DeficiencyStatus, GrowthStage, SoilParameter } from '../src/types';
import { MissingRangeError, ConfigurationError } from '../src/shared/utils/errors';
import { sample } from './fixtures';

const range = { minOptimal: 150, maxOptimal: 250, criticalLow: 50, criticalHigh: 450 };

describe('classifyValue', () => {
  it('has zero severity on the optimal boundaries', () => {
    expect(classifyValue(150, range)).toEqual({ status: DeficiencyStatus.OPTIMAL, severity: 0 });
    expect(classifyValue(250, range)).toEqual({ status: DeficiencyStatus.OPTIMAL, severity: 0 });
  });

  it('reaches full severity at the critical boundaries', () => {
    expect(classifyValue(50, range)).toEqual({ status: DeficiencyStatus.DEFICIENT, severity: 1 });
    expect(classifyValue(450, range)).toEqual({ status: DeficiencyStatus.EXCESS, severity: 1 });
  });

  it('clips severity beyond the critical boundaries', () => {
    expect(classifyValue(0, range).severity).toBe(1);
    expect(classifyValue(900, range).severity).toBe(1);
  });

  it('interpolates linearly between the boundaries', () => {
    expect(classifyValue(100, range)).toEqual({ status: DeficiencyStatus.DEFICIENT, severity: 0.5 });
    expect(classifyValue(350, range)).toEqual({ status: DeficiencyStatus.EXCESS, severity: 0.5 });
  });

  it('grows monotonically as the value moves away from optimal', () => {
    const severities = [150, 130, 110, 90, 70, 50].map(value => classifyValue(value, range).severity);
    for (let i = 1; i < severities.length; i++) {
      expect(severities[i]).toBeGreaterThan(severities[i - 1]);
    }
  });
});

describe('DeficiencyClassifier', () => {
  const config = loadEngineConfig();
  const classifier = new DeficiencyClassifier(new NutrientRangeTable(config.ranges));
  const normalizer = new ReadingNormalizer();

  it('returns one result per parameter in fixed order', () => {
    const results = classifier.classify(normalizer.normalize(sample()), GrowthStage.FLOWERING);

    expect(results.map(result => result.parameter)).toEqual([
      SoilParameter.NITROGEN,
      SoilParameter.PHOSPHORUS,
      SoilParameter.POTASSIUM,
      SoilParameter.PH,
      SoilParameter.MOISTURE,
      SoilParameter.TEMPERATURE
    ]);
    expect(results.every(result => result.status === DeficiencyStatus.OPTIMAL)).toBe(true);
  });

  it('uses the range of the requested stage', () => {
    // 185 mg/kg K is optimal before planting but short during flowering (200-330)
    const reading = normalizer.normalize(sample({ potassium: 185 }));

    const prePlanting = classifier.classify(reading, GrowthStage.PRE_PLANTING);
    const flowering = classifier.classify(reading, GrowthStage.FLOWERING);

    expect(prePlanting[2]).toEqual({ parameter: SoilParameter.POTASSIUM, status: DeficiencyStatus.OPTIMAL, severity: 0, value: 185 });
    expect(flowering[2].status).toBe(DeficiencyStatus.DEFICIENT);
    expect(flowering[2].severity).toBeCloseTo(15 / 130, 10);
  });
});

describe('NutrientRangeTable', () => {
  const { ranges } = loadEngineConfig();

  it('holds a row for every parameter at every stage', () => {
    const table = new NutrientRangeTable(ranges);
    expect(table.size).toBe(24);
    expect(() => table.assertComplete()).not.toThrow();
  });

  it('raises MissingRangeError for a gap', () => {
    const table = new NutrientRangeTable(
      ranges.filter(row => !(row.parameter === SoilParameter.PH && row.stage === GrowthStage.MATURITY))
    );

    expect(() => table.lookup(SoilParameter.PH, GrowthStage.MATURITY)).toThrow(MissingRangeError);
    expect(() => table.assertComplete()).toThrow('No nutrient range configured for ph at stage maturity');
  });

  it('rejects duplicate rows', () => {
    expect(() => new NutrientRangeTable([...ranges, ranges[0]])).toThrow(ConfigurationError);
  });
});
