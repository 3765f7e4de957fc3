import {
  RecommendationEngine,
  detectDepletion,
  orderDeficiencies
} from '../src/soil-health-engine/recommendation-engine';
import { loadEngineConfig } from '../src/shared/config/engine-config';
import { ConfigurationError } from '../src/shared/utils/errors';
import {
  DeficiencyResult,
  DeficiencyStatus,
  FertilizerEntry,
  GrowthStage,
  HealthScoreRecord,
  RecommendationAction,
  SoilParameter
} from '../src/types';
import { PARAMETER_ORDER } from '../src/shared/config/constants';

const ALL_STAGES = [GrowthStage.PRE_PLANTING, GrowthStage.VEGETATIVE, GrowthStage.FLOWERING, GrowthStage.MATURITY];
const TIMESTAMP = new Date('2024-06-01T06:00:00.000Z');

function deficiencies(severities: Partial<Record<SoilParameter, number>>): DeficiencyResult[] {
  return PARAMETER_ORDER.map(parameter => {
    const severity = severities[parameter] ?? 0;
    return {
      parameter,
      status: severity > 0 ? DeficiencyStatus.DEFICIENT : DeficiencyStatus.OPTIMAL,
      severity,
      value: 0
    };
  });
}

function historyRecord(score: number, stage: GrowthStage, minutes: number): HealthScoreRecord {
  return {
    fieldId: 'field-1',
    timestamp: new Date(TIMESTAMP.getTime() + minutes * 60000),
    score,
    stage,
    contributingDeficiencies: []
  };
}

describe('RecommendationEngine', () => {
  const config = loadEngineConfig();
  const engine = new RecommendationEngine(config.fertilizers, config.dosage);

  function recommend(severities: Partial<Record<SoilParameter, number>>, stage = GrowthStage.PRE_PLANTING) {
    return engine.recommend({ fieldId: 'field-1', timestamp: TIMESTAMP, stage, deficiencies: deficiencies(severities) });
  }

  it('maintains the current regimen when nothing is deficient', () => {
    expect(recommend({})).toEqual({
      fieldId: 'field-1',
      timestamp: TIMESTAMP,
      stage: GrowthStage.PRE_PLANTING,
      action: RecommendationAction.MAINTAIN,
      fertilizerType: 'Maintain current regimen',
      quantity: 0,
      unit: 'kg/ha',
      rationale: [],
      warnings: []
    });
  });

  it('ignores excess readings when choosing a fertilizer', () => {
    const results = deficiencies({});
    results[0] = { parameter: SoilParameter.NITROGEN, status: DeficiencyStatus.EXCESS, severity: 0.8, value: 600 };

    const recommendation = engine.recommend({ fieldId: 'field-1', timestamp: TIMESTAMP, stage: GrowthStage.VEGETATIVE, deficiencies: results });
    expect(recommendation.action).toBe(RecommendationAction.MAINTAIN);
  });

  it('recommends the narrowest nitrogen source for a nitrogen-only deficit', () => {
    const recommendation = recommend({ [SoilParameter.NITROGEN]: 0.5 });

    expect(recommendation.action).toBe(RecommendationAction.APPLY);
    expect(recommendation.fertilizerType).toBe('Urea');
    expect(recommendation.quantity).toBe(90);
    expect(recommendation.rationale).toEqual(['nitrogen']);
  });

  it('prefers a compound covering every deficiency', () => {
    const recommendation = recommend({
      [SoilParameter.NITROGEN]: 0.8,
      [SoilParameter.PHOSPHORUS]: 0.5,
      [SoilParameter.POTASSIUM]: 0.2
    });

    expect(recommendation.fertilizerType).toBe('NPK 19:19:19');
    expect(recommendation.quantity).toBe(200);
    expect(recommendation.rationale).toEqual(['nitrogen', 'phosphorus', 'potassium']);
  });

  it('falls back to the compound covering the most severe pair', () => {
    const recommendation = recommend({
      [SoilParameter.NITROGEN]: 0.8,
      [SoilParameter.PHOSPHORUS]: 0.5,
      [SoilParameter.MOISTURE]: 0.3
    });

    expect(recommendation.fertilizerType).toBe('Diammonium Phosphate (DAP)');
    expect(recommendation.quantity).toBe(160);
    expect(recommendation.rationale).toEqual(['nitrogen', 'phosphorus']);
  });

  it('only considers fertilizers approved for the stage', () => {
    const severities = { [SoilParameter.NITROGEN]: 0.5, [SoilParameter.POTASSIUM]: 0.5 };

    expect(recommend(severities, GrowthStage.PRE_PLANTING).fertilizerType).toBe('NPK 19:19:19');
    expect(recommend(severities, GrowthStage.VEGETATIVE).fertilizerType).toBe('NPK 15:0:15');
    expect(recommend(severities, GrowthStage.VEGETATIVE).quantity).toBe(110);
  });

  it('breaks equal severities by nutrient priority', () => {
    const ordered = orderDeficiencies(deficiencies({
      [SoilParameter.TEMPERATURE]: 0.4,
      [SoilParameter.POTASSIUM]: 0.4,
      [SoilParameter.PH]: 0.6
    }));

    expect(ordered.map(result => result.parameter)).toEqual([
      SoilParameter.PH,
      SoilParameter.POTASSIUM,
      SoilParameter.TEMPERATURE
    ]);
  });

  it('breaks equally narrow candidates by table order', () => {
    const fertilizers: FertilizerEntry[] = [
      ...config.fertilizers.filter(entry => entry.type !== 'Urea'),
      { type: 'Ammonium Sulphate', corrects: [SoilParameter.NITROGEN], stages: ALL_STAGES, dosePerSeverityUnit: 100 },
      { type: 'Calcium Nitrate', corrects: [SoilParameter.NITROGEN], stages: ALL_STAGES, dosePerSeverityUnit: 100 }
    ];
    const tieEngine = new RecommendationEngine(fertilizers, config.dosage);

    const recommendation = tieEngine.recommend({
      fieldId: 'field-1',
      timestamp: TIMESTAMP,
      stage: GrowthStage.FLOWERING,
      deficiencies: deficiencies({ [SoilParameter.NITROGEN]: 0.3 })
    });

    expect(recommendation.fertilizerType).toBe('Ammonium Sulphate');
    expect(recommendation.quantity).toBe(30);
  });

  describe('dosing', () => {
    it('rounds to the application step', () => {
      // 0.33 × 180 = 59.4 → 60
      expect(recommend({ [SoilParameter.NITROGEN]: 0.33 }).quantity).toBe(60);
    });

    it('raises small doses to the minimum effective dose', () => {
      expect(recommend({ [SoilParameter.NITROGEN]: 0.01 }).quantity).toBe(10);
    });

    it('caps doses at the maximum safe dose with a warning', () => {
      const recommendation = recommend({ [SoilParameter.PHOSPHORUS]: 0.9 });

      expect(recommendation.fertilizerType).toBe('Single Super Phosphate');
      expect(recommendation.quantity).toBe(250);
      expect(recommendation.warnings).toEqual([
        {
          code: 'OverDoseClampedWarning',
          fertilizerType: 'Single Super Phosphate',
          requestedQuantity: 270,
          appliedQuantity: 250,
          unit: 'kg/ha',
          message: 'Single Super Phosphate dose of 270 kg/ha exceeds the maximum safe dose; capped at 250 kg/ha'
        }
      ]);
    });

    it('does not warn at exactly the maximum safe dose', () => {
      const recommendation = recommend({ [SoilParameter.NITROGEN]: 1, [SoilParameter.PHOSPHORUS]: 1, [SoilParameter.POTASSIUM]: 1 });
      expect(recommendation.quantity).toBe(250);
      expect(recommendation.warnings).toEqual([]);
    });

    it('applies per-fertilizer dose bounds', () => {
      const recommendation = recommend({ [SoilParameter.PH]: 0.1 });

      expect(recommendation.fertilizerType).toBe('Agricultural Lime');
      expect(recommendation.quantity).toBe(100);
    });
  });

  it('is deterministic for identical inputs', () => {
    const severities = { [SoilParameter.POTASSIUM]: 0.7, [SoilParameter.MOISTURE]: 0.2 };
    expect(recommend(severities, GrowthStage.FLOWERING)).toEqual(recommend(severities, GrowthStage.FLOWERING));
  });

  it('flags post-growth depletion when the score fell between post-planting records', () => {
    const recommendation = engine.recommend({
      fieldId: 'field-1',
      timestamp: TIMESTAMP,
      stage: GrowthStage.VEGETATIVE,
      deficiencies: deficiencies({ [SoilParameter.NITROGEN]: 0.5 }),
      history: [historyRecord(90, GrowthStage.VEGETATIVE, 0), historyRecord(87.5, GrowthStage.VEGETATIVE, 10)]
    });

    expect(recommendation.rationale).toEqual(['nitrogen', 'post-growth nutrient depletion']);
  });

  it('rejects a fertilizer table with uncovered parameters', () => {
    const withoutLime = config.fertilizers.filter(entry => entry.type !== 'Agricultural Lime');
    expect(() => new RecommendationEngine(withoutLime, config.dosage)).toThrow(ConfigurationError);
    expect(() => new RecommendationEngine(withoutLime, config.dosage)).toThrow('no fertilizer corrects ph at stage pre_planting');
  });

  it('rejects dose bounds that fall between application steps', () => {
    const fertilizers = config.fertilizers.map(entry =>
      entry.type === 'Agricultural Lime' ? { ...entry, doseBounds: { minEffective: 100, maxSafe: 498 } } : entry
    );
    expect(() => new RecommendationEngine(fertilizers, config.dosage)).toThrow(
      'Agricultural Lime doseBounds.maxSafe must be a multiple of the application step 5'
    );
    expect(() => new RecommendationEngine(config.fertilizers, { ...config.dosage, minEffective: 12 })).toThrow(
      'dosage.minEffective must be a multiple of the application step 5'
    );
  });

  it('rejects a non-positive application step', () => {
    expect(() => new RecommendationEngine(config.fertilizers, { ...config.dosage, applicationStep: 0 })).toThrow(
      'dosage.applicationStep must be positive'
    );
  });
});

describe('detectDepletion', () => {
  it('needs at least two records', () => {
    expect(detectDepletion([])).toBe(false);
    expect(detectDepletion([historyRecord(80, GrowthStage.FLOWERING, 0)])).toBe(false);
  });

  it('ignores declines that involve pre-planting records', () => {
    expect(detectDepletion([
      historyRecord(90, GrowthStage.PRE_PLANTING, 0),
      historyRecord(80, GrowthStage.VEGETATIVE, 10)
    ])).toBe(false);
  });

  it('looks only at the last two records', () => {
    expect(detectDepletion([
      historyRecord(90, GrowthStage.VEGETATIVE, 0),
      historyRecord(80, GrowthStage.VEGETATIVE, 10),
      historyRecord(85, GrowthStage.VEGETATIVE, 20)
    ])).toBe(false);
  });
});
