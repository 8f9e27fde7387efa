import { makeMachine } from '../../__tests__/fixtures';
import {
  classifyMachine,
  MAX_MACHINE_RECOMMENDATIONS,
  MachineRecommender,
} from '../MachineRecommender';

describe('classifyMachine', () => {
  test.each([
    [150, 'ideal'],
    [194, 'ideal'],
    [196, 'acceptable'],
    [269, 'acceptable'],
    [271, 'borderline'],
    [136, 'acceptable'],
    [149, 'acceptable'],
    [134, 'borderline'],
  ] as const)('%dT against 150T is %s', (tonnage, band) => {
    expect(
      classifyMachine({ tonnage, maxShotVolumeCm3: 500 }, 150, 100),
    ).toBe(band);
  });

  test('insufficient shot volume excludes regardless of tonnage', () => {
    expect(
      classifyMachine({ tonnage: 160, maxShotVolumeCm3: 99 }, 150, 100),
    ).toBe('excluded');
  });
});

describe('MachineRecommender', () => {
  const recommender = new MachineRecommender();

  test('drops short-shot machines and ranks the rest by band', () => {
    const recommendations = recommender.recommend({
      requiredTonnage: 150,
      requiredShotVolumeCm3: 100,
      machines: [
        makeMachine('m-250', 250, 500),
        makeMachine('m-120', 120, 80),
        makeMachine('m-180', 180, 300),
      ],
    });

    expect(recommendations.map((r) => r.machine.id)).toEqual([
      'm-180',
      'm-250',
    ]);
    expect(recommendations[0].suitability).toBe('ideal');
    expect(recommendations[0].tonnageRatio).toBeCloseTo(1.2, 10);
    expect(recommendations[0].shotVolumeUtilization).toBeCloseTo(1 / 3, 10);
    expect(recommendations[0].notes).toEqual([
      'Good match for tonnage, shot volume, and platen size.',
    ]);
    expect(recommendations[1].suitability).toBe('acceptable');
  });

  test('an undersized machine with enough shot volume ranks last', () => {
    const recommendations = recommender.recommend({
      requiredTonnage: 150,
      requiredShotVolumeCm3: 100,
      machines: [
        makeMachine('m-120', 120, 300),
        makeMachine('m-250', 250, 500),
        makeMachine('m-180', 180, 300),
      ],
    });

    expect(recommendations.map((r) => [r.machine.id, r.suitability])).toEqual([
      ['m-180', 'ideal'],
      ['m-250', 'acceptable'],
      ['m-120', 'borderline'],
    ]);
    expect(recommendations[2].notes).toEqual([
      'Tonnage 120T is below the recommended 150T.',
    ]);
  });

  test('within a band the smaller machine comes first, then id', () => {
    const recommendations = recommender.recommend({
      requiredTonnage: 100,
      requiredShotVolumeCm3: 10,
      machines: [
        makeMachine('b-110', 110, 100),
        makeMachine('a-110', 110, 100),
        makeMachine('c-105', 105, 100),
      ],
    });

    expect(recommendations.map((r) => r.machine.id)).toEqual([
      'c-105',
      'a-110',
      'b-110',
    ]);
  });

  test(`returns at most ${MAX_MACHINE_RECOMMENDATIONS} machines`, () => {
    const machines = [100, 101, 102, 103, 104, 105, 106].map((t) =>
      makeMachine(`m-${t}`, t, 100),
    );
    const recommendations = recommender.recommend({
      requiredTonnage: 100,
      requiredShotVolumeCm3: 10,
      machines,
    });

    expect(recommendations).toHaveLength(MAX_MACHINE_RECOMMENDATIONS);
    expect(recommendations[4].machine.id).toBe('m-104');
  });

  test('a repeated machine id takes one slot', () => {
    const recommendations = recommender.recommend({
      requiredTonnage: 120,
      requiredShotVolumeCm3: 10,
      machines: [
        makeMachine('m-120', 120, 100),
        makeMachine('m-120', 120, 100),
        makeMachine('m-120', 120, 100),
        makeMachine('m-150', 150, 100),
      ],
    });

    expect(recommendations.map((r) => r.machine.id)).toEqual([
      'm-120',
      'm-150',
    ]);
  });

  test('returns an empty list when nothing can shoot the part', () => {
    expect(
      recommender.recommend({
        requiredTonnage: 100,
        requiredShotVolumeCm3: 1000,
        machines: [makeMachine('m-100', 100, 500)],
      }),
    ).toEqual([]);
  });

  test('notes oversizing and shot volume headroom', () => {
    const [recommendation] = recommender.recommend({
      requiredTonnage: 150,
      requiredShotVolumeCm3: 100,
      machines: [makeMachine('m-300', 300, 120)],
    });

    expect(recommendation.suitability).toBe('borderline');
    expect(recommendation.notes).toEqual([
      'Machine may be oversized for this part.',
      'Shot volume near limit (100.0 of 120 cm³).',
    ]);
  });

  test('notes platen and tie-bar limits from the part footprint', () => {
    const [recommendation] = recommender.recommend({
      requiredTonnage: 150,
      requiredShotVolumeCm3: 100,
      machines: [
        makeMachine('m-160', 160, 500, {
          platenMm: { width: 500, height: 500 },
          tieBarSpacingMm: { horizontal: 350, vertical: 350 },
        }),
      ],
      partFootprintMm: { width: 400, height: 300 },
    });

    expect(recommendation.notes).toEqual([
      'Platen size may be tight for the mold.',
      'Part footprint exceeds tie-bar spacing.',
    ]);
  });

  test('a footprint that fits rotated produces no fit notes', () => {
    const [recommendation] = recommender.recommend({
      requiredTonnage: 150,
      requiredShotVolumeCm3: 100,
      machines: [
        makeMachine('m-160', 160, 500, {
          platenMm: { width: 700, height: 500 },
          tieBarSpacingMm: { horizontal: 450, vertical: 350 },
        }),
      ],
      partFootprintMm: { width: 300, height: 400 },
    });

    expect(recommendation.notes).toEqual([
      'Good match for tonnage, shot volume, and platen size.',
    ]);
  });
});
