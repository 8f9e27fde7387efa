import { makeAnalysisResult, makeGeometry } from '../../__tests__/fixtures';
import { AnalysisStore } from '../AnalysisStore';
import { PartStore } from '../PartStore';

const sequentialIds = (prefix: string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

const fixedNow = () => new Date('2024-03-01T12:00:00.000Z');

describe('AnalysisStore', () => {
  test('assigns id and timestamp on save', () => {
    const store = new AnalysisStore({
      createId: sequentialIds('a'),
      now: fixedNow,
    });
    const stored = store.save(makeAnalysisResult());

    expect(stored.id).toBe('a-1');
    expect(stored.createdAt).toBe('2024-03-01T12:00:00.000Z');
    expect(stored.recalculatedFrom).toBeUndefined();
    expect(store.get('a-1')).toBe(stored);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  test('records the recalculation source and machine subset', () => {
    const store = new AnalysisStore({ createId: sequentialIds('a') });
    const first = store.save(makeAnalysisResult());
    const machineIds = ['m-120'];
    const second = store.save(makeAnalysisResult(), {
      recalculatedFrom: first.id,
      machineIds,
    });
    machineIds.push('m-180');

    expect(second.recalculatedFrom).toBe('a-1');
    expect(second.machineIds).toEqual(['m-120']);
    expect(store.get('a-1')).toBe(first);
  });

  test('evicts the oldest entries beyond the limit', () => {
    const store = new AnalysisStore({
      maxEntries: 2,
      createId: sequentialIds('a'),
    });
    const result = makeAnalysisResult();
    store.save(result);
    store.save(result);
    store.save(result);

    expect(store.size).toBe(2);
    expect(store.get('a-1')).toBeUndefined();
    expect(store.get('a-3')).toBeDefined();
  });

  test('configure shrinks the history immediately', () => {
    const store = new AnalysisStore({ createId: sequentialIds('a') });
    const result = makeAnalysisResult();
    for (let i = 0; i < 4; i += 1) store.save(result);

    store.configure({ maxEntries: 1 });

    expect(store.size).toBe(1);
    expect(store.get('a-4')).toBeDefined();
  });

  test('lists analyses of one part, oldest first', () => {
    const store = new AnalysisStore({ createId: sequentialIds('a') });
    store.save(makeAnalysisResult('part-1'));
    store.save(makeAnalysisResult('part-2'));
    store.save(makeAnalysisResult('part-1'));

    expect(store.listForPart('part-1').map((entry) => entry.id)).toEqual([
      'a-1',
      'a-3',
    ]);
    expect(store.listForPart('part-9')).toEqual([]);
  });

  test('deletes the history of one part', () => {
    const store = new AnalysisStore({ createId: sequentialIds('a') });
    store.save(makeAnalysisResult('part-1'));
    store.save(makeAnalysisResult('part-2'));
    store.save(makeAnalysisResult('part-1'));

    expect(store.deleteForPart('part-1')).toBe(2);
    expect(store.size).toBe(1);
    expect(store.get('a-2')).toBeDefined();
    expect(store.deleteForPart('part-1')).toBe(0);
  });
});

describe('PartStore', () => {
  test('creates immutable parts with generated ids', () => {
    const store = new PartStore({ createId: sequentialIds('p'), now: fixedNow });
    const part = store.create({ name: 'Housing', geometry: makeGeometry() });

    expect(part).toEqual({
      id: 'p-1',
      name: 'Housing',
      createdAt: '2024-03-01T12:00:00.000Z',
      geometry: makeGeometry(),
    });
    expect(Object.isFrozen(part)).toBe(true);
    expect(store.get('p-1')).toBe(part);
    expect(store.list()).toHaveLength(1);
  });

  test('keeps manual dimensions when given', () => {
    const store = new PartStore({ createId: sequentialIds('p') });
    const manualDimensions = {
      lengthMm: 100,
      widthMm: 50,
      heightMm: 20,
      avgThicknessMm: 2,
    };
    const part = store.create({
      name: 'Lid',
      geometry: makeGeometry({ provenance: 'manual-estimate' }),
      manualDimensions,
    });

    expect(part.manualDimensions).toEqual(manualDimensions);
    store.reset();
    expect(store.get(part.id)).toBeUndefined();
  });

  test('groups parts by project', () => {
    const store = new PartStore({ createId: sequentialIds('p') });
    store.create({ name: 'A', projectId: 'prj-1', geometry: makeGeometry() });
    const loose = store.create({ name: 'B', geometry: makeGeometry() });
    store.create({ name: 'C', projectId: 'prj-1', geometry: makeGeometry() });

    expect(loose.projectId).toBeUndefined();
    expect(store.listForProject('prj-1').map((part) => part.id)).toEqual([
      'p-1',
      'p-3',
    ]);
    expect(store.deleteForProject('prj-1')).toEqual(['p-1', 'p-3']);
    expect(store.list()).toEqual([loose]);
  });

  test('default ids are unique', () => {
    const store = new PartStore();
    const a = store.create({ name: 'A', geometry: makeGeometry() });
    const b = store.create({ name: 'B', geometry: makeGeometry() });
    expect(a.id).not.toBe(b.id);
  });
});
