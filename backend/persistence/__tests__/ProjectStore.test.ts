import { ProjectStore } from '../ProjectStore';

const sequentialIds = (prefix: string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

const clock = (...isoTimes: string[]) => {
  let call = 0;
  return () => {
    const iso = isoTimes[Math.min(call, isoTimes.length - 1)];
    call += 1;
    return new Date(iso);
  };
};

describe('ProjectStore', () => {
  test('creates draft projects', () => {
    const store = new ProjectStore({
      createId: sequentialIds('prj'),
      now: clock('2024-03-01T12:00:00.000Z'),
    });
    const project = store.create({
      name: 'Bracket job',
      customerName: 'Test Customer',
    });

    expect(project).toEqual({
      id: 'prj-1',
      name: 'Bracket job',
      customerName: 'Test Customer',
      status: 'draft',
      createdAt: '2024-03-01T12:00:00.000Z',
    });
    expect(Object.isFrozen(project)).toBe(true);
    expect(store.get('prj-1')).toBe(project);
  });

  test('lists newest first', () => {
    const store = new ProjectStore({ createId: sequentialIds('prj') });
    store.create({ name: 'First' });
    store.create({ name: 'Second' });

    expect(store.list().map((project) => project.name)).toEqual([
      'Second',
      'First',
    ]);
  });

  test('update applies given fields and keeps the rest', () => {
    const store = new ProjectStore({
      createId: sequentialIds('prj'),
      now: clock('2024-03-01T12:00:00.000Z', '2024-03-02T08:30:00.000Z'),
    });
    const original = store.create({ name: 'Bracket job', designerName: 'D' });
    const updated = store.update('prj-1', { status: 'reported' });

    expect(updated).toEqual({
      id: 'prj-1',
      name: 'Bracket job',
      designerName: 'D',
      status: 'reported',
      createdAt: '2024-03-01T12:00:00.000Z',
      updatedAt: '2024-03-02T08:30:00.000Z',
    });
    expect(original.status).toBe('draft');
    expect(store.get('prj-1')).toBe(updated);
    expect(store.update('missing', { name: 'x' })).toBeUndefined();
  });

  test('delete reports whether the project existed', () => {
    const store = new ProjectStore({ createId: sequentialIds('prj') });
    store.create({ name: 'Bracket job' });

    expect(store.delete('prj-1')).toBe(true);
    expect(store.delete('prj-1')).toBe(false);
    expect(store.list()).toEqual([]);
  });
});
