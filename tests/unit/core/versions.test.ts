import { UnknownVersionError } from '../../../src/core/errors.js';
import { deepFreeze, VersionRepository, type NewVersion } from '../../../src/core/versions.js';
import { FIXED_NOW, memoryStorage, silentLogger } from '../../helpers/fakes.js';

const draft: NewVersion = {
  parentVersionId: null,
  trip: {
    destination: 'Phuket',
    startDate: '2025-03-17',
    endDate: '2025-03-17',
    durationDays: 1,
    currency: 'THB',
    travelers: 1,
    interests: [],
  },
  days: [
    {
      id: 'day-1',
      dayNumber: 1,
      date: '2025-03-17',
      title: 'Arrival',
      summary: 'Settle in',
      activities: [{ id: 'day-1-act-1', title: 'Walk the old town', description: '', category: 'sightseeing', estimated: false }],
      weather: null,
      transitMinutes: null,
      estimated: false,
      composedBy: 'template',
    },
  ],
  bookings: { flight: null, hotel: null },
  sources: [],
};

function repository() {
  return new VersionRepository(memoryStorage(), silentLogger(), () => FIXED_NOW);
}

describe('VersionRepository', () => {
  it('numbers versions of one itinerary from 1 upwards', async () => {
    const versions = repository();
    const first = await versions.create(draft);
    const second = await versions.create({ ...draft, itineraryId: first.itineraryId, parentVersionId: first.id });

    expect(first.version).toBe(1);
    expect(first.itineraryId).toMatch(/^itin_/);
    expect(first.createdAt).toBe('2025-03-12T10:00:00.000Z');
    expect(second).toMatchObject({ version: 2, itineraryId: first.itineraryId, parentVersionId: first.id });
    expect((await versions.latest(first.itineraryId))?.id).toBe(second.id);
  });

  it('assigns distinct numbers to concurrent writes', async () => {
    const versions = repository();
    const first = await versions.create(draft);
    const made = await Promise.all(
      [1, 2, 3].map(() => versions.create({ ...draft, itineraryId: first.itineraryId, parentVersionId: first.id })),
    );
    expect(made.map((v) => v.version).sort()).toEqual([2, 3, 4]);
  });

  it('returns frozen versions', async () => {
    const versions = repository();
    const created = await versions.create(draft);
    const loaded = await versions.load(created.id);
    expect(Object.isFrozen(loaded)).toBe(true);
    expect(Object.isFrozen(loaded.days[0]?.activities[0])).toBe(true);
    expect(Reflect.set(loaded, 'version', 9)).toBe(false);
    expect(loaded.version).toBe(1);
  });

  it('rejects unknown version ids', async () => {
    await expect(repository().load('ver_missing')).rejects.toBeInstanceOf(UnknownVersionError);
  });
});

describe('deepFreeze', () => {
  it('freezes nested arrays and objects', () => {
    const value = deepFreeze({ a: { b: [1, { c: 2 }] } });
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.a.b[1])).toBe(true);
  });

  it('passes primitives through', () => {
    expect(deepFreeze(3)).toBe(3);
    expect(deepFreeze(null)).toBeNull();
  });
});
