/**
 * Unit Tests for RarityFilter
 *
 * Window bounds, the strict threshold comparison and the empty-window rule.
 */

import { RarityFilter } from '../../../src/services/rarityFilter';
import { Run } from '../../../src/types/grooming';
import { InMemoryGroomingStore, testResort } from '../../helpers/inMemoryGroomingStore';

jest.mock('../../../src/lib/logger');

describe('RarityFilter', () => {
  const resort = testResort();
  let store: InMemoryGroomingStore;
  let filter: RarityFilter;

  const runNamed = async (name: string): Promise<Run> => {
    const run = await store.getRunByName(resort.resortId, name);
    if (!run) throw new Error(`seeded run ${name} missing`);
    return run;
  };

  beforeEach(() => {
    store = new InMemoryGroomingStore();
    store.addResort(resort);
    filter = new RarityFilter(store, { threshold: 0.2, windowDays: 7 });
  });

  describe('constructor', () => {
    it.each([0, 1, -0.5, 1.5])('should reject threshold %p', (threshold) => {
      expect(() => new RarityFilter(store, { threshold, windowDays: 7 })).toThrow(RangeError);
    });

    it.each([0, -1, 2.5])('should reject window of %p days', (windowDays) => {
      expect(() => new RarityFilter(store, { threshold: 0.2, windowDays })).toThrow(RangeError);
    });
  });

  describe('computeNotableRuns', () => {
    it('should return nothing when the window holds no prior reports', async () => {
      // Arrange
      store.seedReport(resort.resortId, '2024-01-15', ['Alpha', 'Bravo']);
      const runs = [await runNamed('Alpha'), await runNamed('Bravo')];

      // Act
      const notable = await filter.computeNotableRuns(resort, '2024-01-15', runs);

      // Assert
      expect(notable).toEqual([]);
    });

    it('should treat a ratio equal to the threshold as not notable', async () => {
      // Arrange: five prior reports, Alpha groomed in exactly one (1/5 = 0.2)
      store.seedReport(resort.resortId, '2024-01-10', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-11', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-12', ['Alpha', 'Charlie']);
      store.seedReport(resort.resortId, '2024-01-13', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-14', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-15', ['Alpha', 'Bravo']);
      const runs = [await runNamed('Alpha'), await runNamed('Bravo')];

      // Act
      const notable = await filter.computeNotableRuns(resort, '2024-01-15', runs);

      // Assert
      expect(notable.map((run) => run.name)).toEqual(['Bravo']);
    });

    it('should ignore reports on or before date minus (window + 1) days', async () => {
      // 2024-01-07 is outside a 7-day window ending 2024-01-15
      store.seedReport(resort.resortId, '2024-01-07', ['Alpha']);
      store.seedReport(resort.resortId, '2024-01-08', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-15', ['Alpha']);

      const notable = await filter.computeNotableRuns(resort, '2024-01-15', [await runNamed('Alpha')]);

      expect(notable.map((run) => run.name)).toEqual(['Alpha']);
    });

    it('should never count the current day in its own window', async () => {
      // Four prior reports without Alpha: 0/4 is notable, 1/5 would not be
      store.seedReport(resort.resortId, '2024-01-11', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-12', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-13', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-14', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-15', ['Alpha', 'Charlie']);

      const notable = await filter.computeNotableRuns(resort, '2024-01-15', [
        await runNamed('Alpha'),
        await runNamed('Charlie'),
      ]);

      expect(notable.map((run) => run.name)).toEqual(['Alpha']);
    });

    it('should count a run at most once per report', async () => {
      store.seedReport(resort.resortId, '2024-01-13', ['Charlie']);
      store.seedReport(resort.resortId, '2024-01-14', ['Alpha']);
      const alpha = await runNamed('Alpha');
      const report = store.reports.get(`${resort.resortId}#2024-01-14`);
      if (!report) throw new Error('seeded report missing');
      store.reports.set(`${resort.resortId}#2024-01-14`, { ...report, runIds: [alpha.runId, alpha.runId] });

      // Alpha: 1/2 = 0.5 with a 0.6 threshold is notable; double counting would make it 1.0
      const lenient = new RarityFilter(store, { threshold: 0.6, windowDays: 7 });
      const notable = await lenient.computeNotableRuns(resort, '2024-01-15', [alpha]);

      expect(notable).toEqual([alpha]);
    });
  });
});
