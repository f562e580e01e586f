import { describe, it, expect } from 'vitest';
import type { CandidateRecord } from '../advisor/candidateTypes.js';
import { buildComparisonReport, buildFeatureMatrix } from '../advisor/compare/buildComparisonReport.js';
import { addToComparison, findCandidate, removeFromComparison } from '../advisor/compare/comparisonSet.js';
import { loadFallbackCatalog } from '../advisor/normalize/staticCatalog.js';

function catalogCar(model: string): CandidateRecord {
  const car = loadFallbackCatalog().candidates.find((candidate) => candidate.model === model);
  if (!car) {
    throw new Error(`missing catalog car ${model}`);
  }
  return car;
}

function candidate(overrides: Partial<CandidateRecord>): CandidateRecord {
  return {
    brand: 'Tata',
    model: 'Punch',
    price: '₹6L - ₹10L',
    why_suitable: 'Compact and easy',
    key_features: [],
    pros: [],
    cons: [],
    ...overrides,
  };
}

describe('comparison set', () => {
  it('adds a new candidate', () => {
    const { comparison, added } = addToComparison([], catalogCar('Swift'));
    expect(added).toBe(true);
    expect(comparison).toHaveLength(1);
  });

  it('refuses a duplicate by brand and model', () => {
    const start = [catalogCar('Swift')];
    const result = addToComparison(start, { ...catalogCar('Swift'), price: '₹7L' });
    expect(result.added).toBe(false);
    expect(result.comparison).toBe(start);
  });

  it('removes by key without touching the input', () => {
    const start = [catalogCar('Swift'), catalogCar('City')];
    expect(removeFromComparison(start, 'Honda City').map((car) => car.model)).toEqual(['Swift']);
    expect(start).toHaveLength(2);
  });

  it('finds candidates case-insensitively', () => {
    const cars = loadFallbackCatalog().candidates;
    expect(findCandidate(cars, 'toyota', 'INNOVA CRYSTA')?.model).toBe('Innova Crysta');
    expect(findCandidate(cars, 'Kia', 'Sonet')).toBeUndefined();
  });
});

describe('buildFeatureMatrix', () => {
  it('marks presence against the sorted feature union', () => {
    const matrix = buildFeatureMatrix([
      candidate({ model: 'A', key_features: ['Camera', 'ABS'] }),
      candidate({ model: 'B', key_features: ['ABS'] }),
    ]);
    expect(matrix).toEqual({
      features: ['ABS', 'Camera'],
      presence: {
        'Tata A': [true, true],
        'Tata B': [true, false],
      },
    });
  });
});

describe('buildComparisonReport', () => {
  it('builds rows, series and highlights', () => {
    const report = buildComparisonReport([catalogCar('Swift'), catalogCar('City'), catalogCar('Innova Crysta')]);

    expect(report.count).toBe(3);
    expect(report.matrix[0]).toEqual({
      key: 'Maruti Suzuki Swift',
      values: {
        'Model': 'Swift',
        'Brand': 'Maruti Suzuki',
        'Price Range': '₹6L - ₹9L',
        'Fuel Efficiency': '22-24 kmpl',
        'Safety Rating': '4 stars',
        'Maintenance Cost': 'Low',
        'Senior Friendly Rating': '9/10',
        'Key Features Count': 5,
      },
    });
    expect(report.radar.map((series) => series.label)).toEqual([
      'Maruti Suzuki Swift',
      'Honda City',
      'Toyota Innova Crysta',
    ]);
    expect(report.prices.map((bar) => bar.tier)).toEqual(['budget', 'mid-range', 'premium']);
    expect(report.highlights).toEqual({
      mostSeniorFriendly: { key: 'Maruti Suzuki Swift', brand: 'Maruti Suzuki', model: 'Swift', value: '9/10' },
      mostFeatures: { key: 'Maruti Suzuki Swift', brand: 'Maruti Suzuki', model: 'Swift', value: 5 },
      mostAffordable: { key: 'Maruti Suzuki Swift', brand: 'Maruti Suzuki', model: 'Swift', value: '₹6L - ₹9L' },
      lowestMaintenance: { key: 'Maruti Suzuki Swift', brand: 'Maruti Suzuki', model: 'Swift', value: 'Low' },
    });
  });

  it('fills missing attributes with N/A and ranks unrated maintenance last', () => {
    const report = buildComparisonReport([
      candidate({ model: 'Bare', price: '₹9L' }),
      candidate({ model: 'Rated', price: '₹12L', maintenance_cost: 'High', key_features: ['ABS'] }),
    ]);
    expect(report.matrix[0].values['Fuel Efficiency']).toBe('N/A');
    expect(report.matrix[0].values['Senior Friendly Rating']).toBe('N/A');
    expect(report.highlights.lowestMaintenance?.model).toBe('Rated');
    expect(report.highlights.mostAffordable?.model).toBe('Bare');
    expect(report.highlights.mostFeatures?.model).toBe('Rated');
    expect(report.commonFeatures).toEqual([]);
  });

  it('is empty for an empty shortlist', () => {
    const report = buildComparisonReport([]);
    expect(report.count).toBe(0);
    expect(report.matrix).toEqual([]);
    expect(report.features).toEqual({ features: [], presence: {} });
    expect(report.highlights).toEqual({
      mostSeniorFriendly: undefined,
      mostFeatures: undefined,
      mostAffordable: undefined,
      lowestMaintenance: undefined,
    });
  });
});
