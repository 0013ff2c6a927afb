import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { DataSourceError } from '../../../../src/domain/errors/DataSourceError.js';
import { CsvCardSource } from '../../../../src/infrastructure/adapters/source/CsvCardSource.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../../fixtures/${name}`, import.meta.url));

const loadError = async (source: CsvCardSource): Promise<DataSourceError> => {
  try {
    await source.loadCards();
  } catch (error) {
    if (error instanceof DataSourceError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected loadCards to fail');
};

describe('CsvCardSource', () => {
  it('reads card rows in file order', async () => {
    const cards = await new CsvCardSource(fixture('cards.csv')).loadCards();

    expect(cards).toEqual([
      { id: 10, clientId: 5, creditLimit: '$2,000.00', cardType: 'Credit', cardBrand: 'Visa' },
      { id: 21, clientId: 7, creditLimit: '$500', cardType: 'Debit', cardBrand: 'Mastercard' },
      { id: 32, clientId: 5, creditLimit: 'not-a-number', cardType: 'Prepaid Card', cardBrand: 'Amex' },
    ]);
  });

  it('reports a missing file as unavailable', async () => {
    const location = fixture('missing.csv');
    const error = await loadError(new CsvCardSource(location));

    expect(error.kind).toBe('SOURCE_UNAVAILABLE');
    expect(error.source).toBe(location);
    expect(error.message).toBe(`CSV file not found or unreadable: ${location}`);
  });

  it('reports a file without rows as empty', async () => {
    const error = await loadError(new CsvCardSource(fixture('cards-header-only.csv')));

    expect(error.kind).toBe('SOURCE_EMPTY');
  });

  it('reports the offending row when an id is not an integer', async () => {
    const error = await loadError(new CsvCardSource(fixture('cards-bad-id.csv')));

    expect(error.kind).toBe('SOURCE_INVALID');
    expect(error.message).toBe('CSV row 3 is invalid: id Expected an integer');
  });
});
