import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataSourceError } from '../../../domain/errors/DataSourceError.js';
import type { RawCard } from '../../../domain/entities/RawCard.js';
import type { CardSourcePort } from '../../../application/ports/CardSourcePort.js';

const integerColumn = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform(Number);

export const CardRecordSchema = z.object({
  id: integerColumn,
  client_id: integerColumn,
  credit_limit: z.string().default(''),
  card_type: z.string().default(''),
  card_brand: z.string().default(''),
});

export type CardRecordDTO = z.infer<typeof CardRecordSchema>;

export class CsvCardSource implements CardSourcePort {
  constructor(readonly location: string) {}

  async loadCards(): Promise<RawCard[]> {
    let content: string;

    try {
      content = await readFile(this.location, 'utf8');
    } catch (error) {
      throw new DataSourceError('SOURCE_UNAVAILABLE', `CSV file not found or unreadable: ${this.location}`, this.location, {
        cause: error,
      });
    }

    let records: unknown;
    try {
      records = parse(content, { columns: true, skip_empty_lines: true, trim: true, bom: true });
    } catch (error) {
      throw new DataSourceError(
        'SOURCE_UNAVAILABLE',
        `CSV file is invalid: ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.location,
        { cause: error },
      );
    }

    const parsed = z.array(CardRecordSchema).safeParse(records);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DataSourceError(
        'SOURCE_INVALID',
        `CSV row ${Number(issue?.path[0] ?? 0) + 2} is invalid: ${issue?.path.slice(1).join('.')} ${issue?.message}`,
        this.location,
      );
    }

    if (parsed.data.length === 0) {
      throw new DataSourceError('SOURCE_EMPTY', `CSV file is empty: ${this.location}`, this.location);
    }

    return parsed.data.map((record) => ({
      id: record.id,
      clientId: record.client_id,
      creditLimit: record.credit_limit,
      cardType: record.card_type,
      cardBrand: record.card_brand,
    }));
  }
}
