import type { RawCard } from '../../domain/entities/RawCard.js';

export interface CardSourcePort {
  /** Human readable location of the records, reported as the data source. */
  readonly location: string;
  loadCards(): Promise<RawCard[]>;
}
