export interface RawCard {
  id: number;
  clientId: number;
  creditLimit: string; // as found in the source, e.g. "$24,295"
  cardType: string;
  cardBrand: string;
}
