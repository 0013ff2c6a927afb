const currencySymbols = /[$,]/g;
const plainDecimal = /^\d+(\.\d+)?$/;

export const DEFAULT_CREDIT_LIMIT = 1000;

export const parseCreditLimit = (input: string | undefined | null): number => {
  if (input === undefined || input === null) {
    return DEFAULT_CREDIT_LIMIT;
  }

  const cleaned = input.replace(currencySymbols, '').trim();
  return plainDecimal.test(cleaned) ? Number(cleaned) : DEFAULT_CREDIT_LIMIT;
};
