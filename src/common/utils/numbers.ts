const integerRegex = /^\d+$/;
const decimalRegex = /^-?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;

export const parseInteger = (raw: string | null | undefined): number | null => {
  if (!raw) return null;
  const cleaned = raw.trim();
  return integerRegex.test(cleaned) ? Number.parseInt(cleaned, 10) : null;
};

// Thousands separators are the only thing stripped; anything else is rejected.
export const parseDecimal = (raw: string | null | undefined): number | null => {
  if (!raw) return null;
  const cleaned = raw.trim();
  if (!decimalRegex.test(cleaned)) {
    return null;
  }
  const parsed = Number.parseFloat(cleaned.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
};
