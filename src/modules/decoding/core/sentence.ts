const DIGITS_RE = /^\d+$/;

const SPECIAL_MONTHS: Readonly<Record<string, number>> = { T: 10, E: 11 };

const plural = (n: number, unit: string): string => `${String(n)} ${unit}${n === 1 ? '' : 's'}`;

const parseMonths = (months: string): number => {
  const special = SPECIAL_MONTHS[months];
  if (special !== undefined) return special;
  return DIGITS_RE.test(months) ? Number(months) : 0;
};

/**
 * Renders a sentence term from its card encoding.
 *
 * Years `999` mean a term of a century or more; years starting `92` or `95`
 * mark transfers and indeterminate terms; months `&&&` mark death or an
 * indeterminate sentence. Months `T` and `E` stand for 10 and 11.
 */
export const decodeSentence = (rawYears: string, rawMonths = ''): string => {
  const years = rawYears.trim();
  const months = rawMonths.trim();

  if (months === '&&&') return 'Death/Indeterminate';
  if (years === '999') return '100+ years';
  if (years.startsWith('92') || years.startsWith('95')) return 'Transfer/Indeterminate';
  if (!DIGITS_RE.test(years)) return '';

  const y = Number(years);
  const m = parseMonths(months);
  const parts: string[] = [];

  if (y > 0) parts.push(plural(y, 'yr'));
  if (m > 0) parts.push(plural(m, 'mo'));

  return parts.length > 0 ? parts.join(', ') : '0 months';
};
