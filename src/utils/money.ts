// Exact decimal arithmetic for prices and totals, carried in integer cents.

export interface ParsedDecimal {
  negative: boolean;
  whole: string;
  fraction: string;
}

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

export const parseDecimal = (raw: string): ParsedDecimal | null => {
  const match = DECIMAL_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }
  return {
    negative: match[1] === "-",
    whole: match[2],
    fraction: match[3] ?? "",
  };
};

export const isZero = (value: ParsedDecimal): boolean =>
  /^0+$/.test(value.whole) && /^0*$/.test(value.fraction);

/** Significant fraction digits, ignoring trailing zeros. */
export const fractionDigits = (value: ParsedDecimal): number =>
  value.fraction.replace(/0+$/, "").length;

/** Whole-part digits, ignoring leading zeros. */
export const wholeDigits = (value: ParsedDecimal): number =>
  value.whole.replace(/^0+/, "").length;

export const toCents = (raw: string): number => {
  const parsed = parseDecimal(raw);
  if (!parsed || fractionDigits(parsed) > 2) {
    throw new Error(`Not a two-place decimal: "${raw}"`);
  }
  const cents =
    Number(parsed.whole) * 100 + Number(parsed.fraction.slice(0, 2).padEnd(2, "0"));
  return parsed.negative ? -cents : cents;
};

export const formatCents = (cents: number): string => {
  const sign = cents < 0 ? "-" : "";
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, "0");
  return `${sign}${whole}.${fraction}`;
};

export const normalizeDecimal = (raw: string): string => formatCents(toCents(raw));

export const sumDecimals = (values: string[]): string =>
  formatCents(values.reduce((total, value) => total + toCents(value), 0));
