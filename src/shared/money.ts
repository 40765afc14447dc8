export const MONEY_SCALE = 2;
// NUMERIC(14, 2) columns hold 12 integer digits.
export const MONEY_MAX_INTEGER_DIGITS = 12;

const MONEY_REGEX = /^-?\d+(?:\.\d{1,2})?$/;
const MONEY_FACTOR = 10n ** BigInt(MONEY_SCALE);
const ZERO = "0.00";

export class MoneyValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MoneyValidationError";
  }
}

export const normalizeMoney = (value: string): string => {
  if (!MONEY_REGEX.test(value)) {
    throw new MoneyValidationError(
      `must be a decimal with at most ${MONEY_SCALE} fractional digits`
    );
  }

  const negative = value.startsWith("-");
  const [integerPart, decimalPart = ""] = (negative ? value.slice(1) : value).split(".");
  const normalizedInteger = integerPart.replace(/^0+(?=\d)/, "") || "0";
  const normalizedDecimal = decimalPart.padEnd(MONEY_SCALE, "0");
  const normalized = `${normalizedInteger}.${normalizedDecimal}`;
  return negative && normalized !== ZERO ? `-${normalized}` : normalized;
};

export const moneyToScaled = (value: string): bigint => {
  const normalized = normalizeMoney(value);
  const negative = normalized.startsWith("-");
  const [integerPart, decimalPart] = (negative ? normalized.slice(1) : normalized).split(".");
  const scaled = BigInt(integerPart) * MONEY_FACTOR + BigInt(decimalPart);
  return negative ? -scaled : scaled;
};

export const moneyFromScaled = (value: bigint): string => {
  const negative = value < 0n;
  const absoluteValue = negative ? -value : value;
  const integerPart = absoluteValue / MONEY_FACTOR;
  const decimalPart = absoluteValue % MONEY_FACTOR;
  const normalized = `${integerPart.toString()}.${decimalPart.toString().padStart(MONEY_SCALE, "0")}`;
  return negative ? `-${normalized}` : normalized;
};

export const compareMoney = (left: string, right: string): number => {
  const leftScaled = moneyToScaled(left);
  const rightScaled = moneyToScaled(right);
  if (leftScaled === rightScaled) {
    return 0;
  }
  return leftScaled > rightScaled ? 1 : -1;
};

export const fitsMoneyPrecision = (value: string): boolean => {
  const [integerPart] = normalizeMoney(value).replace("-", "").split(".");
  return integerPart.length <= MONEY_MAX_INTEGER_DIGITS;
};

export const isPositiveMoney = (value: string): boolean => {
  return compareMoney(value, ZERO) === 1;
};
