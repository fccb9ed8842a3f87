/**
 * Check-digit validators for CPF, CNPJ and payment card numbers.
 */

const CPF_WEIGHTS_1 = [10, 9, 8, 7, 6, 5, 4, 3, 2];
const CPF_WEIGHTS_2 = [11, 10, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_WEIGHTS_1 = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_WEIGHTS_2 = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

function allSameDigit(digits: string): boolean {
  return /^(\d)\1*$/.test(digits);
}

/**
 * 11 - (weighted sum mod 11), with results of 10 and 11 mapped to 0.
 */
export function mod11CheckDigit(digits: string, weights: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) {
    sum += Number(digits[i]) * (weights[i] ?? 0);
  }
  const digit = 11 - (sum % 11);
  return digit >= 10 ? 0 : digit;
}

/**
 * Validate a CPF, formatted or not.
 */
export function isValidCpf(value: string): boolean {
  const digits = digitsOnly(value);
  if (digits.length !== 11 || allSameDigit(digits)) return false;
  return (
    mod11CheckDigit(digits, CPF_WEIGHTS_1) === Number(digits[9]) &&
    mod11CheckDigit(digits, CPF_WEIGHTS_2) === Number(digits[10])
  );
}

/**
 * Validate a CNPJ, formatted or not.
 */
export function isValidCnpj(value: string): boolean {
  const digits = digitsOnly(value);
  if (digits.length !== 14 || allSameDigit(digits)) return false;
  return (
    mod11CheckDigit(digits, CNPJ_WEIGHTS_1) === Number(digits[12]) &&
    mod11CheckDigit(digits, CNPJ_WEIGHTS_2) === Number(digits[13])
  );
}

export function luhnCheck(cardNumber: string): boolean {
  const digits = digitsOnly(cardNumber);
  if (digits.length < 13 || digits.length > 19) return false;
  let sum = 0;
  let alternate = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let n = Number(digits[i]);
    if (alternate) {
      n *= 2;
      if (n > 9) n -= 9;
    }
    sum += n;
    alternate = !alternate;
  }
  return sum % 10 === 0;
}
