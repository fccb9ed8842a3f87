/**
 * Phone validator collaborator
 * Region-aware phone grammar check backed by libphonenumber-js.
 */
import { getCountries, parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js/max';

export interface PhoneValidation {
  valid: boolean;
  /** E.164 form, present when valid. */
  canonical?: string;
}

export interface PhoneValidator {
  validate(candidate: string, region: string): PhoneValidation;
}

export function toCountryCode(region: string): CountryCode | undefined {
  const upper = region.toUpperCase();
  return getCountries().find(code => code === upper);
}

export class LibPhoneNumberValidator implements PhoneValidator {
  validate(candidate: string, region: string): PhoneValidation {
    const country = toCountryCode(region);
    if (!country) {
      throw new Error(`Unsupported phone region: ${region}`);
    }
    const parsed = parsePhoneNumberFromString(candidate, country);
    if (!parsed || !parsed.isValid()) {
      return { valid: false };
    }
    return { valid: true, canonical: parsed.number };
  }
}

export const defaultPhoneValidator: PhoneValidator = new LibPhoneNumberValidator();
