/**
 * Tests for check-digit validators: CPF, CNPJ, Luhn
 */
import { describe, it, expect } from 'vitest';
import { isValidCpf, isValidCnpj, luhnCheck, mod11CheckDigit } from '../../src/detection/checksums.js';
import { buildCard, buildCnpj, buildCpf, bumpLastDigit, digitStream, take } from './documentNumbers.js';

describe('checksums', () => {
  // ── mod11CheckDigit ─────────────────────────────────────────

  describe('mod11CheckDigit', () => {
    it('should map remainders producing 10 or 11 to 0', () => {
      // 1*10 + 2*9 + ... + 9*2 = 210, 210 % 11 = 1, 11 - 1 = 10 -> 0
      expect(mod11CheckDigit('123456789', [10, 9, 8, 7, 6, 5, 4, 3, 2])).toBe(0);
    });

    it('should return 11 - (sum mod 11) otherwise', () => {
      // 255 % 11 = 2 -> 9
      expect(mod11CheckDigit('1234567890', [11, 10, 9, 8, 7, 6, 5, 4, 3, 2])).toBe(9);
    });
  });

  // ── CPF ─────────────────────────────────────────────────────

  describe('isValidCpf', () => {
    it('should accept a formatted valid CPF', () => {
      expect(isValidCpf('123.456.789-09')).toBe(true);
    });

    it('should accept an unformatted valid CPF', () => {
      expect(isValidCpf('52998224725')).toBe(true);
    });

    it('should reject a CPF with a wrong check digit', () => {
      expect(isValidCpf('123.456.789-00')).toBe(false);
    });

    it('should reject all-equal digit sequences even when check digits line up', () => {
      expect(isValidCpf('111.111.111-11')).toBe(false);
      expect(isValidCpf('00000000000')).toBe(false);
    });

    it('should reject wrong lengths', () => {
      expect(isValidCpf('1234567890')).toBe(false);
      expect(isValidCpf('123456789012')).toBe(false);
    });

    it('should accept every generated CPF and reject it once the last digit changes', () => {
      const stream = digitStream(42);
      let checked = 0;
      while (checked < 200) {
        const base = take(stream, 9);
        if (base.every(d => d === base[0])) continue;
        const cpf = buildCpf(base);
        expect(isValidCpf(cpf)).toBe(true);
        expect(isValidCpf(bumpLastDigit(cpf))).toBe(false);
        checked++;
      }
    });
  });

  // ── CNPJ ────────────────────────────────────────────────────

  describe('isValidCnpj', () => {
    it('should accept a formatted valid CNPJ', () => {
      expect(isValidCnpj('11.222.333/0001-81')).toBe(true);
    });

    it('should reject a CNPJ with a wrong check digit', () => {
      expect(isValidCnpj('11.222.333/0001-80')).toBe(false);
    });

    it('should reject all-zero CNPJ', () => {
      expect(isValidCnpj('00.000.000/0000-00')).toBe(false);
    });

    it('should accept every generated CNPJ and reject it once the last digit changes', () => {
      const stream = digitStream(7);
      let checked = 0;
      while (checked < 200) {
        const base = take(stream, 12);
        if (base.every(d => d === base[0])) continue;
        const cnpj = buildCnpj(base);
        expect(isValidCnpj(cnpj)).toBe(true);
        expect(isValidCnpj(bumpLastDigit(cnpj))).toBe(false);
        checked++;
      }
    });
  });

  // ── Luhn ────────────────────────────────────────────────────

  describe('luhnCheck', () => {
    it('should accept Luhn-valid card numbers with or without separators', () => {
      expect(luhnCheck('4111 1111 1111 1111')).toBe(true);
      expect(luhnCheck('4111-1111-1111-1111')).toBe(true);
      expect(luhnCheck('5500000000000004')).toBe(true);
    });

    it('should reject Luhn-invalid numbers', () => {
      expect(luhnCheck('4111 1111 1111 1112')).toBe(false);
    });

    it('should accept every generated card number and reject it once the last digit changes', () => {
      const stream = digitStream(99);
      for (let i = 0; i < 200; i++) {
        const card = buildCard(take(stream, 15));
        expect(luhnCheck(card)).toBe(true);
        expect(luhnCheck(bumpLastDigit(card))).toBe(false);
      }
    });

    it('should reject numbers outside 13-19 digits', () => {
      expect(luhnCheck('0000 0000 00')).toBe(false);
    });
  });
});
