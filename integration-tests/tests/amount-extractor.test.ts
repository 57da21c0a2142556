/**
 * Amount Extractor Tests
 */

import { extractAmounts, parseAmount } from '@expedientes/shared';

describe('extractAmounts', () => {
  it('reads a peso amount with thousands and decimals', () => {
    expect(extractAmounts('Adeudo de $1,234.56')).toEqual([
      { value: 1234.56, currency: 'MXN', original_text: '$1,234.56' },
    ]);
  });

  it('reads prefixed and suffixed currency codes in text order', () => {
    expect(extractAmounts('USD 1,000.00 y 1.500,50 €')).toEqual([
      { value: 1000, currency: 'USD', original_text: 'USD 1,000.00' },
      { value: 1500.5, currency: 'EUR', original_text: '1.500,50 €' },
    ]);
  });

  it('reads space-grouped thousands', () => {
    expect(extractAmounts('$ 1 234,56')).toEqual([{ value: 1234.56, currency: 'MXN', original_text: '$ 1 234,56' }]);
  });

  it('discards negative and parenthesized amounts', () => {
    expect(extractAmounts('-$500 y ($200) y $-50')).toEqual([]);
  });

  it('reads keyword amounts as pesos', () => {
    expect(extractAmounts('Monto: 2,500 pesos')).toEqual([
      { value: 2500, currency: 'MXN', original_text: 'Monto: 2,500' },
    ]);
  });

  it('lets a currency match win over an overlapping keyword match', () => {
    expect(extractAmounts('Total: 500 USD')).toEqual([{ value: 500, currency: 'USD', original_text: '500 USD' }]);
  });

  it('resolves overlapping markers by currency order', () => {
    const currencies = [
      { marker: 'US$', code: 'USD' },
      { marker: '$', code: 'MXN' },
    ];
    expect(extractAmounts('US$ 100', currencies)).toEqual([
      { value: 100, currency: 'USD', original_text: 'US$ 100' },
    ]);
    expect(extractAmounts('US$ 100')).toEqual([{ value: 100, currency: 'MXN', original_text: '$ 100' }]);
  });

  it('does not read a currency code inside a word', () => {
    expect(extractAmounts('CUSDA 300')).toEqual([]);
  });

  it('returns nothing for noise', () => {
    expect(extractAmounts('$$$ ,,, ... €€')).toEqual([]);
  });
});

describe('parseAmount', () => {
  it.each([
    ['1,234.56', 1234.56],
    ['1.234,56', 1234.56],
    ['1234.5', 1234.5],
    ['1 234,56', 1234.56],
    ['1,000', 1000],
    ['12,5', 12.5],
    ['1.000.000', 1000000],
  ])('parses %s', (raw, expected) => {
    expect(parseAmount(raw)).toBe(expected);
  });

  it('returns null for text that is not a number', () => {
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('')).toBeNull();
  });
});
