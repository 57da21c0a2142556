/**
 * Field Aggregation and Record Constructor Tests
 */

import {
  createAmountData,
  createExtractedFields,
  createVocabulary,
  DEFAULT_VOCABULARY,
  EMPTY_FIELDS,
  extractStructuredFields,
  scaleConfidence,
} from '@expedientes/shared';

const DOCUMENT = [
  'JUZGADO TERCERO DE DISTRITO',
  'No. Expediente EXP-2024-001',
  'Fecha: 15 de octubre de 2023',
  'CAUSA QUE MOTIVA EL REQUERIMIENTO: investigación por fraude , monto de $1,500,000.00',
  'ACCIÓN SOLICITADA: congelar cuentas  bancarias.',
].join('\n');

describe('createVocabulary', () => {
  const text = 'Fecha: 3 de janvier de 2024';

  it('replaces only the given lists', () => {
    const vocabulary = createVocabulary({ months: { janvier: 1 } });

    expect(vocabulary.months).toEqual({ janvier: 1 });
    expect(vocabulary.currencies).toBe(DEFAULT_VOCABULARY.currencies);
    expect(vocabulary.causaHeaders).toBe(DEFAULT_VOCABULARY.causaHeaders);
  });

  it('drives extraction with an injected vocabulary', () => {
    const vocabulary = createVocabulary({ months: { ...DEFAULT_VOCABULARY.months, janvier: 1 } });

    expect(extractStructuredFields(text, 90, vocabulary).fechas).toEqual(['2024-01-03']);
    expect(extractStructuredFields(text, 90).fechas).toEqual([]);
  });
});

describe('extractStructuredFields', () => {
  it('extracts every field from a complete document', () => {
    expect(extractStructuredFields(DOCUMENT, 92)).toEqual({
      expediente: 'EXP-2024-001',
      causa: 'investigación por fraude, monto de $1,500,000.00',
      accion_solicitada: 'congelar cuentas bancarias.',
      fechas: ['2023-10-15'],
      montos: [{ value: 1500000, currency: 'MXN', original_text: '$1,500,000.00' }],
      ocr_confidence: 0.92,
    });
  });

  it('returns empty fields for empty text', () => {
    expect(extractStructuredFields('', 0)).toEqual({ ...EMPTY_FIELDS, ocr_confidence: 0 });
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(extractStructuredFields(DOCUMENT, 92))).toBe(true);
  });
});

describe('scaleConfidence', () => {
  it('scales 0..100 to 0..1 with three decimals', () => {
    expect(scaleConfidence(87.456)).toBe(0.875);
    expect(scaleConfidence(150)).toBe(1);
    expect(scaleConfidence(-3)).toBe(0);
    expect(scaleConfidence(NaN)).toBeNull();
  });
});

describe('createExtractedFields', () => {
  it('drops dates that are not canonical calendar days', () => {
    const fields = createExtractedFields({ fechas: ['2023-10-15', 'invalid-date', '2023-12-01'] });
    expect(fields.fechas).toEqual(['2023-10-15', '2023-12-01']);
  });

  it('drops malformed amounts', () => {
    const fields = createExtractedFields({
      montos: [
        { value: -5, currency: 'MXN', original_text: '-5' },
        { value: 5, currency: 'MXN', original_text: '5' },
      ],
    });
    expect(fields.montos).toEqual([{ value: 5, currency: 'MXN', original_text: '5' }]);
  });

  it('defaults every field to empty', () => {
    expect(createExtractedFields()).toEqual({
      expediente: null,
      causa: null,
      accion_solicitada: null,
      fechas: [],
      montos: [],
      ocr_confidence: null,
    });
  });

  it('nulls a non-finite confidence', () => {
    expect(createExtractedFields({ ocr_confidence: Infinity }).ocr_confidence).toBeNull();
  });
});

describe('createAmountData', () => {
  it('builds an amount in pesos by default', () => {
    expect(createAmountData(10)).toEqual({ value: 10, currency: 'MXN', original_text: '' });
  });

  it('returns null for negative or non-finite values', () => {
    expect(createAmountData(-1)).toBeNull();
    expect(createAmountData(NaN)).toBeNull();
  });
});
