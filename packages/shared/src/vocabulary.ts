/**
 * Document Vocabulary
 *
 * Header aliases, keywords and currency tables for one family of documents.
 * Injected into the extractors so other jurisdictions or document layouts can
 * be supported by passing a different vocabulary.
 */

export interface CurrencyMarker {
  /** Symbol or code as it appears in the text ("$", "USD", "€") */
  marker: string;
  /** ISO currency code reported in AmountData */
  code: string;
}

export interface DocumentVocabulary {
  /** Aliases of the "causa" section header */
  causaHeaders: string[];
  /** Aliases of the "acción solicitada" section header */
  accionHeaders: string[];
  /** Words near an expediente that indicate a judicial context */
  expedienteContextKeywords: string[];
  /** Lower-case words never accepted as an expediente */
  expedienteStopwords: string[];
  /** Currency markers in priority order */
  currencies: CurrencyMarker[];
  /** Words that introduce an amount without a currency marker */
  amountKeywords: string[];
  /** Month name (lower case, unaccented) to month number */
  months: Record<string, number>;
}

export const DEFAULT_VOCABULARY: DocumentVocabulary = {
  causaHeaders: [
    'CAUSA QUE MOTIVA EL REQUERIMIENTO',
    'CAUSA QUE MOTIVA EL REQUERIMIENTO.',
    'CAUSA DEL REQUERIMIENTO',
    'CAUSA QUE MOTIVA',
  ],
  // A bare "REQUERIMIENTO" would match inside the causa header.
  accionHeaders: [
    'ACCIÓN SOLICITADA',
    'ACCION SOLICITADA',
    'ACCIÓN REQUERIDA',
    'ACCION REQUERIDA',
    'PETICIÓN',
    'PETICION',
  ],
  expedienteContextKeywords: ['tribunal', 'juzgado', 'corte', 'judicial', 'legal'],
  expedienteStopwords: ['de', 'del', 'la', 'el', 'en', 'por', 'para'],
  currencies: [
    { marker: '$', code: 'MXN' },
    { marker: 'USD', code: 'USD' },
    { marker: '€', code: 'EUR' },
  ],
  amountKeywords: ['monto', 'importe', 'cantidad', 'total'],
  months: {
    enero: 1,
    febrero: 2,
    marzo: 3,
    abril: 4,
    mayo: 5,
    junio: 6,
    julio: 7,
    agosto: 8,
    septiembre: 9,
    setiembre: 9,
    octubre: 10,
    noviembre: 11,
    diciembre: 12,
  },
};

/**
 * Merge a partial vocabulary over the default one. Lists are replaced, not
 * concatenated.
 */
export function createVocabulary(overrides: Partial<DocumentVocabulary> = {}): DocumentVocabulary {
  return { ...DEFAULT_VOCABULARY, ...overrides };
}
