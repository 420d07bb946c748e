import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import type { ProformaMetadata } from '../domain/types.js';

export interface ProformaDocument {
  file_name: string;
  content_type: string;
  /** Base64 file content. */
  content: string;
}

/**
 * Opaque extraction service (OCR + language model, or anything else). Its
 * output is untrusted JSON.
 */
export interface DocumentExtractionService {
  extractProforma(document: ProformaDocument): Promise<unknown>;
}

export interface ExtractedProforma {
  metadata: ProformaMetadata;
  /** Item candidates, not yet validated. */
  items: unknown[];
}

const SUPPORTED_CONTENT_TYPES = ['application/pdf', 'image/jpeg', 'image/jpg', 'image/png'];

const looseNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value.replace(/,/g, '')) : value),
  z.unknown(),
);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value).trim() || null));

const candidateSchema = z
  .object({
    name: z.unknown().optional(),
    description: z.unknown().optional(),
    quantity: looseNumber,
    unit_price: looseNumber,
  })
  .passthrough();

const extractionSchema = z.object({
  vendor_name: optionalText,
  invoice_number: optionalText,
  date: optionalText,
  payment_terms: optionalText,
  items: z.array(candidateSchema, { invalid_type_error: 'items must be a list' }),
});

export function assertSupportedDocument(document: ProformaDocument): void {
  if (!SUPPORTED_CONTENT_TYPES.includes(document.content_type)) {
    throw new ValidationError(
      `Unsupported proforma content type ${document.content_type}`,
      'document.content_type',
      { supported: SUPPORTED_CONTENT_TYPES },
    );
  }
  if (document.content.trim() === '') {
    throw new ValidationError('Proforma document is empty', 'document.content');
  }
}

/**
 * Maps extraction output to request item candidates. Only the shape is
 * checked here; quantities and prices go through the same item validation as
 * manual entry.
 */
export function parseExtractedProforma(raw: unknown): ExtractedProforma {
  const parsed = extractionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Extracted proforma is malformed: ${issue.path.join('.') || 'root'} ${issue.message}`,
      issue.path.length > 0 ? issue.path.join('.') : 'document',
    );
  }

  const { vendor_name, invoice_number, date, payment_terms, items } = parsed.data;
  return {
    metadata: {
      vendor_name,
      quote_number: invoice_number,
      quote_date: date,
      payment_terms,
    },
    items: items.map((candidate) => ({
      description:
        typeof candidate.description === 'string' && candidate.description.trim() !== ''
          ? candidate.description
          : candidate.name,
      quantity: candidate.quantity,
      unit_price: candidate.unit_price,
    })),
  };
}
