/**
 * Document Type Registry
 *
 * Closed enumeration of document type labels plus the canonical field-name
 * registry the query classifier embeds in its instruction prompt.
 * The field registry itself lives in data/field-registry.json.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Document type enumeration
 */
export enum DocumentType {
  IDENTITY_DOCUMENT = 'IDENTITY_DOCUMENT',
  EDUCATION_DOCUMENT = 'EDUCATION_DOCUMENT',
  FINANCIAL_BILL = 'FINANCIAL_BILL',
  BANK_STATEMENT = 'BANK_STATEMENT',
  SALARY_SLIP = 'SALARY_SLIP',
  LEGAL_DOCUMENT = 'LEGAL_DOCUMENT',
  GOVERNMENT_DOCUMENT = 'GOVERNMENT_DOCUMENT',
  MEDICAL_DOCUMENT = 'MEDICAL_DOCUMENT',
  OTHER = 'OTHER',
}

export const DOCUMENT_TYPES: readonly DocumentType[] = Object.values(DocumentType);

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

const fieldFamilySchema = z.object({
  family: z.string().min(1),
  documentType: z.nativeEnum(DocumentType),
  fields: z.array(z.string().min(1)).min(1),
});

const fieldRegistrySchema = z.object({
  families: z.array(fieldFamilySchema).min(1),
  fieldExamples: z.array(
    z.object({
      question: z.string().min(1),
      fields: z.array(z.string().min(1)).min(1),
    })
  ),
  documentTypeExamples: z.array(
    z.object({
      question: z.string().min(1),
      documentTypes: z.array(z.nativeEnum(DocumentType)).nullable(),
    })
  ),
});

export type FieldFamily = z.infer<typeof fieldFamilySchema>;
export type FieldRegistry = z.infer<typeof fieldRegistrySchema>;

const DEFAULT_REGISTRY_PATH = join(__dirname, '../../../data/field-registry.json');

let cachedRegistry: FieldRegistry | null = null;

/**
 * Parse and validate a field registry document.
 * @throws {z.ZodError} If the document does not match the registry shape
 */
export function parseFieldRegistry(raw: unknown): FieldRegistry {
  return fieldRegistrySchema.parse(raw);
}

/**
 * Load the field registry from disk (cached after the first read)
 */
export function loadFieldRegistry(path: string = DEFAULT_REGISTRY_PATH): FieldRegistry {
  if (cachedRegistry && path === DEFAULT_REGISTRY_PATH) {
    return cachedRegistry;
  }
  const registry = parseFieldRegistry(JSON.parse(readFileSync(path, 'utf-8')));
  if (path === DEFAULT_REGISTRY_PATH) {
    cachedRegistry = registry;
  }
  return registry;
}

/**
 * All canonical field names, de-duplicated, in registry order
 */
export function getCanonicalFieldNames(registry: FieldRegistry = loadFieldRegistry()): string[] {
  const names = new Set<string>();
  for (const family of registry.families) {
    for (const field of family.fields) {
      names.add(field);
    }
  }
  return [...names];
}
