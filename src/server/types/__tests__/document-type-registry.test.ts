import { describe, it, expect } from 'vitest';
import {
  DOCUMENT_TYPES,
  getCanonicalFieldNames,
  isDocumentType,
  loadFieldRegistry,
  parseFieldRegistry,
} from '../document-type-registry.js';

describe('document types', () => {
  it('is a closed set of nine labels', () => {
    expect(DOCUMENT_TYPES).toHaveLength(9);
    expect(isDocumentType('BANK_STATEMENT')).toBe(true);
    expect(isDocumentType('bank_statement')).toBe(false);
    expect(isDocumentType('PAYSLIP')).toBe(false);
  });
});

describe('field registry', () => {
  it('loads the bundled registry', () => {
    const registry = loadFieldRegistry();

    expect(registry.families.map((family) => family.family)).toEqual([
      'Identity',
      'Education',
      'Financial',
      'Bank',
      'Salary',
      'Legal',
      'Government',
      'Medical',
    ]);
    expect(registry.fieldExamples).toContainEqual({ question: 'What is my PAN number?', fields: ['id_number'] });
  });

  it('lists canonical field names once each', () => {
    const names = getCanonicalFieldNames();

    expect(names.filter((name) => name === 'person_name')).toHaveLength(1);
    expect(names).toContain('roll_number');
  });

  it('rejects a registry naming an unknown document type', () => {
    expect(() =>
      parseFieldRegistry({
        families: [{ family: 'Travel', documentType: 'TICKET', fields: ['pnr'] }],
        fieldExamples: [],
        documentTypeExamples: [],
      })
    ).toThrow();
  });
});
