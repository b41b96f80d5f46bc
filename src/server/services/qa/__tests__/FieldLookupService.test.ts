import { describe, it, expect } from 'vitest';
import { FieldLookupService, formatFieldAnswer, lastResortSearchTerm } from '../FieldLookupService.js';
import type { FieldRecord, FieldStoreAccessor } from '../types.js';
import { InMemoryFieldStore, OTHER_USER, USER, fieldRecord } from './fakes.js';

describe('lastResortSearchTerm', () => {
  it('takes the last word without punctuation', () => {
    expect(lastResortSearchTerm('Who is Ramesh?')).toBe('Ramesh');
    expect(lastResortSearchTerm('Show me the policy for Mumbai!')).toBe('Mumbai');
  });

  it('ignores words of two characters or fewer', () => {
    expect(lastResortSearchTerm('Is it ok?')).toBeNull();
    expect(lastResortSearchTerm('   ')).toBeNull();
  });
});

describe('formatFieldAnswer', () => {
  it('renders a single record as value and source type', () => {
    expect(formatFieldAnswer([fieldRecord()])).toBe('ABCDE1234F (from IDENTITY_DOCUMENT)');
  });

  it('renders several records as one line each', () => {
    const answer = formatFieldAnswer([
      fieldRecord({ fieldName: 'father_name', fieldValue: 'Arun Kumar' }),
      fieldRecord({ fieldName: 'mother_name', fieldValue: 'Meena Devi' }),
    ]);

    expect(answer).toBe(
      '- father_name: Arun Kumar (from IDENTITY_DOCUMENT)\n- mother_name: Meena Devi (from IDENTITY_DOCUMENT)'
    );
  });
});

describe('FieldLookupService', () => {
  it('returns exact name matches without a fuzzy search', async () => {
    const store = new InMemoryFieldStore([fieldRecord(), fieldRecord({ fieldName: 'old_id_number', fieldValue: 'X1' })]);
    const service = new FieldLookupService(store);

    const records = await service.lookup(['ID_NUMBER'], 'What is my PAN number?', USER);

    expect(records.map((record) => record.fieldValue)).toEqual(['ABCDE1234F']);
    expect(store.calls).toEqual(['exact:ID_NUMBER']);
  });

  it('falls back to a substring match on the field name', async () => {
    const store = new InMemoryFieldStore([
      fieldRecord({ fieldName: 'father_name', fieldValue: 'Arun Kumar' }),
      fieldRecord({ fieldName: 'mother_name', fieldValue: 'Meena Devi' }),
    ]);
    const service = new FieldLookupService(store);

    const records = await service.lookup(['name'], "What are my parent's names?", USER);

    expect(records.map((record) => record.fieldName)).toEqual(['father_name', 'mother_name']);
    expect(store.calls).toEqual(['exact:name', 'fuzzy:name']);
  });

  it('accumulates matches across hints in hint order without de-duplication', async () => {
    const store = new InMemoryFieldStore([
      fieldRecord({ fieldName: 'mother_name', fieldValue: 'Meena Devi' }),
      fieldRecord({ fieldName: 'father_name', fieldValue: 'Arun Kumar' }),
    ]);
    const service = new FieldLookupService(store);

    const records = await service.lookup(['father_name', 'mother_name', 'mother'], 'Parents?', USER);

    expect(records.map((record) => record.fieldValue)).toEqual(['Arun Kumar', 'Meena Devi', 'Meena Devi']);
  });

  it('searches field values by the last word when no name matches', async () => {
    const store = new InMemoryFieldStore([fieldRecord({ fieldName: 'city', fieldValue: 'Pune, Maharashtra' })]);
    const service = new FieldLookupService(store);

    const records = await service.lookup(['birthplace'], 'Was I born in Pune?', USER);

    expect(records.map((record) => record.fieldValue)).toEqual(['Pune, Maharashtra']);
    expect(store.calls).toEqual(['exact:birthplace', 'fuzzy:birthplace', 'value:Pune']);
  });

  it('returns nothing without a usable last word', async () => {
    const store = new InMemoryFieldStore([fieldRecord()]);
    const service = new FieldLookupService(store);

    const records = await service.lookup([], 'Is it ok?', USER);

    expect(records).toEqual([]);
    expect(store.calls).toEqual([]);
  });

  it('only sees the asking user records', async () => {
    const store = new InMemoryFieldStore([fieldRecord({ userId: OTHER_USER })]);
    const service = new FieldLookupService(store);

    expect(await service.lookup(['id_number'], 'What is my PAN number?', USER)).toEqual([]);
  });

  it('propagates store failures', async () => {
    const failingStore: FieldStoreAccessor = {
      findByUserAndFieldNameExact: async (): Promise<FieldRecord[]> => {
        throw new Error('connection reset');
      },
      findByUserAndFieldNameFuzzy: async () => [],
      searchByValue: async () => [],
    };
    const service = new FieldLookupService(failingStore);

    await expect(service.lookup(['id_number'], 'PAN?', USER)).rejects.toThrow('connection reset');
  });
});
