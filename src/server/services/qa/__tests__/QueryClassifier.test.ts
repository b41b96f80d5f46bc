import { describe, it, expect } from 'vitest';
import { QueryClassifier, parseRouteDecision, stripCodeFences } from '../QueryClassifier.js';
import { FALLBACK_DECISION } from '../types.js';
import type { GenerationBackend, GenerationResult } from '../types.js';
import type { FieldRegistry } from '../../../types/document-type-registry.js';
import { DocumentType } from '../../../types/document-type-registry.js';
import { RecordingGenerationBackend } from './fakes.js';

const registry: FieldRegistry = {
  families: [{ family: 'Identity', documentType: DocumentType.IDENTITY_DOCUMENT, fields: ['id_number', 'mother_name'] }],
  fieldExamples: [{ question: 'What is my PAN number?', fields: ['id_number'] }],
  documentTypeExamples: [{ question: 'Total spent on bills?', documentTypes: [DocumentType.FINANCIAL_BILL] }],
};

describe('stripCodeFences', () => {
  it('removes a json fence', () => {
    expect(stripCodeFences('```json\n{"type":"SIMILARITY"}\n```')).toBe('{"type":"SIMILARITY"}');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFences('  {"type":"AGGREGATE"} ')).toBe('{"type":"AGGREGATE"}');
  });
});

describe('parseRouteDecision', () => {
  it('reads route and field hints', () => {
    expect(parseRouteDecision('{"type":"FIELD_LOOKUP","fields":["id_number"],"document_types":null}')).toEqual({
      route: 'FIELD_LOOKUP',
      fieldHints: ['id_number'],
      documentTypes: null,
    });
  });

  it('normalizes case of route and document types', () => {
    const decision = parseRouteDecision(
      '```json\n{"type":"aggregate","fields":null,"document_types":["financial_bill"," bank_statement "]}\n```'
    );

    expect(decision).toEqual({
      route: 'AGGREGATE',
      fieldHints: [],
      documentTypes: ['FINANCIAL_BILL', 'BANK_STATEMENT'],
    });
  });

  it('accepts a single field given as a string', () => {
    expect(parseRouteDecision('{"type":"FIELD_LOOKUP","fields":"mother_name"}')?.fieldHints).toEqual(['mother_name']);
  });

  it('drops empty and "null" hints', () => {
    expect(parseRouteDecision('{"type":"FIELD_LOOKUP","fields":["null","","father_name"]}')?.fieldHints).toEqual([
      'father_name',
    ]);
  });

  it('falls back to the legacy single field key', () => {
    expect(parseRouteDecision('{"type":"FIELD_LOOKUP","field":"phone"}')?.fieldHints).toEqual(['phone']);
  });

  it('treats an empty document type list as no filter', () => {
    expect(parseRouteDecision('{"type":"AGGREGATE","document_types":[]}')?.documentTypes).toBeNull();
  });

  it('defaults a missing type to SIMILARITY', () => {
    expect(parseRouteDecision('{}')).toEqual({ route: 'SIMILARITY', fieldHints: [], documentTypes: null });
  });

  it('rejects unknown categories', () => {
    expect(parseRouteDecision('{"type":"SUMMARY"}')).toBeNull();
  });

  it('rejects non-object and malformed replies', () => {
    expect(parseRouteDecision('FIELD_LOOKUP')).toBeNull();
    expect(parseRouteDecision('[1, 2]')).toBeNull();
    expect(parseRouteDecision('{"type": 3}')).toBeNull();
  });
});

describe('QueryClassifier', () => {
  it('sends the question and the registry to the routing model', async () => {
    const backend = new RecordingGenerationBackend({ ok: true, text: '{"type":"FIELD_LOOKUP","fields":["id_number"]}' });
    const classifier = new QueryClassifier(backend, registry);

    const decision = await classifier.classify('What is my PAN number?');

    expect(decision).toEqual({ route: 'FIELD_LOOKUP', fieldHints: ['id_number'], documentTypes: null });
    expect(backend.prompts).toHaveLength(1);
    expect(backend.prompts[0]).toContain('User question: What is my PAN number?');
    expect(backend.prompts[0]).toContain('Identity: id_number, mother_name');
    expect(backend.prompts[0]).toContain('"What is my PAN number?" -> fields: ["id_number"]');
  });

  it('falls back to SIMILARITY when the model fails', async () => {
    const backend = new RecordingGenerationBackend({ ok: false, error: 'rate limited' });
    const classifier = new QueryClassifier(backend, registry);

    expect(await classifier.classify('Summarize my marksheet')).toEqual(FALLBACK_DECISION);
  });

  it('falls back to SIMILARITY on an unusable reply', async () => {
    const backend = new RecordingGenerationBackend({ ok: true, text: 'I think this is a lookup question.' });
    const classifier = new QueryClassifier(backend, registry);

    expect(await classifier.classify('Summarize my marksheet')).toEqual(FALLBACK_DECISION);
  });

  it('falls back to SIMILARITY when the backend throws', async () => {
    const backend: GenerationBackend = {
      generateText: async (): Promise<GenerationResult> => {
        throw new Error('socket hang up');
      },
    };
    const classifier = new QueryClassifier(backend, registry);

    expect(await classifier.classify('Anything')).toEqual(FALLBACK_DECISION);
  });

  it('hands out independent fallback decisions', async () => {
    const classifier = new QueryClassifier(new RecordingGenerationBackend({ ok: false, error: 'down' }), registry);

    const first = await classifier.classify('a');
    first.fieldHints.push('mutated');
    const second = await classifier.classify('b');

    expect(second.fieldHints).toEqual([]);
  });

  it('loads the bundled registry when none is given', async () => {
    const backend = new RecordingGenerationBackend({ ok: true, text: '{"type":"SIMILARITY"}' });
    const classifier = new QueryClassifier(backend);

    await classifier.classify('Explain my invoice');

    expect(backend.prompts[0]).toContain('roll_number');
  });
});
