import { describe, it, expect } from 'vitest';
import { ContextAssembler, normalizeWhitespace, renderSection } from '../ContextAssembler.js';

describe('normalizeWhitespace', () => {
  it('collapses horizontal whitespace and long blank runs, then trims', () => {
    expect(normalizeWhitespace('  Total:\t\t 450  \n\n\n\nPaid ')).toBe('Total: 450 \n\nPaid');
  });

  it('keeps a single blank line', () => {
    expect(normalizeWhitespace('a\n\nb')).toBe('a\n\nb');
  });

  it('treats missing text as empty', () => {
    expect(normalizeWhitespace(null)).toBe('');
    expect(normalizeWhitespace(undefined)).toBe('');
  });
});

describe('ContextAssembler', () => {
  it('renders each section as label, body and a blank line', () => {
    const assembler = new ContextAssembler(1000);

    const context = assembler.build([
      { label: 'L1', text: 'hello' },
      { label: 'L2', text: 'world' },
    ]);

    expect(context).toEqual({ text: 'L1\nhello\n\nL2\nworld\n\n', sectionCount: 2, truncated: false });
  });

  it('stops at the first section that would exceed the budget', () => {
    const assembler = new ContextAssembler(30);

    const context = assembler.build([
      { label: 'L1', text: 'hello' }, // 10 chars
      { label: 'L2', text: 'world' }, // 10 chars
      { label: 'L3', text: '0123456789' }, // 15 chars, overflows
      { label: 'L4', text: 'x' }, // would fit, but assembly already stopped
    ]);

    expect(context.text).toBe('L1\nhello\n\nL2\nworld\n\n');
    expect(context.sectionCount).toBe(2);
    expect(context.truncated).toBe(true);
  });

  it('accepts a section that lands exactly on the budget', () => {
    const assembler = new ContextAssembler(20);

    const context = assembler.build([
      { label: 'L1', text: 'hello' },
      { label: 'L2', text: 'world' },
    ]);

    expect(context.text.length).toBe(20);
    expect(context.truncated).toBe(false);
  });

  it('never splits a section', () => {
    const assembler = new ContextAssembler(12);

    const context = assembler.build([{ label: 'Label', text: 'a body longer than the budget' }]);

    expect(context).toEqual({ text: '', sectionCount: 0, truncated: true });
  });

  it('skips sections without usable text', () => {
    const assembler = new ContextAssembler(1000);

    const context = assembler.build([
      { label: 'empty', text: '   \n\t ' },
      { label: 'missing', text: null },
      { label: 'kept', text: ' value ' },
    ]);

    expect(context.text).toBe(renderSection('kept', 'value'));
    expect(context.sectionCount).toBe(1);
  });

  it('preserves input order', () => {
    const assembler = new ContextAssembler(1000);

    const context = assembler.build([
      { label: 'B', text: '2' },
      { label: 'A', text: '1' },
    ]);

    expect(context.text).toBe('B\n2\n\nA\n1\n\n');
  });
});
