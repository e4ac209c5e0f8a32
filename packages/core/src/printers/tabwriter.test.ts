import { describe, it, expect } from 'vitest';
import { TabWriter, type TabWriterOptions } from './tabwriter.js';
import { PrinterError } from '../errors.js';
import { BufferWriter, FailingWriter, catchError } from '../../test/fixtures/resources.js';

const COMPACT: TabWriterOptions = { minWidth: 0, tabWidth: 8, padding: 1, padChar: ' ' };

describe('TabWriter', () => {
  it('should pad each column to its widest cell', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.write('a\tbbb\tc\n');
    tw.write('aaaa\tb\tc\n');
    tw.flush();

    expect(out.text).toBe('a    bbb c\naaaa b   c\n');
  });

  it('should size column blocks independently', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.write('aaaaaa\tx\n');
    tw.write('b\tc\td\n');
    tw.flush();

    expect(out.text).toBe('aaaaaa x\nb      c d\n');
  });

  it('should apply the minimal cell width', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, { minWidth: 6, tabWidth: 8, padding: 1, padChar: ' ' });

    tw.write('ab\tcd\n');
    tw.flush();

    expect(out.text).toBe('ab    cd\n');
  });

  it('should write an unterminated last line without a newline', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.write('x\ty');
    expect(out.chunks).toHaveLength(0);

    tw.flush();
    expect(out.text).toBe('x y');
  });

  it('should flush on a line with a single cell', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.write('header\n');

    expect(out.chunks).toEqual(['header\n']);
  });

  it('should pad with tabs when the pad character is a tab', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, { minWidth: 0, tabWidth: 8, padding: 1, padChar: '\t' });

    tw.write('a\tb\n');
    tw.flush();

    expect(out.text).toBe('a\tb\n');
  });

  it('should count code points rather than UTF-16 units', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.write('\u{1F600}\tx\n');
    tw.write('ab\ty\n');
    tw.flush();

    expect(out.text).toBe('\u{1F600}  x\nab y\n');
  });

  it('should write nothing when nothing is buffered', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.flush();

    expect(out.chunks).toHaveLength(0);
  });

  it('should be reusable after a flush', () => {
    const out = new BufferWriter();
    const tw = new TabWriter(out, COMPACT);

    tw.write('long-cell\tx\n');
    tw.flush();
    tw.write('a\tb\n');
    tw.flush();

    expect(out.chunks).toEqual(['long-cell x\n', 'a b\n']);
  });

  it('should report a failing writer as a Write error', () => {
    const tw = new TabWriter(new FailingWriter(), COMPACT);
    tw.write('a\tb\n');

    const error = catchError(() => tw.flush());

    expect(error).toBeInstanceOf(PrinterError);
    expect(error).toMatchObject({ kind: 'Write', message: 'error writing output: disk full' });
  });
});
