/**
 * Elastic tab stop writer used by the human-readable printer.
 *
 * Text written to a TabWriter is split into cells at tabs and into lines at
 * newlines. Cells in the same column of adjacent lines form a column block
 * and are padded to a common width. The last cell of a line is not part of
 * any column and is written as is.
 *
 * @module printers/tabwriter
 */

import { writeTo, type Writer } from './printer.js';

/**
 * Layout parameters for a TabWriter.
 */
export interface TabWriterOptions {
  /** Minimal cell width including padding */
  minWidth: number;
  /** Width of a tab character; only used when padChar is '\t' */
  tabWidth: number;
  /** Padding added to the widest cell of a column block */
  padding: number;
  /** Character used to fill cells */
  padChar: string;
}

interface Cell {
  text: string;
  width: number;
}

function displayWidth(text: string): number {
  return [...text].length;
}

/**
 * Buffers tab-separated text and writes it aligned on {@link TabWriter.flush}.
 *
 * @example
 * ```typescript
 * const tw = new TabWriter(process.stdout, { minWidth: 0, tabWidth: 8, padding: 1, padChar: ' ' });
 * tw.write('NAME\tSTATUS\n');
 * tw.write('web-1\tRunning\n');
 * tw.flush();
 * ```
 */
export class TabWriter implements Writer {
  private lines: Cell[][] = [];
  private current: Cell[] = [];
  private cell = '';
  private readonly widths: number[] = [];
  private pending = '';

  constructor(
    private readonly output: Writer,
    private readonly options: TabWriterOptions
  ) {
    this.reset();
  }

  write(chunk: string): void {
    for (const ch of chunk) {
      if (ch === '\t') {
        this.terminateCell();
      } else if (ch === '\n') {
        const cells = this.terminateCell();
        this.addLine();
        // A single-cell line ends every open column block, so nothing
        // buffered so far can change width any more.
        if (cells === 1) {
          this.flush();
        }
      } else {
        this.cell += ch;
      }
    }
  }

  /**
   * Format and write all buffered text. Writes nothing if nothing is buffered.
   *
   * @throws PrinterError of kind 'Write' if the underlying writer fails
   */
  flush(): void {
    if (this.cell.length > 0) {
      this.terminateCell();
    }
    this.format(0, this.lines.length);
    const text = this.pending;
    this.reset();
    if (text.length > 0) {
      writeTo(this.output, text);
    }
  }

  private reset(): void {
    this.lines = [];
    this.cell = '';
    this.pending = '';
    this.widths.length = 0;
    this.addLine();
  }

  private addLine(): void {
    this.current = [];
    this.lines.push(this.current);
  }

  private terminateCell(): number {
    this.current.push({ text: this.cell, width: displayWidth(this.cell) });
    this.cell = '';
    return this.current.length;
  }

  /**
   * Lay out lines [line0, line1) for the column at `widths.length`,
   * recursing into each column block found there.
   */
  private format(line0: number, line1: number): void {
    const column = this.widths.length;
    for (let i = line0; i < line1; i++) {
      if (column >= this.lines[i].length - 1) {
        continue;
      }

      this.writeLines(line0, i);
      line0 = i;

      let width = this.options.minWidth;
      for (; i < line1; i++) {
        const line = this.lines[i];
        if (column >= line.length - 1) {
          break;
        }
        width = Math.max(width, line[column].width + this.options.padding);
      }

      this.widths.push(width);
      this.format(line0, i);
      this.widths.pop();
      line0 = i;
    }
    this.writeLines(line0, line1);
  }

  private writeLines(line0: number, line1: number): void {
    for (let i = line0; i < line1; i++) {
      const line = this.lines[i];
      line.forEach((cell, j) => {
        this.pending += cell.text;
        if (j < this.widths.length) {
          this.pending += this.padding(cell.width, this.widths[j]);
        }
      });
      // The last buffered line has not been terminated by a newline yet.
      if (i + 1 < this.lines.length) {
        this.pending += '\n';
      }
    }
  }

  private padding(textWidth: number, cellWidth: number): string {
    if (this.options.padChar === '\t') {
      // Tabs can only fill whole tab stops, so round the cell up to one.
      const tabWidth = this.options.tabWidth;
      if (tabWidth === 0) return '';
      const width = Math.ceil(cellWidth / tabWidth) * tabWidth;
      return '\t'.repeat(Math.ceil((width - textWidth) / tabWidth));
    }
    return this.options.padChar.repeat(Math.max(cellWidth - textWidth, 0));
  }
}
