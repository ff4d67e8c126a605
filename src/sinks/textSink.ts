/**
 * Text Sink: one formatted line per record, depth shown as indentation
 */

import { formatRecord } from '../core/formatter.js';
import type { ResolvedViewerOptions } from '../core/options.js';
import type { PresentationSink, ViewerRecord } from '../core/types.js';

export type LineWriter = (line: string) => void;

export class TextSink implements PresentationSink {
  private readonly writeLine: LineWriter;
  private readonly options: Partial<ResolvedViewerOptions>;

  constructor(writeLine: LineWriter, options: Partial<ResolvedViewerOptions> = {}) {
    this.writeLine = writeLine;
    this.options = options;
  }

  append(record: ViewerRecord): void {
    this.writeLine(formatRecord(record, this.options));
  }

  // Indentation already carries the nesting
  beginChild(): void {}

  endChild(): void {}
}

/**
 * Text sink that keeps its lines in memory
 */
export class LineCollector extends TextSink {
  readonly lines: string[];

  constructor(options: Partial<ResolvedViewerOptions> = {}) {
    const lines: string[] = [];
    super((line) => lines.push(line), options);
    this.lines = lines;
  }
}

/**
 * Text sink over a writable stream such as process.stdout
 */
export function createStreamSink(
  stream: { write(chunk: string): unknown },
  options: Partial<ResolvedViewerOptions> = {}
): TextSink {
  return new TextSink((line) => {
    stream.write(`${line}\n`);
  }, options);
}
