import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import { toCsvRows } from './csv.js';
import { initialScanState, scanLine, type ScanState } from './listScan.js';
import type { OutputMode, RecordListener } from './types.js';

export interface ListScannerOptions {
  /** Domain for generated addresses, used verbatim. */
  domain: string;
  mode: OutputMode;
  onRecord?: RecordListener;
}

/**
 * A Transform stream that receives lines (e.g. from `LineSplitter`), tracks
 * the current list title, and resolves every record to addresses.
 *
 * Nothing is pushed until the input ends: the whole table is sorted, so the
 * header and every row are emitted from `_flush`.
 */
export class ListScanner extends Transform {
  private state: ScanState = initialScanState();
  private options: ListScannerOptions;
  private rowsWritten = 0;

  constructor(options: ListScannerOptions) {
    super({ readableObjectMode: true, writableObjectMode: true });
    this.options = options;
  }

  /** Rows written to the table, header excluded. Set once flushed. */
  get count(): number {
    return this.rowsWritten;
  }

  _transform(
    chunk: string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.state = scanLine(
      this.state,
      chunk.toString(),
      this.options.domain,
      this.options.onRecord
    );
    callback();
  }

  _flush(callback: TransformCallback): void {
    const [header, ...rows] = toCsvRows(
      this.state.collector,
      this.options.mode
    );
    this.push(header);
    for (const row of rows) {
      this.push(row);
    }
    this.rowsWritten = rows.length;
    callback();
  }
}
