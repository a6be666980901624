import { once } from 'events';
import type { Writable } from 'stream';
import { stableStringify } from '../core/utils/stableStringify';
import type { CommentRecord } from './CommentRecordBuilder';

/** Destination des enregistrements, écrits dès leur production. */
export interface RecordSink {
  write(record: CommentRecord): Promise<void>;
}

/**
 * Un objet JSON par ligne, clés triées (sortie déterministe, comparable par diff).
 */
export class NdjsonRecordWriter implements RecordSink {
  private written = 0;

  constructor(private readonly stream: Writable) {}

  public get count(): number {
    return this.written;
  }

  public async write(record: CommentRecord): Promise<void> {
    const ok = this.stream.write(stableStringify(record) + '\n');
    this.written++;
    if (!ok) {
      await once(this.stream, 'drain');
    }
  }
}
