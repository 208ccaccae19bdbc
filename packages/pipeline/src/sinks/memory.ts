import type { PostRecord, Sink } from "@threadloom/shared";

export class MemorySink implements Sink {
  readonly records: PostRecord[] = [];
  closed = false;

  async write(record: PostRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
