// ─────────────────────────────────────────────────────────────
// Block Reader — One report file as a forward-only block stream
// ─────────────────────────────────────────────────────────────

import path from "path";
import { Block } from "../schema/reportSchema";
import { readLines } from "../ingest/lineSource";
import { splitFields } from "./tsvTokenizer";
import { BlockAssembler, BlockAssemblerOptions } from "./blockAssembler";

export interface BlockReaderOptions extends Omit<BlockAssemblerOptions, "fileName"> {
  filePath: string;
}

export class BlockReader {
  constructor(private readonly options: BlockReaderOptions) {}

  get fileName(): string {
    return path.basename(this.options.filePath);
  }

  /** Single pass over the file; breaking out early closes it */
  async *blocks(): AsyncGenerator<Block, void, undefined> {
    const { filePath, ...assemblerOptions } = this.options;
    const assembler = new BlockAssembler({ ...assemblerOptions, fileName: this.fileName });

    let rowNumber = 0;
    for await (const line of readLines(filePath)) {
      rowNumber++;
      yield* assembler.accept(splitFields(line), rowNumber);
    }
    yield* assembler.finish();
  }

  cursor(): BlockCursor {
    return new BlockCursor(this.blocks());
  }
}

/**
 * Pull-style access to a block stream. `close()` releases the
 * underlying file even when blocks remain.
 */
export class BlockCursor implements AsyncIterable<Block> {
  private buffered: IteratorResult<Block, void> | null = null;
  private closed = false;

  constructor(private readonly source: AsyncGenerator<Block, void, undefined>) {}

  async hasNext(): Promise<boolean> {
    if (this.closed) return false;
    if (!this.buffered) this.buffered = await this.source.next();
    if (this.buffered.done) {
      this.closed = true;
      return false;
    }
    return true;
  }

  async next(): Promise<Block> {
    const result = this.closed ? null : this.buffered ?? (await this.source.next());
    this.buffered = null;
    if (!result || result.done) {
      this.closed = true;
      throw new Error("No more blocks: the cursor is exhausted or closed");
    }
    return result.value;
  }

  async close(): Promise<void> {
    if (this.closed && !this.buffered) return;
    this.closed = true;
    this.buffered = null;
    await this.source.return(undefined);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Block, void, undefined> {
    try {
      while (await this.hasNext()) {
        yield await this.next();
      }
    } finally {
      await this.close();
    }
  }
}
