// ─────────────────────────────────────────────────────────────
// Block Sink — Destinations for decoded report blocks
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import { Writable } from "stream";
import { Block } from "../schema/reportSchema";

export interface BlockSink {
  /** Resolves once the destination can take the next block */
  write(block: Block): Promise<void>;
  /** Flush and release the destination */
  close(): Promise<void>;
}

/**
 * One JSON document per block, one block per line. A path is opened
 * (and truncated) by the sink; a stream passed in stays open on close.
 * A stream error is raised from the next write or close.
 */
export class JsonLinesSink implements BlockSink {
  private readonly stream: Writable;
  private readonly ownsStream: boolean;
  private written = 0;
  private failure: Error | null = null;

  constructor(target: string | Writable) {
    if (typeof target === "string") {
      this.stream = fs.createWriteStream(target, { encoding: "utf-8" });
      this.ownsStream = true;
    } else {
      this.stream = target;
      this.ownsStream = false;
    }
    this.stream.on("error", (err: Error) => {
      if (this.failure === null) this.failure = err;
    });
  }

  get blocksWritten(): number {
    return this.written;
  }

  async write(block: Block): Promise<void> {
    if (this.failure) throw this.failure;
    const ready = this.stream.write(JSON.stringify(block) + "\n");
    this.written++;
    if (!ready) await this.drained();
  }

  close(): Promise<void> {
    const failure = this.failure;
    if (failure) return Promise.reject(failure);
    if (!this.ownsStream) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end((err?: Error | null) => {
        const problem = err ?? this.failure;
        if (problem) reject(problem);
        else resolve();
      });
    });
  }

  // ── Helpers ──────────────────────────────────────────────

  private drained(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onDrain = (): void => {
        this.stream.off("error", onError);
        resolve();
      };
      const onError = (err: Error): void => {
        this.stream.off("drain", onDrain);
        reject(err);
      };
      this.stream.once("drain", onDrain);
      this.stream.once("error", onError);
    });
  }
}

/** Keeps blocks in memory, in write order */
export class MemorySink implements BlockSink {
  readonly blocks: Block[] = [];
  closed = false;

  async write(block: Block): Promise<void> {
    this.blocks.push(block);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
