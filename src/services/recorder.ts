import fs from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import type { RecorderConfig } from '../config.js';
import { formatTradeLine, tradeLogHeader } from '../engine/trade.js';
import { describeError } from '../errors.js';
import type { StorageGateway } from '../storage/gateway.js';
import type { TradeRecord } from '../types.js';

// ─── Sinks ───

export interface TradeLogSink {
  readonly name: string;
  write(trade: TradeRecord): Promise<void>;
  close(): Promise<void>;
}

export class FileTradeSink implements TradeLogSink {
  readonly name: string;
  private headerChecked = false;

  constructor(private readonly file: string) {
    this.name = `file ${path.basename(file)}`;
  }

  async write(trade: TradeRecord): Promise<void> {
    if (!this.headerChecked) {
      await this.writeHeaderIfEmpty();
      this.headerChecked = true;
    }
    await fs.promises.appendFile(this.file, `${formatTradeLine(trade)}\n`, 'utf-8');
  }

  // appendFile opens and closes per line; nothing held open
  async close(): Promise<void> {}

  private async writeHeaderIfEmpty(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
    const size = fs.existsSync(this.file) ? (await fs.promises.stat(this.file)).size : 0;
    if (size === 0) {
      await fs.promises.appendFile(this.file, `${tradeLogHeader(new Date()).join('\n')}\n`, 'utf-8');
    }
  }
}

export class StorageTradeSink implements TradeLogSink {
  readonly name: string;

  constructor(private readonly gateway: StorageGateway) {
    this.name = `storage ${gateway.activeKind ?? 'unknown'}`;
  }

  async write(trade: TradeRecord): Promise<void> {
    await this.gateway.recordTrade(trade);
  }

  async close(): Promise<void> {}
}

/**
 * Picks the sink for `log_destination`. The YAML backend keeps no trade rows,
 * so a storage destination on it falls back to the file.
 */
export function createTradeSink(config: RecorderConfig, gateway: StorageGateway): TradeLogSink {
  if (config.destination === 'storage') {
    if (gateway.activeKind !== 'yaml') return new StorageTradeSink(gateway);
    console.warn('[Recorder] YAML storage keeps no trade rows, logging to file instead');
  }
  return new FileTradeSink(config.logFile);
}

// ─── Recorder ───

/**
 * Journals settled trades off the trade path. `log` returns immediately; one
 * consumer writes records in arrival order.
 */
export class TransactionRecorder {
  private queue = new PQueue({ concurrency: 1 });
  private closing: Promise<void> | null = null;

  constructor(
    private readonly sink: TradeLogSink,
    private readonly consoleLog = false,
  ) {}

  log(trade: TradeRecord): void {
    if (this.closing) {
      console.warn(`[Recorder] Closed, dropping trade ${trade.id}`);
      return;
    }

    if (this.consoleLog) console.log(`[Recorder] ${formatTradeLine(trade)}`);

    this.queue
      .add(() => this.sink.write(trade))
      .catch((err: unknown) => {
        console.error(`[Recorder] Failed to write trade ${trade.id} to ${this.sink.name}:`, describeError(err));
      });
  }

  pending(): number {
    return this.queue.size + this.queue.pending;
  }

  // Drains everything already enqueued, then releases the sink
  close(): Promise<void> {
    if (!this.closing) this.closing = this.drainAndClose();
    return this.closing;
  }

  private async drainAndClose(): Promise<void> {
    await this.queue.onIdle();
    await this.sink.close();
    console.log(`[Recorder] Closed (${this.sink.name})`);
  }
}
