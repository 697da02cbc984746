import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import {
  DailyStatsArchivedEvent,
  EVENT_NAMES,
  PositionClosedEvent,
  PositionOpenedEvent,
} from '../../common/events';
import { formatDateUTC } from '../../common/utils/date';
import { MONITORING_ERROR_CODES } from './monitoring-error-codes';

export interface TradeLogRecord {
  timestamp: string;
  event: 'open' | 'close';
  symbol: string;
  side: string;
  size: string;
  entryPrice: string;
  exitPrice: string;
  grossPnl: string;
  fees: string;
  realizedPnl: string;
  exitReason: string;
  positionId: string;
  isPaper: boolean;
  correlationId: string;
}

const CSV_HEADER =
  'timestamp,event,symbol,side,size,entry_price,exit_price,gross_pnl,fees,realized_pnl,exit_reason,position_id,is_paper,correlation_id';

const DAILY_SUMMARY_HEADER = 'date,daily_pnl,daily_trade_count';

export function escapeCsvField(value: string): string {
  // Prevent CSV injection: prefix formula-triggering chars with single quote
  // (skip numeric values like "-15.50" which are legitimate trade data)
  if (/^[=+@-]/.test(value) && isNaN(Number(value))) {
    value = `'${value}`;
  }
  if (/[,"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(record: TradeLogRecord): string {
  return [
    escapeCsvField(record.timestamp),
    record.event,
    escapeCsvField(record.symbol),
    escapeCsvField(record.side),
    escapeCsvField(record.size),
    escapeCsvField(record.entryPrice),
    escapeCsvField(record.exitPrice),
    escapeCsvField(record.grossPnl),
    escapeCsvField(record.fees),
    escapeCsvField(record.realizedPnl),
    escapeCsvField(record.exitReason),
    escapeCsvField(record.positionId),
    String(record.isPaper),
    escapeCsvField(record.correlationId),
  ].join(',');
}

export function getCsvHeader(): string {
  return CSV_HEADER;
}

/**
 * Appends one CSV row per opened and closed position to
 * `trades-YYYY-MM-DD.csv` under the report directory, and one row per
 * archived day to `daily-summaries.csv`. Writes to the same file are
 * serialized; failures are logged and swallowed.
 */
@Injectable()
export class TradeLogService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(TradeLogService.name);
  private enabled = true;
  private readonly logDir: string;
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(
    @Inject(ENGINE_CONFIG) config: EngineConfig,
    private readonly configService: ConfigService,
  ) {
    this.logDir = path.resolve(config.reportDir);
  }

  async onModuleInit(): Promise<void> {
    if (this.configService.get<string>('CSV_ENABLED') === 'false') {
      this.enabled = false;
      this.logger.log({
        message: 'CSV trade logging disabled via CSV_ENABLED=false',
        module: 'monitoring',
      });
      return;
    }

    try {
      await fs.mkdir(this.logDir, { recursive: true });
      this.enabled = true;
      this.logger.log({
        message: 'CSV trade logging enabled',
        module: 'monitoring',
        data: { dir: this.logDir },
      });
    } catch (error) {
      this.enabled = false;
      this.logger.error({
        message: 'Trade log directory not writable, CSV logging disabled',
        module: 'monitoring',
        code: MONITORING_ERROR_CODES.CSV_WRITE_FAILED,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  @OnEvent(EVENT_NAMES.POSITION_OPENED)
  handlePositionOpened(event: PositionOpenedEvent): Promise<void> {
    const { position } = event;
    return this.logTrade({
      timestamp: position.entryTime.toISOString(),
      event: 'open',
      symbol: position.symbol,
      side: position.side,
      size: position.size.toString(),
      entryPrice: position.entryPrice.toString(),
      exitPrice: '',
      grossPnl: '',
      fees: '',
      realizedPnl: '',
      exitReason: '',
      positionId: position.positionId,
      isPaper: position.isPaper,
      correlationId: event.correlationId ?? '',
    });
  }

  @OnEvent(EVENT_NAMES.POSITION_CLOSED)
  handlePositionClosed(event: PositionClosedEvent): Promise<void> {
    const { trade } = event;
    return this.logTrade({
      timestamp: trade.closedAt.toISOString(),
      event: 'close',
      symbol: trade.symbol,
      side: trade.side,
      size: trade.size.toString(),
      entryPrice: trade.entryPrice.toString(),
      exitPrice: trade.exitPrice.toString(),
      grossPnl: trade.grossPnl.toString(),
      fees: trade.fees.toString(),
      realizedPnl: trade.realizedPnl.toString(),
      exitReason: trade.exitReason,
      positionId: trade.positionId,
      isPaper: trade.isPaper,
      correlationId: event.correlationId ?? '',
    });
  }

  @OnEvent(EVENT_NAMES.STATS_DAILY_ARCHIVED)
  handleDailyArchived(event: DailyStatsArchivedEvent): Promise<void> {
    const { record } = event;
    return this.appendSummaryRow(
      [
        record.date,
        record.dailyPnl.toString(),
        String(record.dailyTradeCount),
      ].join(','),
    );
  }

  async logTrade(record: TradeLogRecord): Promise<void> {
    if (!this.enabled) return;

    const filename = `trades-${formatDateUTC(new Date(record.timestamp))}.csv`;
    const filepath = path.join(this.logDir, filename);

    return this.enqueueWrite(filepath, async () => {
      await this.appendWithHeader(filepath, getCsvHeader(), formatCsvRow(record));
    });
  }

  async appendSummaryRow(row: string): Promise<void> {
    if (!this.enabled) return;

    const filepath = path.join(this.logDir, 'daily-summaries.csv');
    return this.enqueueWrite(filepath, async () => {
      await this.appendWithHeader(filepath, DAILY_SUMMARY_HEADER, row);
    });
  }

  async onApplicationShutdown(): Promise<void> {
    await this.flush();
  }

  /** Resolves once every queued write has settled. */
  async flush(): Promise<void> {
    await Promise.all(this.writeQueues.values());
  }

  private enqueueWrite(
    filepath: string,
    writeFn: () => Promise<void>,
  ): Promise<void> {
    // Queue entries never reject: each link ends in handleWriteError.
    const prev = this.writeQueues.get(filepath) ?? Promise.resolve();
    const next = prev
      .then(writeFn)
      .catch((err: unknown) => this.handleWriteError(filepath, err));
    this.writeQueues.set(filepath, next);
    return next;
  }

  private async appendWithHeader(
    filepath: string,
    header: string,
    row: string,
  ): Promise<void> {
    if (await this.fileNeedsHeader(filepath)) {
      await fs.appendFile(filepath, header + '\n');
    }
    await fs.appendFile(filepath, row + '\n');
  }

  private async fileNeedsHeader(filepath: string): Promise<boolean> {
    try {
      await fs.stat(filepath);
      return false;
    } catch {
      return true;
    }
  }

  private handleWriteError(filepath: string, error: unknown): void {
    this.logger.error({
      message: 'CSV trade log write failed',
      module: 'monitoring',
      code: MONITORING_ERROR_CODES.CSV_WRITE_FAILED,
      data: {
        file: filepath,
        error: error instanceof Error ? error.message : String(error),
      },
    });
  }
}
