import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import { EVENT_NAMES, SessionSummaryEvent } from '../../common/events';
import { MONITORING_ERROR_CODES } from './monitoring-error-codes';

export interface SessionReport {
  startedAt: string;
  endedAt: string;
  gatewayMode: string;
  symbols: readonly string[];
  totalTrades: number;
  winningTrades: number;
  winRate: number;
  totalPnl: string;
  dailyPnl: string;
  dailyTradeCount: number;
  opportunitiesDetected: number;
  openPositionsRemaining: number;
  correlationId: string | null;
}

/** `2024-01-01T12:00:00.000Z` → `session-2024-01-01T12-00-00-000Z.json` */
export function sessionReportFilename(endedAt: Date): string {
  return `session-${endedAt.toISOString().replace(/[:.]/g, '-')}.json`;
}

export function buildSessionReport(
  event: SessionSummaryEvent,
  config: EngineConfig,
): SessionReport {
  const { snapshot } = event;
  return {
    startedAt: snapshot.startedAt.toISOString(),
    endedAt: event.endedAt.toISOString(),
    gatewayMode: config.gatewayMode,
    symbols: config.symbols,
    totalTrades: snapshot.totalTrades,
    winningTrades: snapshot.winningTrades,
    winRate: snapshot.winRate,
    totalPnl: snapshot.totalPnl.toString(),
    dailyPnl: snapshot.dailyPnl.toString(),
    dailyTradeCount: snapshot.dailyTradeCount,
    opportunitiesDetected: snapshot.opportunitiesDetected,
    openPositionsRemaining: event.openPositionsRemaining,
    correlationId: event.correlationId ?? null,
  };
}

/** Writes the end-of-run session snapshot as JSON. */
@Injectable()
export class SessionReportService {
  private readonly logger = new Logger(SessionReportService.name);

  constructor(@Inject(ENGINE_CONFIG) private readonly config: EngineConfig) {}

  @OnEvent(EVENT_NAMES.SESSION_SUMMARY)
  async handleSessionSummary(event: SessionSummaryEvent): Promise<void> {
    const report = buildSessionReport(event, this.config);
    const dir = path.resolve(this.config.reportDir);
    const filepath = path.join(dir, sessionReportFilename(event.endedAt));

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(filepath, JSON.stringify(report, null, 2) + '\n');
      this.logger.log({
        message: 'Session report written',
        module: 'monitoring',
        correlationId: event.correlationId,
        data: {
          file: filepath,
          totalTrades: report.totalTrades,
          totalPnl: report.totalPnl,
          winRate: report.winRate,
        },
      });
    } catch (error) {
      this.logger.error({
        message: 'Session report write failed',
        module: 'monitoring',
        code: MONITORING_ERROR_CODES.REPORT_WRITE_FAILED,
        correlationId: event.correlationId,
        data: {
          file: filepath,
          error: error instanceof Error ? error.message : String(error),
        },
      });
    }
  }
}
