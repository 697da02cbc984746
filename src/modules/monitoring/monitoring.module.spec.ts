import { describe, it, expect, beforeAll, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';
import * as fs from 'fs/promises';
import { MonitoringModule } from './monitoring.module';
import { TradeLogService } from './trade-log.service';
import { SessionReportService } from './session-report.service';
import { EVENT_NAMES, PositionOpenedEvent } from '../../common/events';
import {
  createTestEngineConfig,
  createTestPosition,
} from '../../test/mock-factories';
import { createTestEngineConfigModule } from '../../test/test-engine-config.module';

vi.mock('fs/promises');

vi.spyOn(Logger.prototype, 'log').mockImplementation(() => {});

describe('MonitoringModule', () => {
  let module: TestingModule;

  beforeAll(async () => {
    vi.mocked(fs.mkdir).mockResolvedValue(undefined);
    vi.mocked(fs.appendFile).mockResolvedValue(undefined);
    vi.mocked(fs.stat).mockRejectedValue(new Error('ENOENT'));

    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        EventEmitterModule.forRoot(),
        createTestEngineConfigModule(
          createTestEngineConfig({ reportDir: '/tmp/test-reports' }),
        ),
        MonitoringModule,
      ],
    }).compile();
    await module.init();
  });

  it('should provide the trade log and session report services', () => {
    expect(module.get(TradeLogService)).toBeInstanceOf(TradeLogService);
    expect(module.get(SessionReportService)).toBeInstanceOf(
      SessionReportService,
    );
  });

  it('should write a CSV row when a position.opened event is emitted', async () => {
    const emitter = module.get(EventEmitter2);

    emitter.emit(
      EVENT_NAMES.POSITION_OPENED,
      new PositionOpenedEvent(createTestPosition(), 'corr-wired'),
    );
    await module.get(TradeLogService).flush();

    expect(fs.appendFile).toHaveBeenCalledWith(
      '/tmp/test-reports/trades-2024-01-01.csv',
      '2024-01-01T12:00:00.000Z,open,BTC/USDT,long,1,100,,,,,,pos-1,true,corr-wired\n',
    );
  });
});
