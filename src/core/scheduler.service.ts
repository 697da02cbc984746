import { Inject, Injectable, Logger } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ENGINE_CONFIG } from '../common/config/engine-config.constants';
import { EngineConfig } from '../common/config/engine-config.type';
import { TradingEngineService } from './trading-engine.service';

export const TICK_TIMEOUT_NAME = 'engineTick';

/**
 * Cooperative polling loop. Each tick schedules the next one only after it
 * finishes, so ticks never overlap. The pending timer lives in
 * SchedulerRegistry; stopping cancels it between ticks, never mid-tick.
 */
@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);
  private running = false;
  private currentTick: Promise<void> | null = null;

  constructor(
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    private readonly tradingEngine: TradingEngineService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.log({
      message: 'Scheduler started',
      module: 'core',
      data: { tickIntervalMs: this.config.tickIntervalMs },
    });
    this.scheduleNext(0);
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.schedulerRegistry.doesExist('timeout', TICK_TIMEOUT_NAME)) {
      this.schedulerRegistry.deleteTimeout(TICK_TIMEOUT_NAME);
    }
    this.logger.log({
      message: 'Scheduler stopped',
      module: 'core',
      data: { tickInProgress: this.isCycleInProgress() },
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  isCycleInProgress(): boolean {
    return this.currentTick !== null;
  }

  /**
   * Resolves once the in-flight tick, if any, has finished. Unbounded: a tick
   * may run for as long as its quote fetches and gateway calls take.
   */
  async waitForIdle(): Promise<void> {
    const tick = this.currentTick;
    if (!tick) {
      return;
    }
    this.logger.log({
      message: 'Waiting for in-flight tick to finish',
      module: 'core',
    });
    await tick;
  }

  private scheduleNext(delayMs: number): void {
    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(TICK_TIMEOUT_NAME);
      this.currentTick = this.runTick();
    }, delayMs);
    this.schedulerRegistry.addTimeout(TICK_TIMEOUT_NAME, timeout);
  }

  private async runTick(): Promise<void> {
    try {
      await this.tradingEngine.executeTick();
    } catch (error) {
      // executeTick reports its own failures; this guards the loop itself.
      this.logger.error({
        message: 'Tick loop error',
        module: 'core',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    } finally {
      this.currentTick = null;
      if (this.running) {
        this.scheduleNext(this.config.tickIntervalMs);
      }
    }
  }
}
