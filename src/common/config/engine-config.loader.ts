import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';

import { ConfigValidationError } from '../errors/config-validation-error';
import { SizingPolicyConfig, EngineConfig } from './engine-config.type';
import { EngineConfigDto, SizingConfigDto } from './engine-config.dto';

const DEFAULT_CONFIG_PATH = 'config/engine.yaml';

/** Env var → dotted path inside the YAML document. */
const NUMERIC_ENV_OVERRIDES: ReadonlyArray<[string, string[]]> = [
  ['MIN_SPREAD_PERCENT', ['minSpreadPercent']],
  ['TARGET_SPREAD_PERCENT', ['targetSpreadPercent']],
  ['TICK_INTERVAL_MS', ['tickIntervalMs']],
  ['MAX_POSITIONS', ['risk', 'maxPositions']],
  ['LEVERAGE', ['risk', 'leverage']],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function setPath(
  target: Record<string, unknown>,
  keys: string[],
  value: unknown,
): void {
  let cursor = target;
  keys.forEach((key, i) => {
    if (i === keys.length - 1) {
      cursor[key] = value;
      return;
    }
    const child = cursor[key];
    const next = isRecord(child) ? { ...child } : {};
    cursor[key] = next;
    cursor = next;
  });
}

function flattenValidationErrors(
  errors: ValidationError[],
  prefix = '',
): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const property = prefix ? `${prefix}.${error.property}` : error.property;
    if (error.constraints) {
      messages.push(
        `${property}: ${Object.values(error.constraints).join(', ')}`,
      );
    }
    if (error.children && error.children.length > 0) {
      messages.push(...flattenValidationErrors(error.children, property));
    }
  }
  return messages;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Loads config/engine.yaml (or ENGINE_CONFIG_PATH), applies env overrides,
 * validates it and returns a frozen EngineConfig.
 * Any problem throws ConfigValidationError: the engine must not start.
 */
@Injectable()
export class EngineConfigLoader {
  private readonly logger = new Logger(EngineConfigLoader.name);

  constructor(private readonly configService: ConfigService) {}

  async load(): Promise<EngineConfig> {
    const configPath = this.resolveConfigPath();
    const rawContent = this.readConfigFile(configPath);
    const parsed = this.parseYaml(rawContent, configPath);
    const merged = this.applyEnvOverrides(parsed);
    const dto = await this.validateConfig(merged);
    const config = deepFreeze(this.toEngineConfig(dto));

    this.logger.log({
      message: `Engine config loaded from ${configPath}`,
      module: 'config',
      data: {
        symbols: config.symbols.length,
        gatewayMode: config.gatewayMode,
        minSpreadPercent: config.minSpreadPercent,
        targetSpreadPercent: config.targetSpreadPercent,
      },
    });
    return config;
  }

  private resolveConfigPath(): string {
    const configPath = this.configService.get<string>(
      'ENGINE_CONFIG_PATH',
      DEFAULT_CONFIG_PATH,
    );
    return path.resolve(process.cwd(), configPath);
  }

  private readConfigFile(configPath: string): string {
    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError(
        `Engine config file not found: ${configPath}`,
        [`File not found: ${configPath}`],
      );
    }
    return fs.readFileSync(configPath, 'utf-8');
  }

  private parseYaml(
    content: string,
    configPath: string,
  ): Record<string, unknown> {
    let result: unknown;
    try {
      result = yaml.load(content);
    } catch (error) {
      const message =
        error instanceof Error ? error.message : 'Unknown YAML parse error';
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: ${message}`,
        [message],
      );
    }
    if (!isRecord(result)) {
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: file is empty or does not contain a valid object`,
        ['YAML content is empty or not an object'],
      );
    }
    return result;
  }

  private applyEnvOverrides(
    parsed: Record<string, unknown>,
  ): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...parsed };

    for (const [envKey, keys] of NUMERIC_ENV_OVERRIDES) {
      const value = this.configService.get<string>(envKey);
      if (value !== undefined && value !== '') {
        // NaN fails the DTO's IsNumber/IsInt check with the property name
        setPath(merged, keys, Number(value));
      }
    }

    const gatewayMode = this.configService.get<string>('GATEWAY_MODE');
    if (gatewayMode) {
      setPath(merged, ['gateway', 'mode'], gatewayMode);
    }

    return merged;
  }

  private async validateConfig(
    merged: Record<string, unknown>,
  ): Promise<EngineConfigDto> {
    const dto = plainToInstance(EngineConfigDto, merged);
    const errors = flattenValidationErrors(await validate(dto));

    if (errors.length === 0) {
      errors.push(...EngineConfigDto.validateCrossFieldRules(dto));
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(
        `Engine config validation failed with ${errors.length} error(s)`,
        errors,
      );
    }
    return dto;
  }

  private toSizingConfig(dto: SizingConfigDto): SizingPolicyConfig {
    if (dto.type === 'fixed_notional') {
      return { type: 'fixed_notional', notionalUsd: dto.notionalUsd ?? 0 };
    }
    return {
      type: 'risk_fraction',
      riskFraction: dto.riskFraction ?? 0,
      maxNotionalUsd: dto.maxNotionalUsd ?? 0,
    };
  }

  private toEngineConfig(dto: EngineConfigDto): EngineConfig {
    return {
      symbols: [...dto.symbols],
      minSpreadPercent: dto.minSpreadPercent,
      targetSpreadPercent: dto.targetSpreadPercent,
      tickIntervalMs: dto.tickIntervalMs,
      quoteTimeoutMs: dto.quoteTimeoutMs,
      maxQuoteAgeMs: dto.maxQuoteAgeMs,
      gatewayMode: dto.gateway.mode,
      risk: {
        maxPositions: dto.risk.maxPositions,
        sizing: this.toSizingConfig(dto.risk.sizing),
        leverage: dto.risk.leverage,
        stopLossPercent: dto.risk.stopLossPercent,
        takeProfitPercent: dto.risk.takeProfitPercent,
        maxHoldDurationMs: dto.risk.maxHoldDurationMs,
        feeRate: dto.risk.feeRate,
        minFreeBalanceUsd: dto.risk.minFreeBalanceUsd,
        maxDailyLossUsd: dto.risk.maxDailyLossUsd ?? null,
      },
      paper: {
        startingBalanceUsd: dto.gateway.paper.startingBalanceUsd,
        slippageBps: dto.gateway.paper.slippageBps,
      },
      quoteSources: {
        referenceBaseUrl: dto.quoteSources.referenceBaseUrl,
        comparisonBaseUrl: dto.quoteSources.comparisonBaseUrl,
        requestTimeoutMs: dto.quoteSources.requestTimeoutMs,
        comparisonCacheTtlMs: dto.quoteSources.comparisonCacheTtlMs,
        comparisonMaxConcurrency: dto.quoteSources.comparisonMaxConcurrency,
        comparisonMinLiquidityUsd: dto.quoteSources.comparisonMinLiquidityUsd,
        comparisonMinVolumeUsd: dto.quoteSources.comparisonMinVolumeUsd,
        comparisonSearchAliases: {
          ...(dto.quoteSources.comparisonSearchAliases ?? {}),
        },
      },
      reportDir: dto.reportDir,
    };
  }
}
