import { ApiProperty } from '@nestjs/swagger';

export class OpenPositionDto {
  @ApiProperty({ description: 'Position ID' })
  positionId!: string;

  @ApiProperty({ example: 'BTC/USDT' })
  symbol!: string;

  @ApiProperty({ enum: ['long', 'short'] })
  side!: string;

  @ApiProperty({ description: 'Base-asset size (decimal string)', example: '0.0022' })
  size!: string;

  @ApiProperty({ description: 'Entry price (decimal string)', example: '45000' })
  entryPrice!: string;

  @ApiProperty({ description: 'Spread at entry, percent (decimal string)', example: '7.78' })
  entrySpread!: string;

  @ApiProperty({ description: 'Stop-loss price (decimal string)' })
  stopLossPrice!: string;

  @ApiProperty({ description: 'Take-profit price (decimal string)' })
  takeProfitPrice!: string;

  @ApiProperty({ description: 'Entry time (ISO 8601)' })
  entryTime!: string;

  @ApiProperty({ enum: ['OPEN', 'CLOSING', 'CLOSED'] })
  status!: string;

  @ApiProperty({ description: 'Whether this is a paper trading position' })
  isPaper!: boolean;
}

export class SessionStatsDto {
  @ApiProperty()
  totalTrades!: number;

  @ApiProperty()
  winningTrades!: number;

  @ApiProperty({ description: 'Winning trades over total trades, percent' })
  winRate!: number;

  @ApiProperty({ description: 'Cumulative realized PnL in USD (decimal string)' })
  totalPnl!: string;

  @ApiProperty({ description: 'Realized PnL since the last UTC reset (decimal string)' })
  dailyPnl!: string;

  @ApiProperty()
  dailyTradeCount!: number;

  @ApiProperty({ description: 'UTC date of the last daily reset', example: '2024-01-01' })
  lastResetDate!: string;

  @ApiProperty()
  opportunitiesDetected!: number;

  @ApiProperty({ description: 'Session start (ISO 8601)' })
  startedAt!: string;
}

export class EngineStatusDto {
  @ApiProperty({ enum: ['test', 'live'] })
  gatewayMode!: string;

  @ApiProperty({ description: 'Whether the polling loop is scheduled' })
  running!: boolean;

  @ApiProperty({ description: 'Whether a tick is executing right now' })
  tickInProgress!: boolean;

  @ApiProperty({ type: [OpenPositionDto] })
  openPositions!: OpenPositionDto[];

  @ApiProperty({ type: SessionStatsDto })
  stats!: SessionStatsDto;
}

export class EngineStatusResponseDto {
  @ApiProperty({ type: EngineStatusDto })
  data!: EngineStatusDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
