import { ApiProperty } from '@nestjs/swagger';

export class HealthStatusDto {
  @ApiProperty({ example: 'ok', enum: ['ok', 'stopped'] })
  status!: 'ok' | 'stopped';

  @ApiProperty({ example: 'spread-arbitrage-engine' })
  service!: string;

  @ApiProperty({ example: 'test', enum: ['test', 'live'] })
  gatewayMode!: string;
}

export class HealthCheckResponseDto {
  @ApiProperty({ type: HealthStatusDto })
  data!: HealthStatusDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
