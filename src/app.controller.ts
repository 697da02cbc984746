import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';
import { HealthCheckResponseDto } from './common/dto/health-check-response.dto';
import { EngineStatusResponseDto } from './common/dto/engine-status-response.dto';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @ApiOperation({ summary: 'System health check' })
  @ApiOkResponse({ type: HealthCheckResponseDto })
  getHealth(): HealthCheckResponseDto {
    return this.appService.getHealth();
  }

  @Get('status')
  @ApiOperation({ summary: 'Gateway mode, open positions and session stats' })
  @ApiOkResponse({ type: EngineStatusResponseDto })
  getStatus(): EngineStatusResponseDto {
    return this.appService.getStatus();
  }
}
