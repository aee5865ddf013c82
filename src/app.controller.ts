import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';
import type { BaseResponse, HealthCheckResponse } from './types/common';

@ApiTags('System')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({ summary: 'Service greeting' })
  getHello(): BaseResponse<string> {
    return { success: true, message: 'Service is running', data: this.appService.getHello() };
  }

  /**
   * Liveness and database connectivity
   */
  @Get('health')
  @ApiOperation({ summary: 'Health check' })
  getHealth(): BaseResponse<HealthCheckResponse> {
    return {
      success: true,
      message: 'Health check completed',
      data: this.appService.getHealthCheck(),
    };
  }
}
