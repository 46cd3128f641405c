import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import {
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { Response } from 'express';
import { AppInfo, HomeService } from './home.service';
import { DatabaseHealth, HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private readonly service: HomeService,
    private readonly healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Service name and purpose. Public, no API key required.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'hospitalization-summary-api' },
        description: { type: 'string' },
      },
    },
  })
  appInfo(): AppInfo {
    return this.service.appInfo();
  }

  @Get('health/database')
  @ApiOperation({
    summary: 'Database Health Check',
    description:
      'Runs SELECT 1 against PostgreSQL. Answers 503 when the check fails so load balancers can drain the instance.',
  })
  @ApiOkResponse({
    description: 'Database reachable',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        latencyMs: { type: 'number', example: 3 },
      },
    },
  })
  @ApiServiceUnavailableResponse({ description: 'Database unreachable' })
  async databaseHealth(
    @Res({ passthrough: true }) res: Response,
  ): Promise<DatabaseHealth> {
    const health = await this.healthService.checkDatabaseHealth();
    if (health.status === 'unhealthy') {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }
    return health;
  }
}
