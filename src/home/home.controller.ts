import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import {
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthReport, HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Get Application Information' })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: { name: { type: 'string', example: 'DocShare Core API' } },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @ApiOperation({
    summary: 'Health Check',
    description: 'Database and blob store reachability. Public endpoint.',
  })
  @ApiOkResponse({ description: 'All components healthy' })
  @ApiServiceUnavailableResponse({ description: 'A component is unhealthy' })
  async health(): Promise<HealthReport> {
    const report = await this.healthService.check();
    if (report.status !== 'ok') {
      throw new ServiceUnavailableException(report);
    }
    return report;
  }
}
