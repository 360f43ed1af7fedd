import { Controller, Get, Logger, ServiceUnavailableException } from '@nestjs/common';
import {
  ApiOperation,
  ApiProperty,
  ApiPropertyOptional,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';
import { EnvConfigService } from '@infrastructure/config/env-config.service';

export class DatabaseStatusDto {
  @ApiProperty({ enum: ['healthy', 'unhealthy'] })
  status!: 'healthy' | 'unhealthy';

  @ApiProperty({ example: 'connected' })
  connection!: string;

  @ApiPropertyOptional({ example: 3 })
  responseTimeMs?: number;
}

export class HealthReportDto {
  @ApiProperty({ enum: ['healthy', 'unhealthy'] })
  status!: 'healthy' | 'unhealthy';

  @ApiProperty({ format: 'date-time' })
  timestamp!: string;

  @ApiProperty({ example: '1.0.0' })
  version!: string;

  @ApiProperty({ description: 'Uptime in seconds' })
  uptime!: number;

  @ApiProperty({ example: 'development' })
  environment!: string;

  @ApiProperty({ type: DatabaseStatusDto })
  database!: DatabaseStatusDto;
}

@ApiTags('Health')
@SkipThrottle()
@Controller('api/v1/health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);
  private readonly startedAt = Date.now();

  constructor(
    private readonly envConfig: EnvConfigService,
    @InjectConnection() private readonly mongoConnection: Connection,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'Reports uptime and whether MongoDB answers a ping.',
  })
  @ApiResponse({ status: 200, type: HealthReportDto })
  async healthCheck(): Promise<HealthReportDto> {
    const database = await this.checkDatabase();

    return {
      status: database.status,
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? '1.0.0',
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      environment: this.envConfig.nodeEnv,
      database,
    };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'The process is up' })
  live(): { status: 'alive' } {
    return { status: 'alive' };
  }

  // Answers 503 until MongoDB is reachable
  @Get('ready')
  @ApiOperation({ summary: 'Readiness probe' })
  @ApiResponse({ status: 200, description: 'Ready to serve requests' })
  @ApiResponse({ status: 503, description: 'MongoDB is not reachable' })
  async ready(): Promise<{ status: 'ready' }> {
    const database = await this.checkDatabase();
    if (database.status !== 'healthy') {
      throw new ServiceUnavailableException(`MongoDB is ${database.connection}`);
    }
    return { status: 'ready' };
  }

  private async checkDatabase(): Promise<DatabaseStatusDto> {
    const state = this.mongoConnection.readyState;
    const connection = ConnectionStates[state] ?? 'unknown';
    if (state !== ConnectionStates.connected) {
      return { status: 'unhealthy', connection };
    }

    const startTime = Date.now();
    try {
      await this.mongoConnection.db?.admin().ping();
      return { status: 'healthy', connection, responseTimeMs: Date.now() - startTime };
    } catch (error) {
      this.logger.warn(`MongoDB ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return { status: 'unhealthy', connection };
    }
  }
}
