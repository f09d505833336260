import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { RedisService } from '../redis/redis.service';

interface HealthResponse {
  status: string;
  timestamp: string;
  version: string;
  uptime: number;
}

interface ReadinessResponse {
  ready: boolean;
  database: boolean;
  fanout: 'connected' | 'disconnected' | 'disabled';
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly dataSource: DataSource,
    private readonly redisService: RedisService
  ) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      uptime: process.uptime(),
    };
  }

  /**
   * Ready when the database answers. A lost fanout connection degrades
   * cross-process delivery but does not take the process out of rotation.
   */
  @Get('ready')
  async ready(): Promise<ReadinessResponse> {
    const database = await this.pingDatabase();
    const fanout = !this.redisService.isEnabled()
      ? 'disabled'
      : this.redisService.isConnected()
        ? 'connected'
        : 'disconnected';

    const response: ReadinessResponse = { ready: database, database, fanout };
    if (!database) {
      throw new ServiceUnavailableException(response);
    }
    return response;
  }

  @Get('live')
  live(): { live: boolean } {
    return { live: true };
  }

  private async pingDatabase(): Promise<boolean> {
    if (!this.dataSource.isInitialized) return false;
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }
}
