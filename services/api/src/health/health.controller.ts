import { Controller, Get } from '@nestjs/common';
import { PROTOCOL_VERSION } from '@parley/shared';
import { SessionsService } from '../sessions/sessions.service';

interface HealthResponse {
  status: string;
  timestamp: string;
  version: string;
  protocol: number;
  uptime: number;
  sessions: number;
}

@Controller('health')
export class HealthController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      protocol: PROTOCOL_VERSION,
      uptime: process.uptime(),
      sessions: this.sessionsService.count(),
    };
  }

  @Get('ready')
  ready(): { ready: boolean } {
    return { ready: true };
  }

  @Get('live')
  live(): { live: boolean } {
    return { live: true };
  }
}
