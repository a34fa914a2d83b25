import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { SessionsModule } from '../sessions/sessions.module';

@Module({
  imports: [SessionsModule],
  controllers: [HealthController],
})
export class HealthModule {}
