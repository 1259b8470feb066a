import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { ScreeningModule } from './screening/screening.module';

@Module({
  imports: [ConfigModule, ScreeningModule, HealthModule],
})
export class AppModule {}
