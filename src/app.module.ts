import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { ErrorLogModule } from './error-log/error-log.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    ErrorLogModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
