import { Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { AllExceptionsFilter } from './all-exceptions.filter';
import { ErrorLog } from './error-log';
import { loadErrorLogConfig } from './error-log.config';
import { ErrorsController } from './errors.controller';
import { postgresErrorStoreFactory } from './postgres-error.store';

@Module({
  providers: [
    {
      provide: ErrorLog,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const { options, store } = loadErrorLogConfig(config);
        return new ErrorLog(options, postgresErrorStoreFactory(store));
      },
    },
    { provide: APP_FILTER, useClass: AllExceptionsFilter },
  ],
  exports: [ErrorLog],
  controllers: [ErrorsController],
})
export class ErrorLogModule implements OnModuleDestroy {
  constructor(private readonly errorLog: ErrorLog) {}

  async onModuleDestroy() {
    await this.errorLog.close();
  }
}
