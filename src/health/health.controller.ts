import { Controller, Get, Logger } from '@nestjs/common';
import { ErrorLog } from '../error-log/error-log';
import { describeCause } from '../error-log/error-log.errors';

@Controller()
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(private readonly errors: ErrorLog) {}

  private buildMeta() {
    return {
      version: process.env.VERSION || process.env.npm_package_version || '0.0.0',
      gitSha: process.env.GIT_SHA || 'unknown',
    };
  }

  @Get('health')
  health() {
    return { status: 'ok', ...this.buildMeta() };
  }

  @Get('ready')
  async ready() {
    let store = 'down';
    try {
      // a count-only read touches the backend without loading rows
      await this.errors.getErrors(0, 0);
      store = 'up';
    } catch (e) {
      this.logger.warn(`Error store not ready: ${describeCause(e)}`);
    }
    return { status: store === 'up' ? 'ok' : 'degraded', store, ...this.buildMeta() };
  }
}
