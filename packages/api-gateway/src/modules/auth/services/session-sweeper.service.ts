import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { UNIT_OF_WORK } from '../constants/auth.constants';
import { ok } from '../interfaces/auth-result.interface';
import { UnitOfWork } from '../interfaces/identity-stores.interface';

export interface SweepSummary {
  sessions: number;
  verificationCodes: number;
}

@Injectable()
export class SessionSweeperService {
  private readonly logger = new Logger(SessionSweeperService.name);

  constructor(@Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork) {}

  @Cron(CronExpression.EVERY_30_MINUTES, { name: 'identity-sweep' })
  async handleCron(): Promise<void> {
    try {
      await this.sweep();
    } catch (error) {
      this.logger.error(
        `Expired record sweep failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  async sweep(now: Date = new Date()): Promise<SweepSummary> {
    const result = await this.unitOfWork.run<SweepSummary>(async stores =>
      ok({
        sessions: await stores.sessions.deleteExpired(now),
        verificationCodes: await stores.verificationCodes.deleteExpired(now),
      }),
    );
    const summary = result.ok ? result.value : { sessions: 0, verificationCodes: 0 };
    if (summary.sessions > 0 || summary.verificationCodes > 0) {
      this.logger.log(
        `Removed ${summary.sessions} expired session(s) and ${summary.verificationCodes} verification code(s)`,
      );
    }
    return summary;
  }
}
