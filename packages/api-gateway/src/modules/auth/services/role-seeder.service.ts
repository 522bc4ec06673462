import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ROLE_NAMES, UNIT_OF_WORK } from '../constants/auth.constants';
import { ok } from '../interfaces/auth-result.interface';
import { UnitOfWork } from '../interfaces/identity-stores.interface';

/**
 * Inserts the fixed role rows before the HTTP server accepts traffic.
 * Sign-up and OAuth never create roles themselves.
 */
@Injectable()
export class RoleSeederService implements OnApplicationBootstrap {
  private readonly logger = new Logger(RoleSeederService.name);

  constructor(@Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.seed();
  }

  async seed(): Promise<number> {
    const result = await this.unitOfWork.run<number>(async stores =>
      ok(await stores.roles.ensureSeeded(ROLE_NAMES)),
    );
    const created = result.ok ? result.value : 0;
    if (created > 0) {
      this.logger.log(`Seeded ${created} role(s)`);
    }
    return created;
  }
}
