import { Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Roles } from '../decorators/roles.decorator';
import { RoleSeederService } from '../services/role-seeder.service';
import { SessionSweeperService, SweepSummary } from '../services/session-sweeper.service';

export interface SeedRolesResponse {
  created: number;
}

/**
 * On-demand runs of the scheduled and bootstrap jobs, for operators
 */
@ApiTags('maintenance')
@ApiBearerAuth()
@Roles('admin')
@Controller('v1/auth/maintenance')
export class MaintenanceController {
  constructor(
    private readonly sweeper: SessionSweeperService,
    private readonly roleSeeder: RoleSeederService,
  ) {}

  @Post('sweep')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete expired sessions and verification codes now' })
  async sweep(): Promise<SweepSummary> {
    return this.sweeper.sweep();
  }

  @Post('seed-roles')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Insert any missing fixed roles' })
  async seedRoles(): Promise<SeedRolesResponse> {
    return { created: await this.roleSeeder.seed() };
  }
}
