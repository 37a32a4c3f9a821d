/**
 * Permission Service
 *
 * Decides who may schedule matches and who may run admin commands.
 * Every denial is logged with the member's role names.
 */

import { CommandContext, CommandMember } from '../models/command';
import { ForbiddenError } from '../models/errors';
import { EnvironmentConfig } from '../config/environment';
import { teamForOrg } from '../config/leagues';
import { logAuthorization } from '../utils/logger';

export type PermissionConfig = Pick<
  EnvironmentConfig,
  'bypassSchedulerPermissions' | 'devUserIds' | 'commissionerRoles' | 'gmRoles' | 'orgGmRole' | 'gmOrgMap'
>;

/**
 * Scheduling rights of a member
 *
 * `restricted` members may only schedule their organization's team; `org`
 * is that organization, or null when none is on file for them.
 */
export interface SchedulerAccess {
  allowed: boolean;
  restricted: boolean;
  org: string | null;
}

export class PermissionService {
  constructor(private config: PermissionConfig) {}

  schedulerAccess(member: CommandMember): SchedulerAccess {
    const roles = member.role_names.map((r) => r.trim().toLowerCase());
    const hasAny = (wanted: string[]): boolean => roles.some((r) => wanted.includes(r));

    if (
      this.config.bypassSchedulerPermissions ||
      this.config.devUserIds.includes(member.user_id) ||
      hasAny(this.config.commissionerRoles) ||
      hasAny(this.config.gmRoles)
    ) {
      return { allowed: true, restricted: false, org: null };
    }

    if (this.config.orgGmRole && roles.includes(this.config.orgGmRole)) {
      return { allowed: true, restricted: true, org: this.config.gmOrgMap[member.user_id] ?? null };
    }

    return { allowed: false, restricted: false, org: null };
  }

  /**
   * @throws ForbiddenError when the member may not use the scheduler
   */
  assertCanUseScheduler(ctx: CommandContext): SchedulerAccess {
    const access = this.schedulerAccess(ctx.member);
    if (!access.allowed) {
      this.deny(ctx, 'Missing scheduler role');
      throw new ForbiddenError('You do not have permission to use the scheduler.');
    }
    return access;
  }

  /**
   * @throws ForbiddenError when the member may not schedule this team
   */
  assertCanSchedule(ctx: CommandContext, leagueKey: string, team: string): void {
    const access = this.assertCanUseScheduler(ctx);
    if (!access.restricted) {
      return;
    }
    if (access.org === null) {
      this.deny(ctx, 'Org GM with no organization on file');
      throw new ForbiddenError(
        'No organization is on file for you. Ask an administrator to add you to the GM organization map.'
      );
    }

    const orgTeam = teamForOrg(access.org, leagueKey);
    if (!orgTeam || orgTeam.toLowerCase() !== team.trim().toLowerCase()) {
      this.deny(ctx, `Org GM for ${access.org} scheduling ${team}`);
      throw new ForbiddenError(
        orgTeam
          ? `Org GMs may only schedule matches for their own team (${orgTeam}).`
          : 'Your organization has no team in this league.'
      );
    }
  }

  /**
   * @throws ForbiddenError unless the member is an administrator
   */
  assertAdmin(ctx: CommandContext): void {
    if (!ctx.member.is_admin) {
      this.deny(ctx, 'Missing administrator permission');
      throw new ForbiddenError('This command requires the Administrator or Manage Server permission.');
    }
  }

  private deny(ctx: CommandContext, reason: string): void {
    logAuthorization({
      requestId: ctx.request_id,
      tenantId: ctx.tenant_id,
      userId: ctx.member.user_id,
      success: false,
      command: ctx.command,
      reason,
      userRoles: ctx.member.role_names,
    });
  }
}
