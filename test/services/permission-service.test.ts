/**
 * Permission Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { PermissionService } from '../../src/services/permission-service';
import { EnvironmentConfig } from '../../src/config/environment';
import { CommandContext, CommandMember } from '../../src/models/command';
import { ForbiddenError } from '../../src/models/errors';
import { testConfig } from '../helpers/fakes';

function member(overrides: Partial<CommandMember> = {}): CommandMember {
  return { user_id: '200', role_names: [], is_admin: false, ...overrides };
}

function context(overrides: Partial<CommandMember> = {}): CommandContext {
  return {
    request_id: 'req-1',
    command: 'schedule',
    tenant_id: '100',
    channel_id: '900',
    member: member(overrides),
    options: {},
  };
}

describe('PermissionService', () => {
  let consoleLogSpy: jest.SpyInstance;

  function service(overrides: Partial<EnvironmentConfig> = {}): PermissionService {
    return new PermissionService(testConfig(overrides));
  }

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('schedulerAccess', () => {
    it('should allow commissioners and GMs without restriction', () => {
      expect(service().schedulerAccess(member({ role_names: [' Commissioner '] }))).toEqual({
        allowed: true,
        restricted: false,
        org: null,
      });
      expect(service().schedulerAccess(member({ role_names: ['GM'] }))).toEqual({
        allowed: true,
        restricted: false,
        org: null,
      });
    });

    it('should allow developers and the bypass switch', () => {
      expect(service({ devUserIds: ['200'] }).schedulerAccess(member()).allowed).toBe(true);
      expect(service({ bypassSchedulerPermissions: true }).schedulerAccess(member()).allowed).toBe(true);
    });

    it('should restrict org GMs to their organization', () => {
      const access = service({ gmOrgMap: { '200': 'angels' } }).schedulerAccess(member({ role_names: ['Org GM'] }));

      expect(access).toEqual({ allowed: true, restricted: true, org: 'angels' });
    });

    it('should keep an org GM with no organization on file restricted', () => {
      expect(service().schedulerAccess(member({ role_names: ['org gm'] }))).toEqual({
        allowed: true,
        restricted: true,
        org: null,
      });
    });

    it('should deny everyone else', () => {
      expect(service().schedulerAccess(member({ role_names: ['Member'] }))).toEqual({
        allowed: false,
        restricted: false,
        org: null,
      });
    });
  });

  describe('assertCanSchedule', () => {
    it("should accept the org's own team in either league", () => {
      const permissions = service({ gmOrgMap: { '200': 'angels' } });
      const ctx = context({ role_names: ['Org GM'] });

      expect(() => permissions.assertCanSchedule(ctx, 'champion', ' angels')).not.toThrow();
      expect(() => permissions.assertCanSchedule(ctx, 'challenger', 'Saints')).not.toThrow();
    });

    it('should name the team an org GM may schedule', () => {
      const permissions = service({ gmOrgMap: { '200': 'angels' } });

      expect(() => permissions.assertCanSchedule(context({ role_names: ['Org GM'] }), 'champion', 'Devils')).toThrow(
        new ForbiddenError('Org GMs may only schedule matches for their own team (Angels).')
      );
    });

    it('should refuse an organization without a team in the league', () => {
      const permissions = service({ gmOrgMap: { '200': 'pirates' } });

      expect(() => permissions.assertCanSchedule(context({ role_names: ['Org GM'] }), 'champion', 'Pirates')).toThrow(
        'Your organization has no team in this league.'
      );
    });

    it('should refuse an org GM with no organization on file', () => {
      expect(() => service().assertCanSchedule(context({ role_names: ['Org GM'] }), 'champion', 'Angels')).toThrow(
        new ForbiddenError(
          'No organization is on file for you. Ask an administrator to add you to the GM organization map.'
        )
      );

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toMatchObject({
        log_type: 'AUTHORIZATION',
        success: false,
        reason: 'Org GM with no organization on file',
      });
    });

    it('should log denials with the member roles', () => {
      expect(() => service().assertCanSchedule(context({ role_names: ['Member'] }), 'champion', 'Angels')).toThrow(
        'You do not have permission to use the scheduler.'
      );

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toMatchObject({
        level: 'WARN',
        log_type: 'AUTHORIZATION',
        request_id: 'req-1',
        tenant_id: '100',
        user_id: '200',
        success: false,
        command: 'schedule',
        reason: 'Missing scheduler role',
        user_roles: ['Member'],
      });
    });
  });

  describe('assertAdmin', () => {
    it('should allow administrators only', () => {
      expect(() => service().assertAdmin(context({ is_admin: true }))).not.toThrow();
      expect(() => service().assertAdmin(context({ role_names: ['Commissioner'] }))).toThrow(
        'This command requires the Administrator or Manage Server permission.'
      );
    });
  });
});
