import { describe, it, expect, beforeEach } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import {
  IAMClient,
  ListRolesCommand,
  ListRoleTagsCommand,
  ListUsersCommand,
  ListUserTagsCommand,
} from '@aws-sdk/client-iam';
import { iamCollector } from '../../../core/collectors/iam.js';
import { CollectorError } from '../../../core/errors.js';
import { awsError, testCollectorContext } from '../../helpers/scan-helpers.js';

const iamMock = mockClient(IAMClient);

describe('IAM collector', () => {
  beforeEach(() => {
    iamMock.reset();
    iamMock.on(ListUsersCommand).resolves({ Users: [] });
    iamMock.on(ListRolesCommand).resolves({ Roles: [] });
  });

  it('should follow role pagination and read tags', async () => {
    iamMock
      .on(ListRolesCommand)
      .resolvesOnce({
        Roles: [
          {
            RoleName: 'deploy',
            RoleId: 'AROADEPLOY',
            Arn: 'arn:aws:iam::123456789012:role/deploy',
            Path: '/',
            CreateDate: new Date('2024-02-01T00:00:00.000Z'),
          },
        ],
        IsTruncated: true,
        Marker: 'next',
      })
      .resolvesOnce({
        Roles: [
          {
            RoleName: 'AWSServiceRoleForSupport',
            RoleId: 'AROASUPPORT',
            Arn: 'arn:aws:iam::123456789012:role/aws-service-role/support.amazonaws.com/AWSServiceRoleForSupport',
            Path: '/aws-service-role/support.amazonaws.com/',
            CreateDate: new Date('2023-01-01T00:00:00.000Z'),
          },
        ],
      });
    iamMock.on(ListRoleTagsCommand, { RoleName: 'deploy' }).resolves({ Tags: [{ Key: 'Team', Value: 'core' }] });
    iamMock.on(ListRoleTagsCommand, { RoleName: 'AWSServiceRoleForSupport' }).resolves({ Tags: [] });

    const records = await iamCollector.collect('us-east-1', testCollectorContext);

    expect(records.map((record) => record.id)).toEqual(['AROADEPLOY', 'AROASUPPORT']);
    expect(records[0]).toEqual({
      service: 'iam',
      type: 'role',
      id: 'AROADEPLOY',
      arn: 'arn:aws:iam::123456789012:role/deploy',
      name: 'deploy',
      region: 'us-east-1',
      details: {
        path: '/',
        description: undefined,
        createDate: '2024-02-01T00:00:00.000Z',
        maxSessionDuration: undefined,
      },
      tags: { Team: 'core' },
    });
    expect(iamMock.commandCalls(ListRolesCommand)[1]?.args[0].input).toEqual({ Marker: 'next' });
  });

  it('should list users after roles', async () => {
    iamMock.on(ListUsersCommand).resolves({
      Users: [
        {
          UserName: 'ci',
          UserId: 'AIDACI',
          Arn: 'arn:aws:iam::123456789012:user/ci',
          Path: '/',
          CreateDate: new Date('2024-03-01T00:00:00.000Z'),
        },
      ],
    });
    iamMock.on(ListUserTagsCommand).resolves({});

    const records = await iamCollector.collect('us-east-1', testCollectorContext);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ type: 'user', id: 'AIDACI', name: 'ci', tags: {} });
  });

  it('should keep roles and users whose tags cannot be read', async () => {
    iamMock.on(ListRolesCommand).resolves({ Roles: [{ RoleName: 'locked', RoleId: 'AROALOCKED' }] });
    iamMock.on(ListRoleTagsCommand).rejects(awsError('AccessDenied', 'not authorized to perform iam:ListRoleTags'));
    iamMock.on(ListUsersCommand).resolves({ Users: [{ UserName: 'gone', UserId: 'AIDAGONE' }] });
    iamMock.on(ListUserTagsCommand).rejects(awsError('NoSuchEntity', 'The user with name gone cannot be found.'));

    const records = await iamCollector.collect('us-east-1', testCollectorContext);

    expect(records.map((record) => `${record.type}:${record.id}`)).toEqual(['role:AROALOCKED', 'user:AIDAGONE']);
    expect(records.map((record) => record.tags)).toEqual([{}, {}]);
  });

  it('should surface access failures as CollectorError', async () => {
    iamMock.on(ListRolesCommand).rejects(awsError('AccessDenied', 'not authorized'));

    const failure = iamCollector.collect('us-east-1', testCollectorContext);

    await expect(failure).rejects.toBeInstanceOf(CollectorError);
    await expect(failure).rejects.toMatchObject({ code: 'access-denied', service: 'iam' });
  });
});
