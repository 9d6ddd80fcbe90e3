/**
 * IAM collector (global, us-east-1 control plane): roles and users
 */

import {
  IAMClient,
  ListRolesCommand,
  ListRoleTagsCommand,
  ListUsersCommand,
  ListUserTagsCommand,
  type Role,
  type User,
} from "@aws-sdk/client-iam";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, optionalLookup, tagsToRecord } from "./utils.js";

async function listRoles(client: IAMClient): Promise<Role[]> {
  const roles: Role[] = [];
  let marker: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListRolesCommand({ Marker: marker }))
    );
    roles.push(...(response.Roles ?? []));
    marker = response.IsTruncated ? response.Marker : undefined;
  } while (marker);

  return roles;
}

async function listUsers(client: IAMClient): Promise<User[]> {
  const users: User[] = [];
  let marker: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListUsersCommand({ Marker: marker }))
    );
    users.push(...(response.Users ?? []));
    marker = response.IsTruncated ? response.Marker : undefined;
  } while (marker);

  return users;
}

export const iamCollector = defineCollector("iam", async (region, context) => {
  const client = new IAMClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const role of await listRoles(client)) {
    if (!role.RoleName || !role.RoleId) continue;

    const roleName = role.RoleName;
    const tagged = await optionalLookup(() =>
      client.send(new ListRoleTagsCommand({ RoleName: roleName }))
    );

    records.push({
      service: "iam",
      type: "role",
      id: role.RoleId,
      arn: role.Arn,
      name: role.RoleName,
      region,
      details: {
        path: role.Path,
        description: role.Description,
        createDate: isoDate(role.CreateDate),
        maxSessionDuration: role.MaxSessionDuration,
      },
      tags: tagsToRecord(tagged?.Tags),
    });
  }

  for (const user of await listUsers(client)) {
    if (!user.UserName || !user.UserId) continue;

    const userName = user.UserName;
    const tagged = await optionalLookup(() =>
      client.send(new ListUserTagsCommand({ UserName: userName }))
    );

    records.push({
      service: "iam",
      type: "user",
      id: user.UserId,
      arn: user.Arn,
      name: user.UserName,
      region,
      details: {
        path: user.Path,
        createDate: isoDate(user.CreateDate),
        passwordLastUsed: isoDate(user.PasswordLastUsed),
      },
      tags: tagsToRecord(tagged?.Tags),
    });
  }

  return records;
});
