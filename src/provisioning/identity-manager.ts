import { IAMClient, GetRoleCommand, type Role } from '@aws-sdk/client-iam';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { ResourceDetails, ResourceHandle } from '../types';
import { FatalDeploymentError, errorMessage, isAccessDeniedError, isNotFoundError } from '../errors';
import type { ProviderSettings, ProvisionTarget, ProvisioningResult, ResourceProvider, RoleInput } from './types';
import { parseArn } from './arn';
import { waitUntil } from './wait';

export interface CallerIdentity {
  accountId: string;
  partition: string;
}

/**
 * The execution role is owned outside this deployment: it is resolved and
 * waited for, never created or deleted.
 */
export class IdentityManager implements ResourceProvider<RoleInput> {
  readonly kind = 'role' as const;
  private iam: IAMClient;
  private sts: STSClient;
  private identity?: CallerIdentity;

  constructor(private readonly settings: ProviderSettings) {
    this.iam = new IAMClient({ region: settings.region, profile: settings.profile });
    this.sts = new STSClient({ region: settings.region, profile: settings.profile });
  }

  async exists(target: ProvisionTarget<RoleInput>): Promise<boolean> {
    try {
      return (await this.getRoleIfExists(target.input.roleName)) !== null;
    } catch (error) {
      if (isAccessDeniedError(error)) {
        return true;
      }
      throw error;
    }
  }

  async create(target: ProvisionTarget<RoleInput>): Promise<ProvisioningResult> {
    const roleName = target.input.roleName;
    const identity = await this.getCallerIdentity();
    const roleArn = this.roleArn(identity, roleName);

    try {
      await waitUntil(async () => ((await this.getRoleIfExists(roleName)) ? true : undefined), {
        timeoutMs: this.settings.propagationTimeoutMs,
        intervalMs: this.settings.propagationIntervalMs,
        description: `IAM role ${roleName} to become visible`,
        resource: roleName
      });
    } catch (error) {
      if (!isAccessDeniedError(error)) {
        throw error;
      }
      this.settings.reporter.warn(`Cannot read IAM role ${roleName} (${errorMessage(error)}); assuming it exists`);
    }

    return {
      identifier: roleArn,
      status: 'unchanged',
      details: { roleName, roleArn, ...identity }
    };
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const identity = await this.getCallerIdentity();
    return {
      roleName: handle.name,
      roleArn: handle.identifier,
      ...identity
    };
  }

  async delete(handle: ResourceHandle): Promise<void> {
    this.settings.reporter.info(`Leaving externally managed role ${handle.name} in place`);
  }

  async getCallerIdentity(): Promise<CallerIdentity> {
    if (this.identity) {
      return this.identity;
    }

    const result = await this.sts.send(new GetCallerIdentityCommand({}));
    if (!result.Account || !result.Arn) {
      throw new FatalDeploymentError('STS returned no caller identity');
    }

    this.identity = {
      accountId: result.Account,
      partition: parseArn(result.Arn).partition
    };
    return this.identity;
  }

  private roleArn(identity: CallerIdentity, roleName: string): string {
    return `arn:${identity.partition}:iam::${identity.accountId}:role/${roleName}`;
  }

  private async getRoleIfExists(roleName: string): Promise<Role | null> {
    try {
      const result = await this.iam.send(new GetRoleCommand({ RoleName: roleName }));
      return result.Role ?? null;
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }
}
