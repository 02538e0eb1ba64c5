import {
  LambdaClient,
  CreateFunctionCommand,
  UpdateFunctionCodeCommand,
  UpdateFunctionConfigurationCommand,
  GetFunctionCommand,
  DeleteFunctionCommand,
  AddPermissionCommand,
  RemovePermissionCommand,
  CreateEventSourceMappingCommand,
  GetEventSourceMappingCommand,
  ListEventSourceMappingsCommand,
  DeleteEventSourceMappingCommand,
  type EventSourceMappingConfiguration,
  type FunctionConfiguration,
  Runtime
} from '@aws-sdk/client-lambda';
import AdmZip from 'adm-zip';
import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { basename, join, relative, sep } from 'path';
import { createHash } from 'crypto';
import type { ResourceDetails, ResourceHandle } from '../types';
import { DeploymentStepError, FatalDeploymentError, errorMessage, errorName, isAlreadyExistsError, isNotFoundError } from '../errors';
import type { FunctionInput, ProviderSettings, ProvisionTarget, ProvisioningResult, ResourceProvider } from './types';
import { retryWhile, waitUntil } from './wait';

export interface FunctionPackage {
  zipFile: Buffer;
  sourceSha256: string;
}

export interface PermissionGrant {
  functionName: string;
  statementId: string;
  principal: string;
  sourceArn: string;
}

export interface EventSourceMappingRequest {
  functionName: string;
  eventSourceArn: string;
  batchSize: number;
  startingPosition: 'LATEST' | 'TRIM_HORIZON';
}

export class LambdaManager implements ResourceProvider<FunctionInput> {
  readonly kind = 'function' as const;
  private client: LambdaClient;

  constructor(private readonly settings: ProviderSettings) {
    this.client = new LambdaClient({ region: settings.region, profile: settings.profile });
  }

  async exists(target: ProvisionTarget<FunctionInput>): Promise<boolean> {
    return (await this.getFunctionIfExists(target.name)) !== null;
  }

  /**
   * Create and publish the function; when it already exists, update its code,
   * wait for that update to finish, then update its configuration.
   */
  async create(target: ProvisionTarget<FunctionInput>): Promise<ProvisioningResult> {
    const functionName = target.name;
    const config = target.input;
    const codePackage = this.packageFunction(config.sourcePath, functionName);

    let configuration: FunctionConfiguration;
    let status: ProvisioningResult['status'] = 'created';

    try {
      configuration = await retryWhile(
        () => this.client.send(new CreateFunctionCommand({
          FunctionName: functionName,
          Runtime: this.toRuntime(config.runtime, functionName),
          Role: config.roleArn,
          Handler: config.handler,
          Code: { ZipFile: codePackage.zipFile },
          Timeout: config.timeout,
          MemorySize: config.memorySize,
          Environment: { Variables: config.environment },
          Publish: true,
          Tags: Object.keys(config.tags).length > 0 ? config.tags : undefined
        })),
        isRolePropagationError,
        this.waitOptions(`role ${config.roleArn} to be assumable by Lambda`, functionName)
      );
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        if (error instanceof DeploymentStepError) {
          throw error;
        }
        throw new Error(`Failed to create Lambda function ${functionName}: ${errorMessage(error)}`, { cause: error });
      }
      this.settings.reporter.info(`Function ${functionName} already exists, updating code and configuration`);
      configuration = await this.updateFunction(functionName, config, codePackage);
      status = 'updated';
    }

    const active = await this.waitForActive(functionName);
    return this.toResult({ ...configuration, ...active }, codePackage, status);
  }

  /**
   * Bring a verified function in line with the local package and configuration.
   * Code is only uploaded when the local sources or the deployed package changed.
   */
  async converge(target: ProvisionTarget<FunctionInput>, handle: ResourceHandle): Promise<ProvisioningResult> {
    const functionName = target.name;
    const config = target.input;
    const codePackage = this.packageFunction(config.sourcePath, functionName);
    const current = await this.getFunctionIfExists(functionName);
    if (!current) {
      throw new Error(`Lambda function ${functionName} disappeared while converging`);
    }

    let configuration = current;
    let changed = false;

    const codeUnchanged = handle.details?.sourceSha256 === codePackage.sourceSha256
      && handle.details?.codeSha256 === current.CodeSha256;
    if (!codeUnchanged) {
      configuration = await this.updateFunctionCode(functionName, codePackage);
      changed = true;
    }

    if (this.configurationDiffers(configuration, config)) {
      configuration = await this.updateFunctionConfiguration(functionName, config);
      changed = true;
    }

    return this.toResult(configuration, codePackage, changed ? 'updated' : 'unchanged');
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const configuration = await this.getFunctionIfExists(handle.name);
    if (!configuration) {
      throw new Error(`Lambda function ${handle.name} does not exist`);
    }
    return {
      functionName: handle.name,
      functionArn: this.unqualifiedArn(configuration.FunctionArn ?? handle.identifier),
      codeSha256: configuration.CodeSha256 ?? ''
    };
  }

  /**
   * Remove the function's event source mappings, then the function itself.
   */
  async delete(handle: ResourceHandle): Promise<void> {
    const functionName = handle.name;

    try {
      await this.deleteEventSourceMappings(functionName);
      await this.client.send(new DeleteFunctionCommand({ FunctionName: functionName }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new Error(`Failed to delete Lambda function ${functionName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Grant a service permission to invoke the function.
   * @returns false when a statement with the same id was already present
   */
  async addPermission(grant: PermissionGrant): Promise<boolean> {
    try {
      await this.client.send(new AddPermissionCommand({
        FunctionName: grant.functionName,
        StatementId: grant.statementId,
        Action: 'lambda:InvokeFunction',
        Principal: grant.principal,
        SourceArn: grant.sourceArn
      }));
      return true;
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return false;
      }
      throw new Error(`Failed to add ${grant.principal} permission for ${grant.functionName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async removePermission(functionName: string, statementId: string): Promise<void> {
    try {
      await this.client.send(new RemovePermissionCommand({
        FunctionName: functionName,
        StatementId: statementId
      }));
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }

  async listEventSourceMappings(functionName: string, eventSourceArn?: string): Promise<EventSourceMappingConfiguration[]> {
    const mappings: EventSourceMappingConfiguration[] = [];
    let marker: string | undefined;

    do {
      const page = await this.client.send(new ListEventSourceMappingsCommand({
        FunctionName: functionName,
        EventSourceArn: eventSourceArn,
        Marker: marker
      }));
      mappings.push(...(page.EventSourceMappings ?? []));
      marker = page.NextMarker;
    } while (marker);

    return mappings;
  }

  /**
   * @returns the mapping UUID; an existing mapping for the same source is reused
   */
  async ensureEventSourceMapping(request: EventSourceMappingRequest): Promise<{ uuid: string; created: boolean }> {
    const existing = await this.findEventSourceMapping(request.functionName, request.eventSourceArn);
    if (existing) {
      return { uuid: existing, created: false };
    }

    try {
      const result = await this.client.send(new CreateEventSourceMappingCommand({
        FunctionName: request.functionName,
        EventSourceArn: request.eventSourceArn,
        StartingPosition: request.startingPosition,
        BatchSize: request.batchSize,
        Enabled: true
      }));
      if (!result.UUID) {
        throw new Error('CreateEventSourceMapping returned no UUID');
      }
      return { uuid: result.UUID, created: true };
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw new Error(`Failed to connect ${request.eventSourceArn} to ${request.functionName}: ${errorMessage(error)}`, { cause: error });
      }
      const uuid = await this.findEventSourceMapping(request.functionName, request.eventSourceArn);
      if (!uuid) {
        throw new Error(`Event source mapping for ${request.functionName} reported as existing but was not found`, { cause: error });
      }
      return { uuid, created: false };
    }
  }

  async getEventSourceMapping(uuid: string): Promise<EventSourceMappingConfiguration | null> {
    try {
      return await this.client.send(new GetEventSourceMappingCommand({ UUID: uuid }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async deleteEventSourceMapping(uuid: string): Promise<void> {
    try {
      await this.client.send(new DeleteEventSourceMappingCommand({ UUID: uuid }));
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }

  async deleteEventSourceMappings(functionName: string): Promise<number> {
    const mappings = await this.listEventSourceMappings(functionName);
    for (const mapping of mappings) {
      if (mapping.UUID) {
        await this.deleteEventSourceMapping(mapping.UUID);
        this.settings.reporter.info(`Removed trigger ${mapping.UUID} from ${functionName}`);
      }
    }
    return mappings.length;
  }

  /**
   * Zip a single source file or a directory tree.
   * The source hash covers entry names and contents, so it only changes when the sources do.
   */
  packageFunction(sourcePath: string, functionName: string): FunctionPackage {
    if (!existsSync(sourcePath)) {
      throw new FatalDeploymentError(`Function source not found: ${sourcePath}`, functionName);
    }

    const zip = new AdmZip();
    const hash = createHash('sha256');

    const files = statSync(sourcePath).isDirectory()
      ? this.getFilesRecursively(sourcePath).map(file => ({
        path: file,
        entryName: relative(sourcePath, file).split(sep).join('/')
      }))
      : [{ path: sourcePath, entryName: basename(sourcePath) }];

    for (const file of files.sort((a, b) => a.entryName.localeCompare(b.entryName))) {
      const content = readFileSync(file.path);
      zip.addFile(file.entryName, content);
      hash.update(file.entryName).update('\0').update(content);
    }

    return {
      zipFile: zip.toBuffer(),
      sourceSha256: hash.digest('hex')
    };
  }

  private async updateFunction(functionName: string, config: FunctionInput, codePackage: FunctionPackage): Promise<FunctionConfiguration> {
    await this.updateFunctionCode(functionName, codePackage);
    return this.updateFunctionConfiguration(functionName, config);
  }

  private async updateFunctionCode(functionName: string, codePackage: FunctionPackage): Promise<FunctionConfiguration> {
    try {
      await this.client.send(new UpdateFunctionCodeCommand({
        FunctionName: functionName,
        ZipFile: codePackage.zipFile,
        Publish: true
      }));
    } catch (error) {
      throw new Error(`Failed to update function code for ${functionName}: ${errorMessage(error)}`, { cause: error });
    }
    return this.waitForUpdate(functionName);
  }

  private async updateFunctionConfiguration(functionName: string, config: FunctionInput): Promise<FunctionConfiguration> {
    try {
      await this.client.send(new UpdateFunctionConfigurationCommand({
        FunctionName: functionName,
        Runtime: this.toRuntime(config.runtime, functionName),
        Role: config.roleArn,
        Handler: config.handler,
        Timeout: config.timeout,
        MemorySize: config.memorySize,
        Environment: { Variables: config.environment }
      }));
    } catch (error) {
      throw new Error(`Failed to update function configuration for ${functionName}: ${errorMessage(error)}`, { cause: error });
    }
    return this.waitForUpdate(functionName);
  }

  /**
   * Code and configuration updates cannot overlap; poll until the last one settles.
   */
  private async waitForUpdate(functionName: string): Promise<FunctionConfiguration> {
    return waitUntil(async () => {
      const configuration = await this.getFunctionIfExists(functionName);
      if (!configuration) {
        throw new Error(`Lambda function ${functionName} disappeared during update`);
      }
      if (configuration.LastUpdateStatus === 'Failed') {
        throw new Error(`Update of ${functionName} failed: ${configuration.LastUpdateStatusReason ?? 'unknown reason'}`);
      }
      return configuration.LastUpdateStatus === 'InProgress' ? undefined : configuration;
    }, this.waitOptions(`function ${functionName} update to finish`, functionName));
  }

  private async waitForActive(functionName: string): Promise<FunctionConfiguration> {
    return waitUntil(async () => {
      const configuration = await this.getFunctionIfExists(functionName);
      if (!configuration) {
        return undefined;
      }
      if (configuration.State === 'Failed') {
        throw new Error(`Function ${functionName} failed to activate: ${configuration.StateReason ?? 'unknown reason'}`);
      }
      return configuration.State === 'Pending' ? undefined : configuration;
    }, this.waitOptions(`function ${functionName} to become active`, functionName));
  }

  private async getFunctionIfExists(functionName: string): Promise<FunctionConfiguration | null> {
    try {
      const result = await this.client.send(new GetFunctionCommand({ FunctionName: functionName }));
      return result.Configuration ?? null;
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async findEventSourceMapping(functionName: string, eventSourceArn: string): Promise<string | undefined> {
    const mappings = await this.listEventSourceMappings(functionName, eventSourceArn);
    return mappings.find(mapping => mapping.EventSourceArn === eventSourceArn && mapping.State !== 'Deleting')?.UUID;
  }

  private configurationDiffers(current: FunctionConfiguration, config: FunctionInput): boolean {
    const currentVariables = current.Environment?.Variables ?? {};
    const desiredVariables = config.environment;
    const variablesDiffer = Object.keys(currentVariables).length !== Object.keys(desiredVariables).length
      || Object.entries(desiredVariables).some(([key, value]) => currentVariables[key] !== value);

    return variablesDiffer
      || current.Role !== config.roleArn
      || current.Handler !== config.handler
      || current.Runtime !== config.runtime
      || current.Timeout !== config.timeout
      || current.MemorySize !== config.memorySize;
  }

  private toResult(configuration: FunctionConfiguration, codePackage: FunctionPackage, status: ProvisioningResult['status']): ProvisioningResult {
    if (!configuration.FunctionArn || !configuration.FunctionName) {
      throw new Error('Lambda returned a function without an ARN');
    }
    const functionArn = this.unqualifiedArn(configuration.FunctionArn);
    return {
      identifier: functionArn,
      status,
      details: {
        functionName: configuration.FunctionName,
        functionArn,
        sourceSha256: codePackage.sourceSha256,
        codeSha256: configuration.CodeSha256 ?? ''
      }
    };
  }

  /**
   * S3 and event source mappings reject version-qualified ARNs; always hand out the base ARN.
   */
  private unqualifiedArn(functionArn: string): string {
    const parts = functionArn.split(':');
    return parts.length > 7 ? parts.slice(0, 7).join(':') : functionArn;
  }

  private toRuntime(runtime: string, functionName: string): Runtime {
    const match = Object.values(Runtime).find(value => value === runtime);
    if (!match) {
      throw new FatalDeploymentError(`Unsupported Lambda runtime: ${runtime}`, functionName);
    }
    return match;
  }

  private waitOptions(description: string, resource: string) {
    return {
      timeoutMs: this.settings.propagationTimeoutMs,
      intervalMs: this.settings.propagationIntervalMs,
      description,
      resource
    };
  }

  private getFilesRecursively(dir: string): string[] {
    const files: string[] = [];

    for (const item of readdirSync(dir)) {
      const fullPath = join(dir, item);
      if (statSync(fullPath).isDirectory()) {
        files.push(...this.getFilesRecursively(fullPath));
      } else {
        files.push(fullPath);
      }
    }

    return files;
  }
}

/**
 * A freshly created or updated role is not immediately assumable by Lambda.
 */
export function isRolePropagationError(error: unknown): boolean {
  return errorName(error) === 'InvalidParameterValueException' && /role/i.test(errorMessage(error));
}
