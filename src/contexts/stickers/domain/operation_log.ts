/**
 * Operation Log Model
 *
 * Audit trail of uploads and description edits, kept per sticker.
 */

import {
  Model,
  validators,
  readRecord,
  field,
  type KvKey,
  type ModelDefinition,
} from '../../../../framework/orm/mod.ts';

export type OperationType = 'upload' | 'update_description';

export const OPERATION_TYPES: readonly OperationType[] = ['upload', 'update_description'];

export interface OperationLogData {
  stickerId: string;
  operation: OperationType;
  ipAddress: string;
  userAgent?: string;
  oldDescription?: string;
  newDescription?: string;
  operationTime: string;
}

export type CreateOperationLogParams = Omit<OperationLogData, 'operationTime'>;

export const IP_ADDRESS_MAX_LENGTH = 50;
export const USER_AGENT_MAX_LENGTH = 255;

/**
 * Operation log model
 */
export class OperationLog extends Model<OperationLogData> {
  static readonly definition: ModelDefinition = {
    name: 'OperationLog',
    prefix: 'operation_logs',
    fields: {
      stickerId: { type: 'string', required: true },
      operation: { type: 'string', required: true, validate: [validators.oneOf(OPERATION_TYPES)] },
      ipAddress: { type: 'string', required: true, validate: [validators.maxLength(IP_ADDRESS_MAX_LENGTH)] },
      userAgent: { type: 'string', validate: [validators.maxLength(USER_AGENT_MAX_LENGTH)] },
      oldDescription: { type: 'string' },
      newDescription: { type: 'string' },
      operationTime: { type: 'string', required: true },
    },
  };

  protected override get definition(): ModelDefinition {
    return OperationLog.definition;
  }

  static create(params: CreateOperationLogParams): OperationLog {
    return new OperationLog({
      ...params,
      ipAddress: params.ipAddress.slice(0, IP_ADDRESS_MAX_LENGTH),
      userAgent: params.userAgent?.slice(0, USER_AGENT_MAX_LENGTH),
      operationTime: new Date().toISOString(),
    });
  }

  static fromRecord(value: unknown, versionstamp: string | null = null): OperationLog {
    const record = readRecord(value);
    const optionalString = (name: string): string | undefined => {
      const item = record.get(name);
      return typeof item === 'string' ? item : undefined;
    };

    return new OperationLog(
      {
        stickerId: field.string(record, 'stickerId'),
        operation: field.oneOf(record, 'operation', OPERATION_TYPES),
        ipAddress: field.string(record, 'ipAddress'),
        userAgent: optionalString('userAgent'),
        oldDescription: optionalString('oldDescription'),
        newDescription: optionalString('newDescription'),
        operationTime: field.string(record, 'operationTime'),
      },
      {
        id: field.string(record, 'id'),
        createdAt: field.date(record, 'createdAt'),
        updatedAt: field.date(record, 'updatedAt'),
        versionstamp,
      }
    );
  }

  /**
   * Logs are grouped under their sticker
   */
  override get key(): KvKey {
    return [OperationLog.definition.prefix, this.data.stickerId, this.id];
  }

  get stickerId(): string {
    return this.data.stickerId;
  }

  get operation(): OperationType {
    return this.data.operation;
  }

  get ipAddress(): string {
    return this.data.ipAddress;
  }

  get userAgent(): string | undefined {
    return this.data.userAgent;
  }

  get oldDescription(): string | undefined {
    return this.data.oldDescription;
  }

  get newDescription(): string | undefined {
    return this.data.newDescription;
  }
}
