/**
 * Tag Model
 *
 * Tags are keyed by name and count the stickers linking them.
 */

import {
  Model,
  validators,
  readRecord,
  field,
  type ModelDefinition,
} from '../../../../framework/orm/mod.ts';

export const TAG_NAME_MAX_LENGTH = 10;

/** Tag linked automatically when the describer finds text in an image */
export const TEXT_TAG = 'has-text';

export interface TagData {
  name: string;
  usageCount: number;
}

/**
 * Tag model
 */
export class Tag extends Model<TagData> {
  static readonly definition: ModelDefinition = {
    name: 'Tag',
    prefix: 'tags',
    fields: {
      name: {
        type: 'string',
        required: true,
        validate: [validators.minLength(1), validators.maxLength(TAG_NAME_MAX_LENGTH)],
      },
      usageCount: { type: 'number', required: true, validate: [validators.integer(), validators.min(0)] },
    },
  };

  protected override get definition(): ModelDefinition {
    return Tag.definition;
  }

  static create(name: string): Tag {
    return new Tag({ name, usageCount: 0 }, { id: name });
  }

  static fromRecord(value: unknown, versionstamp: string | null = null): Tag {
    const record = readRecord(value);
    const name = field.string(record, 'name');

    return new Tag(
      { name, usageCount: field.number(record, 'usageCount', 0) },
      {
        id: name,
        createdAt: field.date(record, 'createdAt'),
        updatedAt: field.date(record, 'updatedAt'),
        versionstamp,
      }
    );
  }

  get name(): string {
    return this.data.name;
  }

  get usageCount(): number {
    return this.data.usageCount;
  }

  /**
   * Shift the usage count, never below zero
   */
  adjustUsage(delta: number): number {
    this.data.usageCount = Math.max(0, this.data.usageCount + delta);
    return this.data.usageCount;
  }
}
