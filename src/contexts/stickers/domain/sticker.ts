/**
 * Sticker Model
 *
 * A collected DORO image: where it is hosted, how it was described,
 * the votes it received and the tags linked to it.
 */

import {
  Model,
  validators,
  readRecord,
  field,
  type ModelDefinition,
  type ModelMeta,
} from '../../../../framework/orm/mod.ts';

export type VoteAction = 'like' | 'dislike';

export const VOTE_ACTIONS: readonly VoteAction[] = ['like', 'dislike'];

export const MD5_PATTERN = /^[a-f0-9]{32}$/;
export const DESCRIPTION_MAX_LENGTH = 20;

export interface StickerData {
  md5: string;
  url: string;
  description: string;
  likes: number;
  dislikes: number;
  doroConfidence: number;
  /** Names of linked tags */
  tags: string[];
  width?: number;
  height?: number;
  fileSize?: number;
}

export interface CreateStickerParams {
  md5: string;
  url: string;
  description: string;
  doroConfidence: number;
  tags?: string[];
  width?: number;
  height?: number;
  fileSize?: number;
}

/**
 * Sticker model
 */
export class Sticker extends Model<StickerData> {
  static readonly definition: ModelDefinition = {
    name: 'Sticker',
    prefix: 'stickers',
    fields: {
      md5: {
        type: 'string',
        required: true,
        validate: [validators.pattern(MD5_PATTERN, 'md5 must be 32 lowercase hex characters')],
      },
      url: {
        type: 'string',
        required: true,
        validate: [validators.url(), validators.maxLength(255)],
      },
      description: {
        type: 'string',
        required: true,
        validate: [validators.maxLength(DESCRIPTION_MAX_LENGTH)],
      },
      likes: { type: 'number', required: true, validate: [validators.integer(), validators.min(0)] },
      dislikes: { type: 'number', required: true, validate: [validators.integer(), validators.min(0)] },
      doroConfidence: {
        type: 'number',
        required: true,
        validate: [validators.min(0), validators.max(1)],
      },
      tags: { type: 'array', required: true },
      width: { type: 'number', validate: [validators.min(0)] },
      height: { type: 'number', validate: [validators.min(0)] },
      fileSize: { type: 'number', validate: [validators.min(0)] },
    },
  };

  protected override get definition(): ModelDefinition {
    return Sticker.definition;
  }

  /**
   * Create a new sticker with no votes
   */
  static create(params: CreateStickerParams): Sticker {
    return new Sticker({
      md5: params.md5,
      url: params.url,
      description: params.description,
      likes: 0,
      dislikes: 0,
      doroConfidence: params.doroConfidence,
      tags: [...new Set(params.tags ?? [])],
      width: params.width,
      height: params.height,
      fileSize: params.fileSize,
    });
  }

  /**
   * Reconstitute a sticker from its stored record
   */
  static fromRecord(value: unknown, versionstamp: string | null = null): Sticker {
    const record = readRecord(value);
    const meta: ModelMeta = {
      id: field.string(record, 'id'),
      createdAt: field.date(record, 'createdAt'),
      updatedAt: field.date(record, 'updatedAt'),
      versionstamp,
    };

    return new Sticker(
      {
        md5: field.string(record, 'md5'),
        url: field.string(record, 'url'),
        description: field.string(record, 'description'),
        likes: field.number(record, 'likes', 0),
        dislikes: field.number(record, 'dislikes', 0),
        doroConfidence: field.number(record, 'doroConfidence', 0),
        tags: field.stringArray(record, 'tags'),
        width: field.optionalNumber(record, 'width'),
        height: field.optionalNumber(record, 'height'),
        fileSize: field.optionalNumber(record, 'fileSize'),
      },
      meta
    );
  }

  // ============================================================================
  // Getters
  // ============================================================================

  get md5(): string {
    return this.data.md5;
  }

  get url(): string {
    return this.data.url;
  }

  get description(): string {
    return this.data.description;
  }

  get likes(): number {
    return this.data.likes;
  }

  get dislikes(): number {
    return this.data.dislikes;
  }

  get doroConfidence(): number {
    return this.data.doroConfidence;
  }

  get tags(): string[] {
    return [...this.data.tags];
  }

  get width(): number | undefined {
    return this.data.width;
  }

  get height(): number | undefined {
    return this.data.height;
  }

  get fileSize(): number | undefined {
    return this.data.fileSize;
  }

  /**
   * File extension of the hosted image, `png` when the URL has none
   */
  get imageExtension(): string {
    const pathname = URL.canParse(this.data.url) ? new URL(this.data.url).pathname : this.data.url;
    const match = /\.([a-z0-9]{1,5})$/i.exec(pathname);
    return match ? match[1].toLowerCase() : 'png';
  }

  /**
   * Name of the local copy kept under the picture directory
   */
  get pictureName(): string {
    return `${this.data.md5}.${this.imageExtension}`;
  }

  hasTag(name: string): boolean {
    return this.data.tags.includes(name);
  }

  // ============================================================================
  // Behaviour
  // ============================================================================

  setDescription(description: string): void {
    this.data.description = description;
  }

  setCounts(counts: { likes?: number; dislikes?: number }): void {
    if (counts.likes !== undefined) this.data.likes = counts.likes;
    if (counts.dislikes !== undefined) this.data.dislikes = counts.dislikes;
  }

  /**
   * Link a tag; false when it was already linked
   */
  addTag(name: string): boolean {
    if (this.hasTag(name)) return false;
    this.data.tags.push(name);
    return true;
  }

  /**
   * Replace the linked tags, dropping duplicates
   */
  setTags(names: string[]): void {
    this.data.tags = [...new Set(names)];
  }

  /**
   * Apply a vote from a voter whose previous vote was `previous`.
   *
   * Repeating the previous vote withdraws it; voting the other way moves
   * the vote across. Counts never drop below zero. Returns the voter's
   * vote after the change.
   */
  applyVote(previous: VoteAction | null, action: VoteAction): VoteAction | null {
    if (previous === action) {
      this.adjust(action, -1);
      return null;
    }

    if (previous) {
      this.adjust(previous, -1);
    }
    this.adjust(action, 1);
    return action;
  }

  private adjust(action: VoteAction, delta: number): void {
    if (action === 'like') {
      this.data.likes = Math.max(0, this.data.likes + delta);
    } else {
      this.data.dislikes = Math.max(0, this.data.dislikes + delta);
    }
  }
}
