/**
 * Sticker Application Service
 *
 * Orchestrates browsing, voting, tagging, editing, deletion and batch
 * download of stickers.
 */

import { zipSync } from 'fflate';
import { getLogger, type Logger } from '../../../../framework/telemetry/logger.ts';
import { retryOnConflict, type SortDirection } from '../../../../framework/orm/mod.ts';
import { toError } from '../../../../framework/http/errors.ts';
import { Sticker, DESCRIPTION_MAX_LENGTH, type VoteAction } from '../domain/sticker.ts';
import { OperationLog } from '../domain/operation_log.ts';
import type { StickerRepository } from '../infrastructure/sticker_repository.ts';
import type { ImageFetcher, PictureStore } from './ports.ts';
import { failure, runUseCase, type ServiceResult } from './result.ts';

export type StickerSortField = 'created_at' | 'likes' | 'dislikes';

export const STICKER_SORT_FIELDS: readonly StickerSortField[] = ['created_at', 'likes', 'dislikes'];

export interface ListStickersQuery {
  page: number;
  size: number;
  sortBy: StickerSortField;
  sortOrder: SortDirection;
  search?: string;
  /** Stickers carrying any of these tags */
  tags?: string[];
  ip: string;
}

export interface StickerWithVote {
  sticker: Sticker;
  userAction: VoteAction | null;
}

export interface StickerPage {
  total: number;
  items: StickerWithVote[];
  page: number;
  size: number;
  pages: number;
}

export interface UpdateStickerCommand {
  description?: string;
  likes?: number;
  dislikes?: number;
  tags?: string[];
}

export interface StickerChange {
  message: string;
  sticker: Sticker;
}

export interface VoteChange extends StickerChange {
  action: VoteAction | null;
}

export interface BatchDeleteOutcome {
  message: string;
  deletedCount: number;
  notFoundIds: string[];
}

export interface StickerArchive {
  archive: Uint8Array;
  included: number;
  skipped: string[];
}

export interface StickerServiceDeps {
  repository: StickerRepository;
  fetcher: ImageFetcher;
  pictureStore: PictureStore;
  logger?: Logger;
}

const VOTE_MESSAGES: Record<VoteAction, { added: string; removed: string; switched: string }> = {
  like: { added: 'Liked', removed: 'Like removed', switched: 'Switched from dislike to like' },
  dislike: { added: 'Disliked', removed: 'Dislike removed', switched: 'Switched from like to dislike' },
};

const NOT_FOUND_MESSAGE = 'Sticker not found';

/**
 * Characters not allowed in archive entry names
 */
const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|]/g;

/**
 * Name of a sticker's image inside the batch download archive
 */
export function archiveEntryName(sticker: Sticker): string {
  const description = Array.from(sticker.description).slice(0, 10).join('').replace(UNSAFE_FILENAME_CHARS, '_');
  return `${sticker.id.slice(0, 4)}_${description}_${sticker.md5.slice(-6)}.${sticker.imageExtension}`;
}

/**
 * Sticker application service
 */
export class StickerService {
  private repository: StickerRepository;
  private fetcher: ImageFetcher;
  private pictureStore: PictureStore;
  private logger: Logger;

  constructor(deps: StickerServiceDeps) {
    this.repository = deps.repository;
    this.fetcher = deps.fetcher;
    this.pictureStore = deps.pictureStore;
    this.logger = (deps.logger ?? getLogger()).child({ service: 'stickers' });
  }

  /**
   * List stickers with paging, sorting, search and tag filters
   */
  async listStickers(params: ListStickersQuery): Promise<StickerPage> {
    const search = params.search?.trim().toLowerCase();
    const tags = params.tags?.filter((tag) => tag.length > 0) ?? [];

    const query = this.repository.query();
    if (search) {
      query.filter((sticker) => sticker.description.toLowerCase().includes(search));
    }
    if (tags.length > 0) {
      query.filter((sticker) => tags.some((tag) => sticker.hasTag(tag)));
    }

    const result = await query
      .orderBy((sticker) => sortKey(sticker, params.sortBy), params.sortOrder)
      .orderBy((sticker) => sticker.id)
      .offset((params.page - 1) * params.size)
      .limit(params.size)
      .execute();

    const votes = await this.repository.votesFor(
      result.data.map((sticker) => sticker.id),
      params.ip
    );

    return {
      total: result.count,
      items: result.data.map((sticker) => ({ sticker, userAction: votes.get(sticker.id) ?? null })),
      page: params.page,
      size: params.size,
      pages: Math.ceil(result.count / params.size),
    };
  }

  /**
   * Up to `count` distinct stickers in random order
   */
  async randomStickers(count: number): Promise<Sticker[]> {
    const stickers = await this.repository.all();

    for (let i = stickers.length - 1; i > 0; i--) {
      const j = Math.floor(Math.random() * (i + 1));
      [stickers[i], stickers[j]] = [stickers[j], stickers[i]];
    }

    return stickers.slice(0, count);
  }

  /**
   * Get sticker by ID
   */
  async getSticker(id: string): Promise<ServiceResult<{ sticker: Sticker }>> {
    const sticker = await this.repository.findById(id);
    if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);
    return { success: true, sticker };
  }

  /**
   * Partially update a sticker
   */
  updateSticker(id: string, command: UpdateStickerCommand): Promise<ServiceResult<StickerChange>> {
    return runUseCase(() =>
      retryOnConflict(async (): Promise<ServiceResult<StickerChange>> => {
        const sticker = await this.repository.findById(id);
        if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);

        const previousTags = sticker.tags;
        if (command.description !== undefined) sticker.setDescription(command.description);
        sticker.setCounts({ likes: command.likes, dislikes: command.dislikes });
        if (command.tags !== undefined) sticker.setTags(command.tags);

        await this.repository.update(sticker, previousTags);
        return { success: true, message: 'Sticker updated', sticker };
      })
    );
  }

  /**
   * Toggle a like or dislike for a voter IP
   */
  vote(id: string, ip: string, action: VoteAction): Promise<ServiceResult<VoteChange>> {
    return runUseCase(() =>
      retryOnConflict(async (): Promise<ServiceResult<VoteChange>> => {
        const sticker = await this.repository.findById(id);
        if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);

        const previous = await this.repository.getVote(id, ip);
        const next = sticker.applyVote(previous.action, action);
        await this.repository.saveVote(sticker, ip, previous, next);

        const messages = VOTE_MESSAGES[action];
        const message = next === null ? messages.removed : previous.action ? messages.switched : messages.added;
        return { success: true, message, sticker, action: next };
      })
    );
  }

  /**
   * Most used tags
   */
  async popularTags(limit: number): Promise<{ tag: string; count: number }[]> {
    const tags = await this.repository.popularTags(limit);
    return tags.map((tag) => ({ tag: tag.name, count: tag.usageCount }));
  }

  /**
   * Link a tag to a sticker, creating the tag when needed
   */
  addTag(id: string, tagName: string): Promise<ServiceResult<StickerChange>> {
    return runUseCase(() =>
      retryOnConflict(async (): Promise<ServiceResult<StickerChange>> => {
        const sticker = await this.repository.findById(id);
        if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);

        const previousTags = sticker.tags;
        if (sticker.addTag(tagName.trim())) {
          await this.repository.update(sticker, previousTags);
        }
        return { success: true, message: 'Tag added', sticker };
      })
    );
  }

  /**
   * Replace the tags linked to a sticker
   */
  replaceTags(id: string, tags: string[]): Promise<ServiceResult<StickerChange>> {
    return runUseCase(() =>
      retryOnConflict(async (): Promise<ServiceResult<StickerChange>> => {
        const sticker = await this.repository.findById(id);
        if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);

        const previousTags = sticker.tags;
        sticker.setTags(tags.map((tag) => tag.trim()));
        await this.repository.update(sticker, previousTags);
        return { success: true, message: 'Tags updated', sticker };
      })
    );
  }

  /**
   * Change a sticker's description and record who did it
   */
  updateDescription(
    id: string,
    description: string,
    client: { ip: string; userAgent?: string }
  ): Promise<ServiceResult<StickerChange>> {
    const trimmed = description.trim();
    if (trimmed.length === 0 || trimmed.length > DESCRIPTION_MAX_LENGTH) {
      return Promise.resolve(
        failure('VALIDATION_ERROR', `description must be between 1 and ${DESCRIPTION_MAX_LENGTH} characters`)
      );
    }

    return runUseCase(() =>
      retryOnConflict(async (): Promise<ServiceResult<StickerChange>> => {
        const sticker = await this.repository.findById(id);
        if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);

        const log = OperationLog.create({
          stickerId: sticker.id,
          operation: 'update_description',
          ipAddress: client.ip,
          userAgent: client.userAgent,
          oldDescription: sticker.description,
          newDescription: trimmed,
        });
        sticker.setDescription(trimmed);
        await this.repository.update(sticker, sticker.tags, log);
        return { success: true, message: 'Description updated', sticker };
      })
    );
  }

  /**
   * Delete a sticker by id, or by md5 when given 32 characters
   */
  deleteSticker(identifier: string): Promise<ServiceResult<{ message: string }>> {
    return runUseCase(() =>
      retryOnConflict(async (): Promise<ServiceResult<{ message: string }>> => {
        const sticker =
          identifier.length === 32
            ? await this.repository.findByMd5(identifier)
            : await this.repository.findById(identifier);
        if (!sticker) return failure('NOT_FOUND', NOT_FOUND_MESSAGE);

        await this.removeSticker(sticker);
        return { success: true, message: 'Sticker deleted' };
      })
    );
  }

  /**
   * Delete several stickers by id
   */
  batchDelete(ids: string[]): Promise<ServiceResult<BatchDeleteOutcome>> {
    return runUseCase(async (): Promise<ServiceResult<BatchDeleteOutcome>> => {
      const requested = [...new Set(ids)];
      const stickers = await this.repository.findByIds(requested);
      if (stickers.length === 0) {
        return failure('NOT_FOUND', 'None of the given stickers were found');
      }

      for (const sticker of stickers) {
        await retryOnConflict(async () => {
          const current = await this.repository.findById(sticker.id);
          if (current) await this.removeSticker(current);
        });
      }

      const found = new Set(stickers.map((sticker) => sticker.id));
      const notFoundIds = requested.filter((id) => !found.has(id));

      let message = `Deleted ${stickers.length} stickers`;
      if (notFoundIds.length > 0) {
        message += `, ${notFoundIds.length} not found (${notFoundIds.join(', ')})`;
      }

      return { success: true, message, deletedCount: stickers.length, notFoundIds };
    });
  }

  /**
   * Download the images of several stickers into one zip archive
   */
  async batchDownload(ids: string[]): Promise<ServiceResult<StickerArchive>> {
    const stickers = await this.repository.findByIds(ids);
    if (stickers.length === 0) {
      return failure('NOT_FOUND', 'None of the given stickers were found');
    }

    const entries: Record<string, Uint8Array> = {};
    const skipped: string[] = [];

    for (const sticker of stickers) {
      try {
        const image = await this.fetcher.fetch(sticker.url);
        if (image) {
          entries[archiveEntryName(sticker)] = image;
          continue;
        }
        this.logger.warn('Sticker image unavailable', { stickerId: sticker.id, url: sticker.url });
      } catch (error) {
        this.logger.warn('Sticker image download failed', {
          stickerId: sticker.id,
          url: sticker.url,
          error: toError(error).message,
        });
      }
      skipped.push(sticker.id);
    }

    return {
      success: true,
      archive: zipSync(entries),
      included: stickers.length - skipped.length,
      skipped,
    };
  }

  /**
   * Operation logs of a sticker
   */
  operationLogs(id: string): Promise<OperationLog[]> {
    return this.repository.logsFor(id);
  }

  private async removeSticker(sticker: Sticker): Promise<void> {
    await this.pictureStore.remove(sticker.pictureName);
    await this.repository.remove(sticker);
    this.logger.info('Sticker deleted', { stickerId: sticker.id, md5: sticker.md5 });
  }
}

function sortKey(sticker: Sticker, field: StickerSortField): number {
  switch (field) {
    case 'likes':
      return sticker.likes;
    case 'dislikes':
      return sticker.dislikes;
    default:
      return sticker.createdAt.getTime();
  }
}
