/**
 * Sticker Routes
 *
 * JSON API for uploading, browsing, voting on, tagging, editing,
 * downloading and deleting stickers.
 *
 * @module
 */

import { timingSafeEqual } from 'node:crypto';
import type { Application } from '../../../../framework/app.ts';
import { AppResponse, HttpError, type Context } from '../../../../framework/http/mod.ts';
import { HttpStatus } from '../../../../framework/api/response.ts';
import { isFailure, type ServiceResult } from '../application/result.ts';
import { STICKER_SORT_FIELDS, type StickerSortField } from '../application/sticker_service.ts';
import type { VoteAction } from '../domain/sticker.ts';
import type { StickerContext } from '../module.ts';
import { body, intParam, readImageFile, readJsonObject, readJsonStringArray } from './params.ts';
import { serializeListItem, serializePrediction, serializeSticker } from './serializers.ts';

export const STICKERS_PREFIX = '/api/stickers';

const MAX_BATCH_SIZE = 100;

type RouteRegistrar = Pick<Application, 'get' | 'post' | 'put' | 'patch' | 'delete'>;

/**
 * Return the success payload or throw the matching HttpError
 */
function unwrap<T>(result: ServiceResult<T>): { success: true } & T {
  if (isFailure(result)) {
    throw new HttpError(result.code, result.error, result.details);
  }
  return result;
}

function secretMatches(given: string | null, expected: string | undefined): boolean {
  if (!expected || given === null) return false;
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function checkBatchSize(ids: string[]): void {
  if (ids.length === 0) {
    throw HttpError.badRequest('At least one sticker id is required');
  }
  if (ids.length > MAX_BATCH_SIZE) {
    throw HttpError.badRequest(`At most ${MAX_BATCH_SIZE} stickers per request`);
  }
}

function sortField(value: string | null): StickerSortField {
  return STICKER_SORT_FIELDS.find((candidate) => candidate === value) ?? 'created_at';
}

/**
 * Register sticker routes
 */
export function setupStickerRoutes(app: RouteRegistrar, context: StickerContext): void {
  const { stickers, uploads } = context;
  const p = (path: string) => (path === '/' ? STICKERS_PREFIX : `${STICKERS_PREFIX}${path}`);

  const requireSecret = (ctx: Context): void => {
    if (!secretMatches(ctx.header('secret-key'), context.secretKey)) {
      throw HttpError.unauthorized('Invalid secret key');
    }
  };

  const vote = (action: VoteAction) => async (ctx: Context) => {
    const result = unwrap(await stickers.vote(ctx.params.id, ctx.ip, action));
    return Response.json({
      message: result.message,
      sticker: serializeSticker(result.sticker),
      action: result.action,
    });
  };

  // ============================================================================
  // Upload and classification
  // ============================================================================

  app.post(p('/upload'), async (ctx: Context) => {
    const file = await readImageFile(ctx.request);
    const result = unwrap(
      await uploads.upload({
        image: file.data,
        mimeType: file.mimeType,
        filename: file.filename,
        ip: ctx.ip,
        userAgent: ctx.header('User-Agent') ?? undefined,
      })
    );

    return Response.json(
      { message: result.message, sticker: serializeSticker(result.sticker) },
      { status: HttpStatus.CREATED }
    );
  });

  app.post(p('/predict'), async (ctx: Context) => {
    const file = await readImageFile(ctx.request);
    const result = unwrap(await uploads.predict(file.data, file.mimeType));
    return Response.json(serializePrediction(result.prediction));
  });

  // ============================================================================
  // Browsing
  // ============================================================================

  app.get(p('/'), async (ctx: Context) => {
    const page = await stickers.listStickers({
      page: intParam(ctx.query, 'page', { default: 1, min: 1 }),
      size: intParam(ctx.query, 'size', { default: 20, min: 1, max: 100 }),
      sortBy: sortField(ctx.query.get('sort_by')),
      sortOrder: ctx.query.get('sort_order') === 'asc' ? 'asc' : 'desc',
      search: ctx.query.get('search') ?? undefined,
      tags: ctx.query.getAll('tags'),
      ip: ctx.ip,
    });

    return Response.json({
      total: page.total,
      items: page.items.map((item) => serializeListItem(item.sticker, item.userAction)),
      page: page.page,
      size: page.size,
      pages: page.pages,
    });
  });

  app.get(p('/random'), async (ctx: Context) => {
    const count = intParam(ctx.query, 'count', { default: 1, min: 1, max: 10 });
    const random = await stickers.randomStickers(count);
    return Response.json(random.map(serializeSticker));
  });

  app.get(p('/tags/popular'), async (ctx: Context) => {
    const limit = intParam(ctx.query, 'limit', { default: 20, min: 1, max: 100 });
    return Response.json(await stickers.popularTags(limit));
  });

  // ============================================================================
  // Batch operations
  // ============================================================================

  app.post(p('/download/batch'), async (ctx: Context) => {
    const ids = await readJsonStringArray(ctx.request);
    checkBatchSize(ids);

    const result = unwrap(await stickers.batchDownload(ids));
    return new AppResponse().attachment(result.archive, 'doro_stickers.zip', 'application/zip');
  });

  app.delete(p('/batch'), async (ctx: Context) => {
    requireSecret(ctx);
    const ids = body.requiredStringArray(await readJsonObject(ctx.request), 'sticker_ids');
    checkBatchSize(ids);

    const result = unwrap(await stickers.batchDelete(ids));
    return Response.json({
      message: result.message,
      deleted_count: result.deletedCount,
      not_found_ids: result.notFoundIds,
    });
  });

  // ============================================================================
  // Single sticker
  // ============================================================================

  app.get(p('/:id'), async (ctx: Context) => {
    const result = unwrap(await stickers.getSticker(ctx.params.id));
    return Response.json(serializeSticker(result.sticker));
  });

  app.put(p('/:id'), async (ctx: Context) => {
    const fields = await readJsonObject(ctx.request);
    const result = unwrap(
      await stickers.updateSticker(ctx.params.id, {
        description: body.optionalString(fields, 'description'),
        likes: body.optionalCount(fields, 'likes'),
        dislikes: body.optionalCount(fields, 'dislikes'),
        tags: body.optionalStringArray(fields, 'tags'),
      })
    );
    return Response.json(serializeSticker(result.sticker));
  });

  app.post(p('/:id/like'), vote('like'));
  app.post(p('/:id/dislike'), vote('dislike'));

  app.post(p('/:id/tag'), async (ctx: Context) => {
    const tagName = body.requiredString(await readJsonObject(ctx.request), 'tag_name');
    const result = unwrap(await stickers.addTag(ctx.params.id, tagName));
    return Response.json({ message: result.message, sticker: serializeSticker(result.sticker) });
  });

  app.post(p('/:id/tags'), async (ctx: Context) => {
    const tags = body.requiredStringArray(await readJsonObject(ctx.request), 'tags');
    const result = unwrap(await stickers.replaceTags(ctx.params.id, tags));
    return Response.json({ message: result.message, sticker: serializeSticker(result.sticker) });
  });

  app.patch(p('/:id/description'), async (ctx: Context) => {
    const description = body.requiredString(await readJsonObject(ctx.request), 'description');
    const result = unwrap(
      await stickers.updateDescription(ctx.params.id, description, {
        ip: ctx.ip,
        userAgent: ctx.header('User-Agent') ?? undefined,
      })
    );
    return Response.json(serializeSticker(result.sticker));
  });

  app.delete(p('/:identifier'), async (ctx: Context) => {
    requireSecret(ctx);
    const result = unwrap(await stickers.deleteSticker(ctx.params.identifier));
    return Response.json({ message: result.message });
  });
}
