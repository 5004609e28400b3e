/**
 * Stickers Context
 *
 * Builds the sticker services and their adapters from configuration.
 */

import type { Config } from '../../../framework/config/config.ts';
import type { KVStore } from '../../../framework/orm/kv.ts';
import { getLogger, type Logger } from '../../../framework/telemetry/logger.ts';
import { StickerRepository } from './infrastructure/sticker_repository.ts';
import { VisionClient } from './infrastructure/vision_client.ts';
import { HttpImageFetcher, PicbImageHost } from './infrastructure/image_host.ts';
import { LocalPictureStore, NullPictureStore } from './infrastructure/picture_store.ts';
import { StickerService } from './application/sticker_service.ts';
import { UploadService } from './application/upload_service.ts';
import type {
  ImageFetcher,
  ImageHost,
  PictureStore,
  StickerClassifier,
  StickerDescriber,
} from './application/ports.ts';

export interface StickerContext {
  stickers: StickerService;
  uploads: UploadService;
  /** Required in the `secret-key` header of delete requests; unset disables deletion */
  secretKey?: string;
}

export interface StickerAdapters {
  classifier?: StickerClassifier;
  describer?: StickerDescriber;
  imageHost?: ImageHost;
  fetcher?: ImageFetcher;
  pictureStore?: PictureStore;
  logger?: Logger;
}

/**
 * Wire the sticker context; adapters given in `overrides` replace the
 * configured ones
 */
export function createStickerContext(
  config: Config,
  store: KVStore,
  overrides: StickerAdapters = {}
): StickerContext {
  const logger = overrides.logger ?? getLogger();
  const repository = new StickerRepository(store);

  const vision = new VisionClient({
    apiKey: config.getString('vision.apiKey'),
    baseUrl: config.getString('vision.baseUrl'),
    model: config.getString('vision.model', 'Pro/Qwen/Qwen2.5-VL-7B-Instruct'),
    timeout: config.getNumber('vision.timeout', 30),
    logger,
  });

  const imageHost =
    overrides.imageHost ??
    new PicbImageHost({
      uploadUrl: config.getString('imageHost.uploadUrl', 'https://www.picb.cc/api/1/upload'),
      apiKey: config.getString('imageHost.apiKey'),
      albumId: config.getString('imageHost.albumId'),
      timeout: config.getNumber('imageHost.timeout', 30),
    });

  const picDir = config.getString('storage.picDir');
  const pictureStore = overrides.pictureStore ?? (picDir ? new LocalPictureStore(picDir) : new NullPictureStore());

  return {
    stickers: new StickerService({
      repository,
      fetcher: overrides.fetcher ?? new HttpImageFetcher({ timeout: config.getNumber('imageHost.timeout', 30) }),
      pictureStore,
      logger,
    }),
    uploads: new UploadService({
      repository,
      classifier: overrides.classifier ?? vision,
      describer: overrides.describer ?? vision,
      imageHost,
      pictureStore,
      threshold: config.getNumber('vision.threshold', 0.6),
      logger,
    }),
    secretKey: config.getString('secretKey'),
  };
}
