/**
 * Upload Application Service
 *
 * Admits new stickers: deduplicates by md5, checks the image is a DORO,
 * screens and describes it, hosts it and records the upload.
 */

import { createHash } from 'node:crypto';
import { getLogger, type Logger } from '../../../../framework/telemetry/logger.ts';
import { toError } from '../../../../framework/http/errors.ts';
import { Sticker } from '../domain/sticker.ts';
import { TEXT_TAG } from '../domain/tag.ts';
import { OperationLog } from '../domain/operation_log.ts';
import type { StickerRepository } from '../infrastructure/sticker_repository.ts';
import {
  ImageHostError,
  VisionError,
  type DoroPrediction,
  type HostedImage,
  type ImageHost,
  type PictureStore,
  type StickerClassifier,
  type StickerDescriber,
} from './ports.ts';
import { failure, runUseCase, type ServiceFailure, type ServiceResult } from './result.ts';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

export interface UploadCommand {
  image: Uint8Array;
  mimeType: string;
  filename: string;
  ip: string;
  userAgent?: string;
}

export interface UploadServiceDeps {
  repository: StickerRepository;
  classifier: StickerClassifier;
  describer: StickerDescriber;
  imageHost: ImageHost;
  pictureStore: PictureStore;
  /** Minimum classifier confidence for a DORO verdict to be accepted */
  threshold?: number;
  logger?: Logger;
}

/**
 * Hex md5 digest of an image
 */
export function md5Hex(data: Uint8Array): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Upload application service
 */
export class UploadService {
  private repository: StickerRepository;
  private classifier: StickerClassifier;
  private describer: StickerDescriber;
  private imageHost: ImageHost;
  private pictureStore: PictureStore;
  private threshold: number;
  private logger: Logger;

  constructor(deps: UploadServiceDeps) {
    this.repository = deps.repository;
    this.classifier = deps.classifier;
    this.describer = deps.describer;
    this.imageHost = deps.imageHost;
    this.pictureStore = deps.pictureStore;
    this.threshold = deps.threshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.logger = (deps.logger ?? getLogger()).child({ service: 'upload' });
  }

  /**
   * Classify an image without storing anything
   */
  async predict(image: Uint8Array, mimeType: string): Promise<ServiceResult<{ prediction: DoroPrediction }>> {
    try {
      return { success: true, prediction: await this.classifier.predict(image, mimeType) };
    } catch (error) {
      return this.upstreamFailure(error);
    }
  }

  /**
   * Admit a new sticker
   */
  upload(command: UploadCommand): Promise<ServiceResult<{ sticker: Sticker; message: string }>> {
    return runUseCase(async (): Promise<ServiceResult<{ sticker: Sticker; message: string }>> => {
      const md5 = md5Hex(command.image);

      const existing = await this.repository.findByMd5(md5);
      if (existing) {
        return failure('CONFLICT', 'Sticker already exists', { sticker_id: existing.id });
      }

      let prediction: DoroPrediction;
      try {
        prediction = await this.classifier.predict(command.image, command.mimeType);
      } catch (error) {
        return this.upstreamFailure(error);
      }

      if (!prediction.isDoro || prediction.confidence < this.threshold) {
        this.logger.info('Rejected non-DORO upload', { md5, confidence: prediction.confidence });
        return failure('VALIDATION_ERROR', 'Image is not a DORO sticker', {
          is_doro: prediction.isDoro,
          confidence: prediction.confidence,
        });
      }

      const description = await this.describer.describe(command.image, command.mimeType);
      if (!description.isSafe) {
        this.logger.warn('Rejected unsafe upload', { md5 });
        return failure('VALIDATION_ERROR', 'Sticker content is unsafe', { content_safety: 'unsafe' });
      }

      let hosted: HostedImage;
      try {
        hosted = await this.imageHost.upload(command.image, command.filename, command.mimeType);
      } catch (error) {
        return this.upstreamFailure(error);
      }

      const sticker = Sticker.create({
        md5,
        url: hosted.url,
        description: description.description,
        doroConfidence: prediction.confidence,
        tags: description.hasText ? [TEXT_TAG] : [],
        width: hosted.width,
        height: hosted.height,
        fileSize: hosted.size ?? command.image.byteLength,
      });

      const invalid = sticker.validate();
      if (invalid.length > 0) {
        return this.upstreamFailure(new ImageHostError(`Image host sent an unusable image: ${invalid.join(', ')}`));
      }

      const log = OperationLog.create({
        stickerId: sticker.id,
        operation: 'upload',
        ipAddress: command.ip,
        userAgent: command.userAgent,
        newDescription: sticker.description,
      });
      log.assertValid();

      await this.keepLocalCopy(sticker, command.image);

      if (!(await this.repository.insert(sticker, log))) {
        return failure('CONFLICT', 'Sticker already exists');
      }

      this.logger.info('Sticker uploaded', { stickerId: sticker.id, md5 });
      return { success: true, sticker, message: 'Sticker uploaded' };
    });
  }

  private async keepLocalCopy(sticker: Sticker, image: Uint8Array): Promise<void> {
    try {
      await this.pictureStore.save(sticker.pictureName, image);
    } catch (error) {
      this.logger.warn('Failed to keep local picture copy', {
        name: sticker.pictureName,
        error: toError(error).message,
      });
    }
  }

  private upstreamFailure(error: unknown): ServiceFailure {
    if (error instanceof VisionError || error instanceof ImageHostError) {
      this.logger.error('Upstream service failed', error);
      return failure('UPSTREAM_ERROR', error.message);
    }
    throw error;
  }
}
