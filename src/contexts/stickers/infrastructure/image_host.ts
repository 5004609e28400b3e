/**
 * Image Host Adapters
 *
 * Uploads sticker images to a Chevereto-style image host (picb.cc) and
 * downloads hosted images back for batch downloads.
 */

import { withHttpClientSpan } from '../../../../framework/telemetry/otel.ts';
import { readRecord, type RecordFields } from '../../../../framework/orm/record.ts';
import { toError } from '../../../../framework/http/errors.ts';
import { ImageHostError, type HostedImage, type ImageFetcher, type ImageHost } from '../application/ports.ts';

export type FetchFn = typeof fetch;

export interface PicbImageHostOptions {
  uploadUrl: string;
  apiKey?: string;
  albumId?: string;
  /** Request timeout in seconds */
  timeout?: number;
  fetch?: FetchFn;
}

function optionalNumber(fields: RecordFields, name: string): number | undefined {
  const value = fields.get(name);
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return undefined;
}

/**
 * Read the hosted image out of an upload reply
 */
export function parseUploadReply(body: unknown): HostedImage {
  const reply = readRecord(body);
  if (reply.get('status_code') !== 200) {
    throw new ImageHostError(`Image host rejected the upload: ${JSON.stringify(body)}`);
  }

  const image = readRecord(reply.get('image'));
  const url = image.get('url');
  if (typeof url !== 'string' || url === '') {
    throw new ImageHostError('Image host reply has no image url');
  }

  const md5 = image.get('md5');
  return {
    url,
    md5: typeof md5 === 'string' ? md5 : undefined,
    width: optionalNumber(image, 'width'),
    height: optionalNumber(image, 'height'),
    size: optionalNumber(image, 'size'),
  };
}

/**
 * picb.cc upload client
 */
export class PicbImageHost implements ImageHost {
  private fetchFn: FetchFn;

  constructor(private options: PicbImageHostOptions) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async upload(image: Uint8Array, filename: string, mimeType: string): Promise<HostedImage> {
    if (!this.options.apiKey) {
      throw new ImageHostError('PICB_API_KEY is not set');
    }

    const form = new FormData();
    form.append('source', new Blob([image], { type: mimeType }), filename);
    if (this.options.albumId) {
      form.append('album_id', this.options.albumId);
    }

    const apiKey = this.options.apiKey;
    return withHttpClientSpan('POST', this.options.uploadUrl, async () => {
      let response: Response;
      try {
        response = await this.fetchFn(this.options.uploadUrl, {
          method: 'POST',
          headers: { 'X-API-Key': apiKey },
          body: form,
          signal: AbortSignal.timeout((this.options.timeout ?? 30) * 1000),
        });
      } catch (error) {
        throw new ImageHostError(`Image upload failed: ${toError(error).message}`);
      }

      if (response.status !== 200) {
        const text = await response.text();
        throw new ImageHostError(`Image upload failed: ${response.status} - ${text}`, response.status);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new ImageHostError(`Image host sent an unreadable reply: ${toError(error).message}`);
      }
      try {
        return parseUploadReply(body);
      } catch (error) {
        if (error instanceof ImageHostError) throw error;
        throw new ImageHostError(`Image host sent an unexpected reply: ${toError(error).message}`);
      }
    });
  }
}

/**
 * Downloads hosted images over HTTP
 */
export class HttpImageFetcher implements ImageFetcher {
  private fetchFn: FetchFn;

  constructor(private options: { timeout?: number; fetch?: FetchFn } = {}) {
    this.fetchFn = options.fetch ?? fetch;
  }

  fetch(url: string): Promise<Uint8Array | null> {
    return withHttpClientSpan('GET', url, async () => {
      const response = await this.fetchFn(url, {
        signal: AbortSignal.timeout((this.options.timeout ?? 30) * 1000),
      });
      if (response.status !== 200) {
        await response.body?.cancel();
        return null;
      }
      return new Uint8Array(await response.arrayBuffer());
    });
  }
}
