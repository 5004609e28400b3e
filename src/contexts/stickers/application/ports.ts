/**
 * Sticker Ports
 *
 * Interfaces for the external collaborators of the sticker services.
 * Production adapters live in the infrastructure layer; tests supply
 * in-process fakes.
 */

export interface DoroPrediction {
  isDoro: boolean;
  /** Probability of the predicted class */
  confidence: number;
  probabilities: {
    doro: number;
    nonDoro: number;
  };
}

/**
 * Decides whether an image is a DORO sticker
 */
export interface StickerClassifier {
  predict(image: Uint8Array, mimeType: string): Promise<DoroPrediction>;
}

export interface ImageDescription {
  description: string;
  hasText: boolean;
  isSafe: boolean;
}

/**
 * Describes an image and screens it for unsafe content
 */
export interface StickerDescriber {
  describe(image: Uint8Array, mimeType: string): Promise<ImageDescription>;
}

export interface HostedImage {
  url: string;
  md5?: string;
  width?: number;
  height?: number;
  size?: number;
}

/**
 * Stores uploaded images publicly; throws ImageHostError on failure
 */
export interface ImageHost {
  upload(image: Uint8Array, filename: string, mimeType: string): Promise<HostedImage>;
}

/**
 * Downloads hosted images; null when the host did not answer 200
 */
export interface ImageFetcher {
  fetch(url: string): Promise<Uint8Array | null>;
}

/**
 * Keeps local copies of uploaded images
 */
export interface PictureStore {
  save(name: string, data: Uint8Array): Promise<void>;
  remove(name: string): Promise<void>;
}

/**
 * Raised when the image host rejects or fails an upload
 */
export class ImageHostError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ImageHostError';
  }
}

/**
 * Raised when the vision model cannot be reached or answers nonsense
 */
export class VisionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VisionError';
  }
}
