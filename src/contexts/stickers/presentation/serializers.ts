/**
 * Sticker Serializers
 *
 * Wire shapes of the sticker API. Fields are snake_case and timestamps
 * are Unix seconds.
 */

import type { Sticker, VoteAction } from '../domain/sticker.ts';
import type { DoroPrediction } from '../application/ports.ts';

export interface StickerJson {
  id: string;
  md5: string;
  url: string;
  description: string;
  created_at: number;
  updated_at: number;
  likes: number;
  dislikes: number;
  doro_confidence: number;
  tags: string[];
  width: number | null;
  height: number | null;
  file_size: number | null;
}

export interface StickerListItemJson extends StickerJson {
  user_action: VoteAction | null;
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function serializeSticker(sticker: Sticker): StickerJson {
  return {
    id: sticker.id,
    md5: sticker.md5,
    url: sticker.url,
    description: sticker.description,
    created_at: unixSeconds(sticker.createdAt),
    updated_at: unixSeconds(sticker.updatedAt),
    likes: sticker.likes,
    dislikes: sticker.dislikes,
    doro_confidence: sticker.doroConfidence,
    tags: sticker.tags,
    width: sticker.width ?? null,
    height: sticker.height ?? null,
    file_size: sticker.fileSize ?? null,
  };
}

export function serializeListItem(sticker: Sticker, userAction: VoteAction | null): StickerListItemJson {
  return { ...serializeSticker(sticker), user_action: userAction };
}

export function serializePrediction(prediction: DoroPrediction) {
  return {
    is_doro: prediction.isDoro,
    confidence: prediction.confidence,
    probabilities: {
      doro: prediction.probabilities.doro,
      non_doro: prediction.probabilities.nonDoro,
    },
  };
}
