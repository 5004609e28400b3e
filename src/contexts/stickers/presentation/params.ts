/**
 * Request Parameter Readers
 *
 * Pull typed values out of query strings, JSON bodies and multipart
 * forms; anything malformed ends the request with a 400.
 */

import { HttpError, parseJsonBody } from '../../../../framework/http/mod.ts';

export type JsonFields = Map<string, unknown>;

export interface IntParamOptions {
  default: number;
  min?: number;
  max?: number;
}

/**
 * Read an integer query parameter within bounds
 */
export function intParam(query: URLSearchParams, name: string, options: IntParamOptions): number {
  const raw = query.get(name);
  if (raw === null || raw.trim() === '') return options.default;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw HttpError.badRequest(`${name} must be an integer`);
  }
  if (options.min !== undefined && value < options.min) {
    throw HttpError.badRequest(`${name} must be at least ${options.min}`);
  }
  if (options.max !== undefined && value > options.max) {
    throw HttpError.badRequest(`${name} must be at most ${options.max}`);
  }
  return value;
}

/**
 * Parse a JSON body that must be an object
 */
export async function readJsonObject(request: Request): Promise<JsonFields> {
  const body = await parseJsonBody(request);
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw HttpError.badRequest('Request body must be a JSON object');
  }
  return new Map<string, unknown>(Object.entries(body));
}

/**
 * Parse a JSON body that must be an array of strings
 */
export async function readJsonStringArray(request: Request): Promise<string[]> {
  const body = await parseJsonBody(request);
  return asStringArray(body, 'Request body');
}

function asStringArray(value: unknown, name: string): string[] {
  if (!Array.isArray(value)) {
    throw HttpError.badRequest(`${name} must be an array of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw HttpError.badRequest(`${name} must be an array of strings`);
    }
    items.push(item);
  }
  return items;
}

export const body = {
  requiredString(fields: JsonFields, name: string): string {
    const value = fields.get(name);
    if (typeof value !== 'string') {
      throw HttpError.badRequest(`${name} is required and must be a string`);
    }
    return value;
  },

  optionalString(fields: JsonFields, name: string): string | undefined {
    const value = fields.get(name);
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      throw HttpError.badRequest(`${name} must be a string`);
    }
    return value;
  },

  optionalCount(fields: JsonFields, name: string): number | undefined {
    const value = fields.get(name);
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw HttpError.badRequest(`${name} must be a non-negative integer`);
    }
    return value;
  },

  requiredStringArray(fields: JsonFields, name: string): string[] {
    return asStringArray(fields.get(name), name);
  },

  optionalStringArray(fields: JsonFields, name: string): string[] | undefined {
    const value = fields.get(name);
    if (value === undefined || value === null) return undefined;
    return asStringArray(value, name);
  },
};

export interface UploadedImage {
  data: Uint8Array;
  mimeType: string;
  filename: string;
}

/**
 * Read the image file posted under `name` in a multipart form
 */
export async function readImageFile(request: Request, name = 'file'): Promise<UploadedImage> {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    throw HttpError.badRequest('Request body must be multipart/form-data');
  }

  const entry = form.get(name);
  if (entry === null || typeof entry === 'string') {
    throw HttpError.badRequest(`${name} must be an uploaded file`);
  }
  const mimeType = entry.type.toLowerCase();
  if (!mimeType.startsWith('image/')) {
    throw HttpError.badRequest('Uploaded file must be an image');
  }

  const data = new Uint8Array(await entry.arrayBuffer());
  if (data.byteLength === 0) {
    throw HttpError.badRequest('Uploaded file is empty');
  }

  return { data, mimeType, filename: entry.name || 'sticker.png' };
}
